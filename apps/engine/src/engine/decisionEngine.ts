import { v4 as uuidv4 } from "uuid";
import {
  DecisionRequestInputSchema,
  describeIssues,
  type ApprovalWaiter,
  type AuditEntry,
  type Clock,
  type ConsensusResult,
  type DecisionRequest,
  type Logger,
  type Tier,
  type Verdict,
} from "@tiergate/shared";
import type { ApprovalCoordinator } from "../approval/coordinator.js";
import type { AuditLog } from "../audit/auditLog.js";
import type { Bus } from "../bus/bus.js";
import type { EngineConfig } from "../config.js";
import { isApproved, synthesize } from "../council/consensus.js";
import { deliberate } from "../council/deliberation.js";
import { describeRequest, type OpinionSource } from "../council/source.js";
import { MalformedRequestError } from "../errors.js";
import type { PolicyGate } from "../policy/policyGate.js";
import { createRuntimeState, recordVerdict, updateRuntimeState, type RuntimeState } from "../state/runtimeState.js";
import { classify, needsAmount, tierBasis } from "../tiers/classifier.js";
import { deepFreeze } from "../util/freeze.js";

export const WITHDRAWN = "withdrawn";

export type EngineDeps = {
  config: EngineConfig;
  sources: readonly OpinionSource[];
  approvals: ApprovalCoordinator;
  policy: PolicyGate;
  audit: AuditLog;
  bus: Bus;
  clock: Clock;
  log: Logger;
};

type TierOutcome = {
  approved: boolean;
  reason: string;
  consensus?: ConsensusResult;
  approval?: ApprovalWaiter;
};

function approvalReason(waiter: ApprovalWaiter): string {
  switch (waiter.status) {
    case "Approved":
      return `approved by ${waiter.responderId ?? "responder"}`;
    case "Rejected":
      return `rejected by ${waiter.responderId ?? "responder"}`;
    case "TimedOut":
      return "approval timed out";
    case "Withdrawn":
      return WITHDRAWN;
    case "Pending":
      return "approval still pending";
  }
}

/**
 * Routes each request through its tier, the policy gate and the audit log,
 * in that order. A Verdict is only returned once its audit entry is written;
 * executing the action is the caller's job.
 */
export class DecisionEngine {
  private inFlight = new Map<string, AbortController>();
  private seen = new Set<string>();
  private runtime: RuntimeState;

  constructor(private deps: EngineDeps) {
    for (const entry of deps.audit.all()) this.seen.add(entry.requestId);
    this.runtime = createRuntimeState(deps.clock.nowIso());
  }

  async submit(input: unknown, signal?: AbortSignal): Promise<Verdict> {
    return this.begin(input, signal).verdict;
  }

  /**
   * Validates synchronously and starts the decision. Malformed or duplicate
   * requests throw here, before anything is deliberated or audited.
   */
  begin(input: unknown, signal?: AbortSignal): { request: DecisionRequest; verdict: Promise<Verdict> } {
    const request = this.admit(input);
    return { request, verdict: this.decide(request, signal) };
  }

  private async decide(request: DecisionRequest, signal?: AbortSignal): Promise<Verdict> {
    const controller = new AbortController();
    const forward = () => controller.abort();
    if (signal?.aborted) forward();
    signal?.addEventListener("abort", forward, { once: true });
    this.inFlight.set(request.id, controller);

    const log = this.deps.log;
    try {
      const tier = classify(request, this.deps.config.tiers);
      log.info(`request ${request.id} (${request.actionType}${request.amount !== undefined ? ` ${request.amount}` : ""}) → ${tier}`);

      const outcome = await this.runTier(tier, request, controller.signal);
      const tierApproved = outcome.approved && !controller.signal.aborted;
      let policy = await this.deps.policy.check(request, tierApproved);

      // A withdrawal can land while the gate waits for its bucket lock.
      const withdrawn = controller.signal.aborted;
      if (withdrawn && tierApproved) {
        if (policy.reservationId) this.deps.policy.release(policy.reservationId);
        policy = await this.deps.policy.check(request, false);
      }

      let approved = false;
      let reason = withdrawn ? WITHDRAWN : outcome.reason;
      if (tierApproved && !withdrawn && policy.passed) {
        approved = true;
      } else if (tierApproved && !withdrawn && policy.violation) {
        reason = `policy violation (${policy.violation.constraint}): ${policy.violation.message}`;
      }

      let entry: AuditEntry;
      try {
        entry = this.deps.audit.append({
          requestId: request.id,
          tier,
          tierBasis: tierBasis(this.deps.config.tiers),
          request,
          consensus: outcome.consensus,
          approval: outcome.approval,
          policy,
          verdict: { approved, reason },
        });
      } catch (e) {
        if (policy.reservationId) this.deps.policy.release(policy.reservationId);
        throw e;
      }

      const verdict: Verdict = deepFreeze({ requestId: request.id, approved, tier, reason, auditEntryId: entry.entryId });
      recordVerdict(this.runtime, verdict, this.deps.clock.nowIso());
      this.deps.bus.publish("VERDICTS", verdict);
      log.info(`verdict ${request.id}: ${approved ? "APPROVED" : "REJECTED"} (${reason})`);
      return verdict;
    } finally {
      signal?.removeEventListener("abort", forward);
      this.inFlight.delete(request.id);
    }
  }

  /** Aborts an in-flight request; it still ends with one audited rejection. */
  withdraw(requestId: string): boolean {
    const controller = this.inFlight.get(requestId);
    if (!controller || controller.signal.aborted) return false;
    this.deps.log.info(`request ${requestId} withdrawn`);
    controller.abort();
    return true;
  }

  state(): RuntimeState {
    return updateRuntimeState(
      this.runtime,
      { inFlight: this.inFlight.size, pendingApprovals: this.deps.approvals.pending().length },
      this.deps.clock.nowIso()
    );
  }

  private admit(input: unknown): DecisionRequest {
    const parsed = DecisionRequestInputSchema.safeParse(input);
    if (!parsed.success) throw new MalformedRequestError(describeIssues(parsed.error));
    const raw = parsed.data;
    if (raw.amount === undefined && needsAmount(raw.actionType, this.deps.config.tiers)) {
      throw new MalformedRequestError(`amount is required for ${raw.actionType}`);
    }
    const id = raw.id ?? uuidv4();
    if (this.seen.has(id)) throw new MalformedRequestError(`duplicate request id ${id}`);
    this.seen.add(id);
    return deepFreeze({ ...raw, id, requestedAt: raw.requestedAt ?? this.deps.clock.nowIso() });
  }

  private async runTier(tier: Tier, request: DecisionRequest, signal: AbortSignal): Promise<TierOutcome> {
    const { tiers } = this.deps.config;
    switch (tier) {
      case "Autonomous":
        return {
          approved: true,
          reason:
            request.amount === undefined
              ? `autonomous by default for ${request.actionType}`
              : `autonomous: amount ${request.amount} below ${tiers.autonomousBelow}`,
        };
      case "Council": {
        const consensus = await this.council(request, signal);
        return { approved: isApproved(consensus), reason: consensus.reason, consensus };
      }
      case "Human": {
        const approval = await this.human(request, describeRequest(request), signal);
        return { approved: approval.status === "Approved", reason: approvalReason(approval), approval };
      }
      case "SelfModification": {
        const consensus = await this.council(request, signal);
        if (!isApproved(consensus)) return { approved: false, reason: `council: ${consensus.reason}`, consensus };
        if (signal.aborted) return { approved: false, reason: WITHDRAWN, consensus };
        const approval = await this.human(request, `${describeRequest(request)}\n\n${synthesize(consensus)}`, signal);
        return { approved: approval.status === "Approved", reason: approvalReason(approval), consensus, approval };
      }
    }
  }

  private async council(request: DecisionRequest, signal: AbortSignal): Promise<ConsensusResult> {
    const consensus = deepFreeze(
      await deliberate(request, this.deps.sources, this.deps.config.council, this.deps, signal)
    );
    this.deps.bus.publish("CONSENSUS", consensus);
    return consensus;
  }

  private async human(request: DecisionRequest, body: string, signal: AbortSignal): Promise<ApprovalWaiter> {
    const subject =
      request.actionType === "self_modification"
        ? `Self-modification approval needed: ${request.id}`
        : `Approval needed: ${request.id}`;
    const urgent = request.actionType === "self_modification" || (request.amount ?? 0) > this.deps.config.policy.multiSigThreshold;
    const opened = await this.deps.approvals.open(request, { subject, body, priority: urgent ? "urgent" : "standard" });
    this.deps.bus.publish("APPROVALS", opened);
    const settled = await this.deps.approvals.wait(request.id, signal);
    this.deps.bus.publish("APPROVALS", settled);
    return settled;
  }
}
