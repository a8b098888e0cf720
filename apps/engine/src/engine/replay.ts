import type { AuditEntry, Verdict } from "@tiergate/shared";
import type { AuditLog } from "../audit/auditLog.js";
import { computeEntryHash } from "../audit/hashChain.js";
import { computeConsensus, isApproved } from "../council/consensus.js";
import { CONSTRAINT_RULES } from "../policy/policyGate.js";
import { classify } from "../tiers/classifier.js";
import { WITHDRAWN } from "./decisionEngine.js";

export type ReplayReport = {
  entryId: string;
  requestId: string;
  ok: boolean;
  mismatches: string[];
};

function tierApproval(entry: AuditEntry): boolean {
  const councilOk = entry.consensus ? isApproved(entry.consensus) : false;
  const humanOk = entry.approval?.status === "Approved";
  switch (entry.tier) {
    case "Autonomous":
      return true;
    case "Council":
      return councilOk;
    case "Human":
      return humanOk;
    case "SelfModification":
      return councilOk && humanOk;
  }
}

/**
 * Recomputes tier, consensus outcome and policy outcome from what the entry
 * itself recorded, and reports every place the stored result disagrees.
 */
export function replayEntry(entry: AuditEntry): ReplayReport {
  const mismatches: string[] = [];
  const { hash, ...unhashed } = entry;
  if (computeEntryHash(unhashed) !== hash) mismatches.push("hash does not match entry contents");

  const tier = classify(entry.request, entry.tierBasis);
  if (tier !== entry.tier) mismatches.push(`tier: recorded ${entry.tier}, recomputed ${tier}`);

  const c = entry.consensus;
  if (c) {
    const again = computeConsensus({
      requestId: c.requestId,
      opinions: c.opinions,
      requestedSources: c.requestedSources,
      failures: c.failures,
      rule: { threshold: c.thresholdUsed, quorum: c.quorum, chairmanId: c.chairmanId },
      startedAt: c.startedAt,
      finalizedAt: c.finalizedAt,
    });
    if (again.outcome !== c.outcome) mismatches.push(`consensus: recorded ${c.outcome}, recomputed ${again.outcome}`);
    if (again.tieBreak?.vote !== c.tieBreak?.vote) mismatches.push("consensus: tie-break vote differs");
  } else if (entry.tier === "Council" || entry.tier === "SelfModification") {
    mismatches.push(`consensus missing for ${entry.tier} tier`);
  }

  const p = entry.policy;
  if (p) {
    for (const e of p.evaluated) {
      if (e.skipped) continue;
      if (CONSTRAINT_RULES[e.constraint](e.inputs) !== e.passed) mismatches.push(`policy: ${e.constraint} recorded ${e.passed}`);
    }
    const firstFailed = p.evaluated.find((e) => !e.passed);
    if (p.passed !== (firstFailed === undefined)) mismatches.push("policy: overall result disagrees with constraints");
    if (firstFailed && p.violation?.constraint !== firstFailed.constraint) mismatches.push("policy: violation names the wrong constraint");

    const gateInput = p.evaluated.find((e) => e.constraint === "verdict_not_approved")?.inputs.approved;
    const derived = tierApproval(entry);
    if (gateInput === true && !derived) mismatches.push("policy gate saw an approval the tier did not give");
    if (gateInput === false && derived && entry.verdict.reason !== WITHDRAWN) {
      mismatches.push("policy gate saw a rejection the tier did not give");
    }
    if (entry.verdict.approved !== p.passed) mismatches.push(`verdict: recorded ${entry.verdict.approved}, policy says ${p.passed}`);
  } else if (entry.verdict.approved) {
    mismatches.push("approved verdict without a policy check");
  }

  return { entryId: entry.entryId, requestId: entry.requestId, ok: mismatches.length === 0, mismatches };
}

/** Checks that a Verdict has its audit entry and that the two agree. */
export function verifyVerdict(verdict: Verdict, audit: AuditLog): ReplayReport {
  const entry = audit.get(verdict.auditEntryId);
  if (!entry) {
    return {
      entryId: verdict.auditEntryId,
      requestId: verdict.requestId,
      ok: false,
      mismatches: ["no audit entry for verdict"],
    };
  }
  const report = replayEntry(entry);
  const extra: string[] = [];
  if (entry.requestId !== verdict.requestId) extra.push("verdict: request id differs from audit entry");
  if (entry.tier !== verdict.tier) extra.push("verdict: tier differs from audit entry");
  if (entry.verdict.approved !== verdict.approved) extra.push("verdict: approval differs from audit entry");
  if (entry.verdict.reason !== verdict.reason) extra.push("verdict: reason differs from audit entry");
  const mismatches = [...report.mismatches, ...extra];
  return { ...report, ok: mismatches.length === 0, mismatches };
}
