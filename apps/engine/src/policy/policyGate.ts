import { getAddress, isAddress } from "viem";
import type {
  Clock,
  ConstraintEvaluation,
  DecisionRequest,
  Logger,
  PolicyCheck,
  PolicyConstraint,
} from "@tiergate/shared";
import type { EngineConfig } from "../config.js";
import { KeyedLock } from "../util/asyncLock.js";
import type { SpendLedger } from "./spendLedger.js";
import { formatAmount, toUnits } from "./units.js";

export type PolicySettings = EngineConfig["policy"];

type Inputs = ConstraintEvaluation["inputs"];

export type PolicyInputs = {
  request: Pick<DecisionRequest, "actionType" | "amount" | "destination" | "signers">;
  tierApproved: boolean;
  /** Minor units already approved today and in the trailing week. */
  dailySpent: bigint;
  weeklySpent: bigint;
  settings: PolicySettings;
};

// Money inputs are recorded as decimal strings of minor units.
function units(inputs: Inputs, key: string): bigint | null {
  const v = inputs[key];
  return typeof v === "string" && /^\d+$/.test(v) ? BigInt(v) : null;
}

function num(inputs: Inputs, key: string): number {
  const v = inputs[key];
  return typeof v === "number" ? v : NaN;
}

function withinLimit(i: Inputs): boolean {
  const spent = units(i, "spent");
  const amount = units(i, "amount");
  const limit = units(i, "limit");
  return spent !== null && amount !== null && limit !== null && spent + amount <= limit;
}

/**
 * Pass condition of every constraint, written against the inputs recorded in
 * its evaluation so an audit entry can be re-checked on its own. Missing or
 * malformed inputs fail.
 */
export const CONSTRAINT_RULES: Record<PolicyConstraint, (inputs: Inputs) => boolean> = {
  verdict_not_approved: (i) => i.approved === true,
  whitelist_membership: (i) => i.listed === true,
  per_tx_limit: (i) => {
    const amount = units(i, "amount");
    const limit = units(i, "limit");
    return amount !== null && limit !== null && amount <= limit;
  },
  daily_limit: withinLimit,
  weekly_limit: withinLimit,
  multi_sig_required: (i) => {
    const amount = units(i, "amount");
    const threshold = units(i, "threshold");
    if (amount === null || threshold === null) return false;
    return amount <= threshold || num(i, "signers") >= num(i, "required");
  },
};

function recorded(value: bigint | null): string | null {
  return value === null ? null : value.toString();
}

function shown(inputs: Inputs, key: string): string {
  const v = units(inputs, key);
  return v === null ? "(none)" : formatAmount(v);
}

const POLICY_ORDER: PolicyConstraint[] = [
  "verdict_not_approved",
  "whitelist_membership",
  "per_tx_limit",
  "daily_limit",
  "weekly_limit",
  "multi_sig_required",
];

export function normalizeAddress(value: string): string | null {
  const trimmed = value.trim();
  return isAddress(trimmed, { strict: false }) ? getAddress(trimmed) : null;
}

type Prepared = { inputs: Inputs; skipped?: boolean };

function prepare(constraint: PolicyConstraint, p: PolicyInputs): Prepared {
  const { request, settings } = p;
  const amount = recorded(request.amount === undefined ? null : toUnits(request.amount));
  switch (constraint) {
    case "verdict_not_approved":
      return { inputs: { approved: p.tierApproved } };
    case "whitelist_membership": {
      const destination = request.destination ?? null;
      const skipped = request.actionType !== "spend" || settings.whitelist.length === 0;
      const normalized = destination === null ? null : normalizeAddress(destination);
      const listed =
        skipped || (normalized !== null && settings.whitelist.some((w) => normalizeAddress(w) === normalized));
      return { inputs: { destination: normalized ?? destination, whitelistSize: settings.whitelist.length, listed }, skipped };
    }
    case "per_tx_limit":
      return { inputs: { amount, limit: recorded(toUnits(settings.perTxLimit)) }, skipped: amount === null };
    case "daily_limit":
      return {
        inputs: { amount, spent: recorded(p.dailySpent), limit: recorded(toUnits(settings.dailyLimit)) },
        skipped: amount === null,
      };
    case "weekly_limit": {
      const limit = settings.weeklyLimit === undefined ? null : recorded(toUnits(settings.weeklyLimit));
      return { inputs: { amount, spent: recorded(p.weeklySpent), limit }, skipped: amount === null || limit === null };
    }
    case "multi_sig_required":
      return {
        inputs: {
          amount,
          threshold: recorded(toUnits(settings.multiSigThreshold)),
          required: settings.multiSigSigners,
          signers: new Set(request.signers ?? []).size,
        },
        skipped: amount === null,
      };
  }
}

function describeViolation(constraint: PolicyConstraint, inputs: Inputs): string {
  switch (constraint) {
    case "verdict_not_approved":
      return "verdict not approved";
    case "whitelist_membership":
      return `destination ${inputs.destination ?? "(none)"} is not whitelisted`;
    case "per_tx_limit":
      return `amount ${shown(inputs, "amount")} exceeds per-transaction limit ${shown(inputs, "limit")}`;
    case "daily_limit":
    case "weekly_limit": {
      const total = (units(inputs, "spent") ?? 0n) + (units(inputs, "amount") ?? 0n);
      const period = constraint === "daily_limit" ? "daily" : "weekly";
      return `${period} total ${formatAmount(total)} would exceed limit ${shown(inputs, "limit")}`;
    }
    case "multi_sig_required":
      return `amount ${shown(inputs, "amount")} above ${shown(inputs, "threshold")} needs ${inputs.required} signers, got ${inputs.signers}`;
  }
}

/**
 * Evaluates the constraints in order and stops at the first violation.
 * Constraints that do not apply to the request are recorded as skipped.
 */
export function evaluatePolicy(p: PolicyInputs): PolicyCheck {
  const evaluated: ConstraintEvaluation[] = [];
  for (const constraint of POLICY_ORDER) {
    const { inputs, skipped } = prepare(constraint, p);
    if (skipped) {
      evaluated.push({ constraint, passed: true, skipped: true, inputs });
      continue;
    }
    const passed = CONSTRAINT_RULES[constraint](inputs);
    evaluated.push({ constraint, passed, inputs });
    if (!passed) {
      return { passed: false, evaluated, violation: { constraint, message: describeViolation(constraint, inputs) } };
    }
  }
  return { passed: true, evaluated };
}

/** Last gate before execution. Check and reservation share one lock per action type. */
export class PolicyGate {
  private locks = new KeyedLock();

  constructor(
    private settings: PolicySettings,
    private ledger: SpendLedger,
    private env: { clock: Clock; log: Logger }
  ) {}

  async check(request: DecisionRequest, tierApproved: boolean): Promise<PolicyCheck> {
    if (!tierApproved) {
      return evaluatePolicy({ request, tierApproved, dailySpent: 0n, weeklySpent: 0n, settings: this.settings });
    }
    return this.locks.run(request.actionType, async () => {
      const nowMs = this.env.clock.nowMs();
      const check = evaluatePolicy({
        request,
        tierApproved,
        dailySpent: this.ledger.dailyTotal(request.actionType, nowMs),
        weeklySpent: this.ledger.weeklyTotal(request.actionType, nowMs),
        settings: this.settings,
      });
      if (!check.passed) {
        this.env.log.warn(`policy blocked ${request.id}: ${check.violation?.message ?? "unknown"}`);
        return check;
      }
      if (request.amount === undefined || request.amount === 0) return check;
      const reservationId = this.ledger.reserve(request.actionType, toUnits(request.amount), nowMs);
      return { ...check, reservationId };
    });
  }

  release(reservationId: string): boolean {
    const released = this.ledger.release(reservationId);
    if (released) this.env.log.info(`policy reservation ${reservationId} released`);
    return released;
  }
}
