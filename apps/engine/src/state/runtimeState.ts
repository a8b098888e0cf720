import type { Tier, Verdict } from "@tiergate/shared";

export type RuntimeState = {
  ok: boolean;
  serverTime: string;
  startedAt: string;
  inFlight: number;
  pendingApprovals: number;
  decisions: {
    total: number;
    approved: number;
    rejected: number;
    byTier: Record<Tier, number>;
  };
  lastVerdict?: Verdict;
  lastVerdictAt?: string;
};

export function createRuntimeState(now: string): RuntimeState {
  return {
    ok: true,
    serverTime: now,
    startedAt: now,
    inFlight: 0,
    pendingApprovals: 0,
    decisions: {
      total: 0,
      approved: 0,
      rejected: 0,
      byTier: { Autonomous: 0, Council: 0, Human: 0, SelfModification: 0 },
    },
  };
}

export function recordVerdict(state: RuntimeState, verdict: Verdict, now: string): void {
  state.decisions.total += 1;
  if (verdict.approved) state.decisions.approved += 1;
  else state.decisions.rejected += 1;
  state.decisions.byTier[verdict.tier] += 1;
  state.lastVerdict = verdict;
  state.lastVerdictAt = now;
}

export function updateRuntimeState(state: RuntimeState, patch: Partial<RuntimeState>, now: string): RuntimeState {
  return Object.assign(state, patch, { serverTime: now, ok: true });
}
