import type { ActionType, DecisionRequest, Tier, TierBasis } from "@tiergate/shared";

export type TierThresholds = TierBasis;

/**
 * Assigns the authorization tier for a request. Pure: the same request and
 * thresholds always give the same tier, so an audit entry can be re-checked.
 *
 * - self_modification is always SelfModification, whatever the amount
 * - amount < autonomousBelow → Autonomous; amount <= humanAbove → Council; above → Human
 * - no amount → the action type's configured default, else Human
 */
export function classify(request: Pick<DecisionRequest, "actionType" | "amount">, tiers: TierThresholds): Tier {
  if (request.actionType === "self_modification") return "SelfModification";
  const { amount } = request;
  if (amount === undefined) return tiers.defaults[request.actionType] ?? "Human";
  if (amount < tiers.autonomousBelow) return "Autonomous";
  if (amount <= tiers.humanAbove) return "Council";
  return "Human";
}

/** True when a request without an amount has nowhere to go but the fallback. */
export function needsAmount(actionType: ActionType, tiers: TierThresholds): boolean {
  return actionType !== "self_modification" && tiers.defaults[actionType] === undefined;
}

export function tierBasis(tiers: TierThresholds): TierBasis {
  return {
    autonomousBelow: tiers.autonomousBelow,
    humanAbove: tiers.humanAbove,
    defaults: { ...tiers.defaults },
  };
}
