import { formatUnits, parseUnits } from "viem";

/** Minor units per whole amount, as for USDC. */
export const AMOUNT_DECIMALS = 6;

/** Whole amount to integer minor units, rounded to six decimals. */
export function toUnits(amount: number): bigint {
  return parseUnits(amount.toFixed(AMOUNT_DECIMALS), AMOUNT_DECIMALS);
}

export function formatAmount(units: bigint): string {
  return formatUnits(units, AMOUNT_DECIMALS);
}
