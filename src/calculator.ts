/**
 * Stablecoin Engine - Calculator Utilities
 *
 * Pure fixed-point math for valuation, health factor and liquidation
 * seizure. Every division truncates toward zero; callers rely on that
 * for reproducible rounding.
 */

import {
  ADDITIONAL_FEED_PRECISION,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MAX_HEALTH_FACTOR,
  PRECISION,
} from "./constants";

/**
 * USD value of a collateral amount.
 * @param price   Feed answer, 8 decimals
 * @param amount  Collateral amount, 18 decimals
 * @returns USD value, 18 decimals
 */
export function calculateUsdValue(price: bigint, amount: bigint): bigint {
  return (price * ADDITIONAL_FEED_PRECISION * amount) / PRECISION;
}

/**
 * Collateral amount worth `usdAmount`; inverse of calculateUsdValue.
 * @param price      Feed answer, 8 decimals (must be positive)
 * @param usdAmount  USD value, 18 decimals
 */
export function calculateTokenAmountFromUsd(price: bigint, usdAmount: bigint): bigint {
  return (usdAmount * PRECISION) / (price * ADDITIONAL_FEED_PRECISION);
}

/**
 * Health factor scaled by 1e18 (1e18 = 1.0).
 * Only LIQUIDATION_THRESHOLD percent of the collateral counts.
 */
export function calculateHealthFactor(totalDebt: bigint, collateralValueUsd: bigint): bigint {
  if (totalDebt === 0n) return MAX_HEALTH_FACTOR;
  const collateralAdjustedForThreshold =
    (collateralValueUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return (collateralAdjustedForThreshold * PRECISION) / totalDebt;
}

/** Liquidator bonus on a base seizure amount */
export function calculateLiquidationBonus(baseAmount: bigint): bigint {
  return (baseAmount * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
}
