/**
 * Stablecoin Engine - Risk Parameters
 *
 * Fixed-point scaling and liquidation parameters. All USD values and
 * health factors carry 18 decimals; price feeds report 8.
 */

import { ethers } from "ethers";

/** 18-decimal fixed-point unit */
export const PRECISION = 10n ** 18n;

/** Lifts an 8-decimal feed answer to 18 decimals */
export const ADDITIONAL_FEED_PRECISION = 10n ** 10n;

/** Decimals reported by every collateral price feed */
export const FEED_DECIMALS = 8;

/** Share of collateral value counted toward the health factor (50 = 200% over-collateralized) */
export const LIQUIDATION_THRESHOLD = 50n;

/** Denominator for LIQUIDATION_THRESHOLD and LIQUIDATION_BONUS */
export const LIQUIDATION_PRECISION = 100n;

/** Extra collateral paid to a liquidator, in percent of the repaid value */
export const LIQUIDATION_BONUS = 10n;

/** Health factor 1.0 */
export const MIN_HEALTH_FACTOR = PRECISION;

/** Health factor of an account without debt */
export const MAX_HEALTH_FACTOR = ethers.MaxUint256;

/** Oracle staleness bound: 3 hours */
export const DEFAULT_ORACLE_TIMEOUT_SECONDS = 3n * 60n * 60n;

export interface RiskParameters {
  precision: bigint;
  additionalFeedPrecision: bigint;
  liquidationThreshold: bigint;
  liquidationPrecision: bigint;
  liquidationBonus: bigint;
  minHealthFactor: bigint;
}

export const RISK_PARAMETERS: Readonly<RiskParameters> = Object.freeze({
  precision: PRECISION,
  additionalFeedPrecision: ADDITIONAL_FEED_PRECISION,
  liquidationThreshold: LIQUIDATION_THRESHOLD,
  liquidationPrecision: LIQUIDATION_PRECISION,
  liquidationBonus: LIQUIDATION_BONUS,
  minHealthFactor: MIN_HEALTH_FACTOR,
});
