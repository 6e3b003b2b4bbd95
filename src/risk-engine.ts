/**
 * Stablecoin Engine - Risk Engine
 *
 * Read-only valuation over the ledgers. Nothing here is cached: every
 * call reads the live feed, so an account can become liquidatable between
 * two calls without any ledger change.
 */

import { AssetRegistry } from "./asset-registry";
import {
  calculateHealthFactor,
  calculateLiquidationBonus,
  calculateTokenAmountFromUsd,
  calculateUsdValue,
} from "./calculator";
import { CollateralLedger } from "./collateral-ledger";
import { MIN_HEALTH_FACTOR } from "./constants";
import { DebtLedger } from "./debt-ledger";
import { InvalidPriceError } from "./errors";
import { PriceReader } from "./oracle";
import { AccountInformation, LiquidationSeizure } from "./types";

export class RiskEngine {
  constructor(
    private readonly registry: AssetRegistry,
    private readonly collateral: CollateralLedger,
    private readonly debt: DebtLedger,
    private readonly priceReader: PriceReader,
  ) {}

  /**
   * Latest feed answer for `token`, 8 decimals.
   * @throws StalePriceError, InvalidPriceError, NotAllowedTokenError
   */
  priceOf(token: string): bigint {
    const feed = this.registry.priceFeedOf(token);
    const { answer } = this.priceReader.read(feed);
    if (answer <= 0n) {
      throw new InvalidPriceError(feed.address, answer);
    }
    return answer;
  }

  usdValue(token: string, amount: bigint): bigint {
    return calculateUsdValue(this.priceOf(token), amount);
  }

  tokenAmountFromUsd(token: string, usdAmount: bigint): bigint {
    return calculateTokenAmountFromUsd(this.priceOf(token), usdAmount);
  }

  /** Sum over every allowed asset; reads every feed even for empty balances */
  totalCollateralUsdValue(account: string): bigint {
    let total = 0n;
    for (const token of this.registry.allowedAssets()) {
      total += this.usdValue(token, this.collateral.balanceOf(account, token));
    }
    return total;
  }

  accountInformation(account: string): AccountInformation {
    return {
      totalDebt: this.debt.debtOf(account),
      collateralValueUsd: this.totalCollateralUsdValue(account),
    };
  }

  healthFactor(account: string): bigint {
    const { totalDebt, collateralValueUsd } = this.accountInformation(account);
    return calculateHealthFactor(totalDebt, collateralValueUsd);
  }

  isLiquidatable(account: string): boolean {
    return this.healthFactor(account) < MIN_HEALTH_FACTOR;
  }

  /**
   * Collateral owed to a liquidator repaying `debtToCover`. Base and bonus
   * are floored separately. Not checked against the account's holdings.
   */
  liquidationSeizure(token: string, debtToCover: bigint): LiquidationSeizure {
    const baseAmount = this.tokenAmountFromUsd(token, debtToCover);
    const bonusAmount = calculateLiquidationBonus(baseAmount);
    return { baseAmount, bonusAmount, totalAmount: baseAmount + bonusAmount };
  }
}
