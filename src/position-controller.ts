/**
 * Stablecoin Engine - Position Controller
 *
 * The only writer of the collateral and debt ledgers. Every public
 * operation:
 *   1. rejects reentrant entry (the guard spans the whole call, including
 *      the token transfers made after the ledgers change)
 *   2. validates input before touching state
 *   3. mutates the ledgers, then checks the resulting health factor
 *   4. moves tokens / mints / burns
 * inside one journal scope, so a failure at any step undoes all of them.
 *
 * Usage:
 *   const engine = new PositionController({ registry, stableToken, authority, priceReader, journal });
 *   weth.approve(user, engine.address, amount);
 *   engine.connect(user).depositAndMint(weth.address, amount, debt);
 */

import { ethers } from "ethers";
import { normalizeAddress } from "./address";
import { AssetRegistry } from "./asset-registry";
import { calculateHealthFactor } from "./calculator";
import { CollateralLedger } from "./collateral-ledger";
import { MIN_HEALTH_FACTOR, RISK_PARAMETERS, RiskParameters } from "./constants";
import { DebtLedger } from "./debt-ledger";
import {
  BreaksHealthFactorError,
  HealthFactorNotImprovedError,
  HealthFactorOkError,
  MintFailedError,
  MustBeMoreThanZeroError,
  ReentrantCallError,
  TransferFailedError,
} from "./errors";
import { EventLog } from "./event-log";
import { StateJournal } from "./journal";
import { moduleLogger } from "./logger";
import { PriceReader } from "./oracle";
import { PriceFeed } from "./price-feed";
import { RiskEngine } from "./risk-engine";
import { MintAuthority } from "./stable-token";
import { AccountInformation, CustodyToken, LiquidationSeizure, PeggedToken } from "./types";

const log = moduleLogger("engine");

export interface PositionControllerOptions {
  registry: AssetRegistry;
  stableToken: PeggedToken;
  /** Mint capability of `stableToken`; its holder is the engine's custody address */
  authority: MintAuthority;
  priceReader: PriceReader;
  journal: StateJournal;
}

/** Operations bound to one caller, as returned by `connect` */
export interface PositionSession {
  readonly account: string;
  depositCollateral(token: string, amount: bigint): void;
  mintDebt(amount: bigint): void;
  depositAndMint(token: string, collateralAmount: bigint, mintAmount: bigint): void;
  redeemCollateral(token: string, amount: bigint): void;
  burnDebt(amount: bigint): void;
  redeemAndBurn(token: string, collateralAmount: bigint, burnAmount: bigint): void;
  liquidate(token: string, account: string, debtToCover: bigint): LiquidationSeizure;
}

function requireMoreThanZero(amount: bigint, label = "amount"): void {
  if (amount <= 0n) throw new MustBeMoreThanZeroError(label);
}

function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

export class PositionController {
  /** Custody address: holds deposited collateral and burns repaid debt */
  readonly address: string;
  readonly events: EventLog;

  private readonly registry: AssetRegistry;
  private readonly stableToken: PeggedToken;
  private readonly authority: MintAuthority;
  private readonly journal: StateJournal;
  private readonly collateral: CollateralLedger;
  private readonly debt: DebtLedger;
  private readonly risk: RiskEngine;

  private activeOperation: string | null = null;

  constructor(options: PositionControllerOptions) {
    this.registry = options.registry;
    this.stableToken = options.stableToken;
    this.authority = options.authority;
    this.journal = options.journal;
    this.address = options.authority.holder;
    this.collateral = new CollateralLedger(this.journal);
    this.debt = new DebtLedger(this.journal);
    this.events = new EventLog(this.journal);
    this.risk = new RiskEngine(this.registry, this.collateral, this.debt, options.priceReader);
  }

  connect(caller: string): PositionSession {
    const account = normalizeAddress(caller, "caller");
    return {
      account,
      depositCollateral: (token, amount) => this.depositCollateral(account, token, amount),
      mintDebt: (amount) => this.mintDebt(account, amount),
      depositAndMint: (token, collateralAmount, mintAmount) =>
        this.depositAndMint(account, token, collateralAmount, mintAmount),
      redeemCollateral: (token, amount) => this.redeemCollateral(account, token, amount),
      burnDebt: (amount) => this.burnDebt(account, amount),
      redeemAndBurn: (token, collateralAmount, burnAmount) =>
        this.redeemAndBurn(account, token, collateralAmount, burnAmount),
      liquidate: (token, user, debtToCover) => this.liquidate(account, token, user, debtToCover),
    };
  }

  // ============================================================
  //                     MUTATING OPERATIONS
  // ============================================================

  /** Lock `amount` of `token`; the caller must have approved the engine */
  depositCollateral(caller: string, token: string, amount: bigint): void {
    this.execute("depositCollateral", caller, (sender) => {
      this.deposit(sender, token, amount);
    });
  }

  mintDebt(caller: string, amount: bigint): void {
    this.execute("mintDebt", caller, (sender) => {
      this.mint(sender, amount);
    });
  }

  depositAndMint(caller: string, token: string, collateralAmount: bigint, mintAmount: bigint): void {
    this.execute("depositAndMint", caller, (sender) => {
      this.deposit(sender, token, collateralAmount);
      this.mint(sender, mintAmount);
    });
  }

  redeemCollateral(caller: string, token: string, amount: bigint): void {
    this.execute("redeemCollateral", caller, (sender) => {
      requireMoreThanZero(amount);
      this.requireAllowed(token);
      this.redeem(token, amount, sender, sender);
      this.requireHealthy(sender);
    });
  }

  /** Repay debt with the caller's own tokens; the caller must have approved the engine */
  burnDebt(caller: string, amount: bigint): void {
    this.execute("burnDebt", caller, (sender) => {
      requireMoreThanZero(amount);
      this.burn(amount, sender, sender);
    });
  }

  /** Burn first so the redeem is checked against the reduced debt */
  redeemAndBurn(caller: string, token: string, collateralAmount: bigint, burnAmount: bigint): void {
    this.execute("redeemAndBurn", caller, (sender) => {
      requireMoreThanZero(collateralAmount, "collateral amount");
      requireMoreThanZero(burnAmount, "burn amount");
      this.requireAllowed(token);
      this.burn(burnAmount, sender, sender);
      this.redeem(token, collateralAmount, sender, sender);
      this.requireHealthy(sender);
    });
  }

  /**
   * Repay `debtToCover` of `account`'s debt with the caller's tokens and
   * receive collateral worth the repaid value plus LIQUIDATION_BONUS percent.
   * Partial liquidation is allowed as long as the account's health factor
   * strictly improves and the caller stays healthy.
   */
  liquidate(caller: string, token: string, account: string, debtToCover: bigint): LiquidationSeizure {
    return this.execute("liquidate", caller, (sender) => {
      requireMoreThanZero(debtToCover, "debt to cover");
      this.requireAllowed(token);
      const user = normalizeAddress(account, "account");

      const startingHealthFactor = this.risk.healthFactor(user);
      if (startingHealthFactor >= MIN_HEALTH_FACTOR) {
        throw new HealthFactorOkError(user, startingHealthFactor);
      }

      const seizure = this.risk.liquidationSeizure(token, debtToCover);
      this.burn(debtToCover, user, sender);
      this.redeem(token, seizure.totalAmount, user, sender);

      const endingHealthFactor = this.risk.healthFactor(user);
      if (endingHealthFactor <= startingHealthFactor) {
        throw new HealthFactorNotImprovedError(user, startingHealthFactor, endingHealthFactor);
      }
      this.requireHealthy(sender);

      log.info(
        `Liquidated ${user}: repaid ${ethers.formatEther(debtToCover)}, ` +
          `seized ${ethers.formatEther(seizure.totalAmount)} ${this.registry.tokenOf(token).symbol} ` +
          `(bonus ${ethers.formatEther(seizure.bonusAmount)}) for ${sender}`,
      );
      return seizure;
    });
  }

  // ============================================================
  //                     READS
  // ============================================================

  getAccountInformation(account: string): AccountInformation {
    return this.risk.accountInformation(account);
  }

  getAccountCollateralValue(account: string): bigint {
    return this.risk.totalCollateralUsdValue(account);
  }

  getHealthFactor(account: string): bigint {
    return this.risk.healthFactor(account);
  }

  isLiquidatable(account: string): boolean {
    return this.risk.isLiquidatable(account);
  }

  calculateHealthFactor(totalDebt: bigint, collateralValueUsd: bigint): bigint {
    return calculateHealthFactor(totalDebt, collateralValueUsd);
  }

  getUsdValue(token: string, amount: bigint): bigint {
    return this.risk.usdValue(token, amount);
  }

  getTokenAmountFromUsd(token: string, usdAmount: bigint): bigint {
    return this.risk.tokenAmountFromUsd(token, usdAmount);
  }

  getLiquidationSeizure(token: string, debtToCover: bigint): LiquidationSeizure {
    return this.risk.liquidationSeizure(token, debtToCover);
  }

  getCollateralBalanceOfUser(account: string, token: string): bigint {
    return this.collateral.balanceOf(account, token);
  }

  getDebt(account: string): bigint {
    return this.debt.debtOf(account);
  }

  getTotalDebt(): bigint {
    return this.debt.totalDebt();
  }

  /** Every account that has deposited collateral or minted debt */
  getAccounts(): string[] {
    return [...new Set([...this.collateral.accounts(), ...this.debt.accounts()])];
  }

  getCollateralTokens(): string[] {
    return this.registry.allowedAssets();
  }

  getCollateralToken(token: string): CustodyToken {
    return this.registry.tokenOf(token);
  }

  getCollateralTokenPriceFeed(token: string): PriceFeed {
    return this.registry.priceFeedOf(token);
  }

  getStableToken(): PeggedToken {
    return this.stableToken;
  }

  getRiskParameters(): RiskParameters {
    return { ...RISK_PARAMETERS };
  }

  // ============================================================
  //                     INTERNAL STEPS
  // ============================================================

  private execute<T>(operation: string, caller: string, body: (sender: string) => T): T {
    if (this.activeOperation !== null) {
      throw new ReentrantCallError(operation, this.activeOperation);
    }
    const sender = normalizeAddress(caller, "caller");
    this.activeOperation = operation;
    try {
      const result = this.journal.atomic(() => body(sender));
      log.debug(`${operation} by ${sender} committed`);
      return result;
    } catch (err) {
      log.warn(`${operation} by ${sender} rolled back: ${describeError(err)}`);
      throw err;
    } finally {
      this.activeOperation = null;
    }
  }

  private deposit(sender: string, token: string, amount: bigint): void {
    requireMoreThanZero(amount);
    const collateralToken = this.requireAllowed(token);
    this.collateral.credit(sender, collateralToken.address, amount);
    this.events.emit({ name: "CollateralDeposited", user: sender, token: collateralToken.address, amount });
    if (!collateralToken.transferFrom(this.address, sender, this.address, amount)) {
      throw new TransferFailedError(collateralToken.address);
    }
  }

  private mint(sender: string, amount: bigint): void {
    requireMoreThanZero(amount);
    this.debt.increase(sender, amount);
    this.requireHealthy(sender);
    if (!this.stableToken.mint(this.authority, sender, amount)) {
      throw new MintFailedError(sender, amount);
    }
  }

  private redeem(token: string, amount: bigint, from: string, to: string): void {
    const collateralToken = this.registry.tokenOf(token);
    this.collateral.debit(from, collateralToken.address, amount);
    this.events.emit({
      name: "CollateralRedeemed",
      redeemedFrom: from,
      redeemedTo: to,
      token: collateralToken.address,
      amount,
    });
    if (!collateralToken.transfer(this.address, to, amount)) {
      throw new TransferFailedError(collateralToken.address);
    }
  }

  /** Reduce `onBehalfOf`'s debt with tokens pulled from `payer`, then burn them */
  private burn(amount: bigint, onBehalfOf: string, payer: string): void {
    this.debt.decrease(onBehalfOf, amount);
    if (!this.stableToken.transferFrom(this.address, payer, this.address, amount)) {
      throw new TransferFailedError(this.stableToken.address);
    }
    this.stableToken.burn(this.authority, amount);
  }

  /** @throws NotAllowedTokenError for unregistered and malformed identifiers alike */
  private requireAllowed(token: string): CustodyToken {
    return this.registry.tokenOf(token);
  }

  private requireHealthy(account: string): void {
    const healthFactor = this.risk.healthFactor(account);
    if (healthFactor < MIN_HEALTH_FACTOR) {
      throw new BreaksHealthFactorError(account, healthFactor);
    }
  }
}
