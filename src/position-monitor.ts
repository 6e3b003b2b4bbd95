/**
 * Stablecoin Engine - Position Monitor
 * View-only monitoring without liquidation execution
 *
 * Accounts are discovered from CollateralDeposited events; debt-free
 * accounts are skipped. One account failing to value (stale feed, bad
 * price) does not stop the scan.
 */

import { ethers } from "ethers";
import { MIN_HEALTH_FACTOR } from "./constants";
import { moduleLogger } from "./logger";
import { PositionController } from "./position-controller";

const log = moduleLogger("monitor");

export interface CollateralHolding {
  token: string;
  symbol: string;
  amount: bigint;
  valueUsd: bigint;
}

export interface PositionInfo {
  address: string;
  debt: bigint;
  healthFactor: bigint;
  isLiquidatable: boolean;
  collateral: CollateralHolding[];
}

export interface PositionFailure {
  address: string;
  error: string;
}

export interface MonitorReport {
  /** Lowest health factor first */
  positions: PositionInfo[];
  failures: PositionFailure[];
  liquidatableCount: number;
}

export class PositionMonitor {
  constructor(private readonly engine: PositionController) {}

  /** Distinct depositors, in order of first deposit */
  scanAccounts(): string[] {
    const seen = new Set<string>();
    for (const event of this.engine.events.query({ name: "CollateralDeposited" })) {
      if (event.name === "CollateralDeposited") seen.add(event.user);
    }
    return [...seen];
  }

  inspect(address: string): PositionInfo | null {
    const debt = this.engine.getDebt(address);
    if (debt === 0n) {
      return null;
    }

    const collateral: CollateralHolding[] = [];
    for (const token of this.engine.getCollateralTokens()) {
      const amount = this.engine.getCollateralBalanceOfUser(address, token);
      if (amount > 0n) {
        collateral.push({
          token,
          symbol: this.engine.getCollateralToken(token).symbol,
          amount,
          valueUsd: this.engine.getUsdValue(token, amount),
        });
      }
    }

    const healthFactor = this.engine.getHealthFactor(address);
    return {
      address,
      debt,
      healthFactor,
      isLiquidatable: healthFactor < MIN_HEALTH_FACTOR,
      collateral,
    };
  }

  snapshot(addresses: string[] = this.scanAccounts()): MonitorReport {
    const positions: PositionInfo[] = [];
    const failures: PositionFailure[] = [];

    for (const address of addresses) {
      try {
        const position = this.inspect(address);
        if (position) positions.push(position);
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        log.error(`Error fetching position for ${address}: ${msg}`);
        failures.push({ address, error: msg });
      }
    }

    positions.sort((a, b) => (a.healthFactor < b.healthFactor ? -1 : a.healthFactor > b.healthFactor ? 1 : 0));
    const liquidatableCount = positions.filter((p) => p.isLiquidatable).length;

    for (const pos of positions) {
      const holdings = pos.collateral
        .map((c) => `${ethers.formatEther(c.amount)} ${c.symbol} ($${ethers.formatEther(c.valueUsd)})`)
        .join(", ");
      const level = pos.isLiquidatable ? "warn" : "debug";
      log.log(level, `${pos.address} HF=${formatHealthFactor(pos.healthFactor)} debt=${ethers.formatEther(pos.debt)} [${holdings}]`);
    }
    log.info(`SUMMARY: ${positions.length} active positions, ${liquidatableCount} liquidatable, ${failures.length} failed`);

    return { positions, failures, liquidatableCount };
  }
}

/** 1e18-scaled health factor as a decimal string; "∞" for debt-free accounts */
export function formatHealthFactor(healthFactor: bigint): string {
  if (healthFactor === ethers.MaxUint256) return "∞";
  return ethers.formatEther(healthFactor);
}
