import type { MintAuthority } from "./stable-token";

/** What the engine needs from a collateral asset: custody in and out */
export interface CustodyToken {
  readonly address: string;
  readonly symbol: string;
  balanceOf(account: string): bigint;
  transfer(from: string, to: string, amount: bigint): boolean;
  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean;
}

/** What the engine needs from the pegged token */
export interface PeggedToken extends CustodyToken {
  mint(authority: MintAuthority, to: string, amount: bigint): boolean;
  burn(authority: MintAuthority, amount: bigint): void;
}

export interface AccountInformation {
  /** Pegged-token debt, 18 decimals */
  totalDebt: bigint;
  /** Collateral value in USD, 18 decimals */
  collateralValueUsd: bigint;
}

export interface LiquidationSeizure {
  /** Collateral worth exactly the repaid debt */
  baseAmount: bigint;
  /** Liquidator bonus on top of the base */
  bonusAmount: bigint;
  totalAmount: bigint;
}
