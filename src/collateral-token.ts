import { TokenLedger } from "./token-ledger";

/**
 * Collateral asset with an open faucet, for local deployments and tests.
 * Production collateral lives on its own ledger; the engine only needs
 * the CustodyToken surface.
 */
export class CollateralToken extends TokenLedger {
  mint(to: string, amount: bigint): void {
    this.mintTo(to, amount);
  }
}
