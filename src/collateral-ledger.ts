/**
 * Stablecoin Engine - Collateral Ledger
 *
 * Deposited quantity per (account, token). Accounts appear on first
 * credit and are never removed; a drained account simply reads zero.
 */

import { normalizeAddress } from "./address";
import { NotEnoughCollateralError } from "./errors";
import { StateJournal } from "./journal";

export class CollateralLedger {
  private readonly deposits = new Map<string, Map<string, bigint>>();

  constructor(private readonly journal: StateJournal) {}

  balanceOf(account: string, token: string): bigint {
    const byToken = this.deposits.get(normalizeAddress(account, "account"));
    return byToken?.get(normalizeAddress(token, "collateral token")) ?? 0n;
  }

  credit(account: string, token: string, amount: bigint): void {
    const user = normalizeAddress(account, "account");
    const asset = normalizeAddress(token, "collateral token");
    let byToken = this.deposits.get(user);
    if (!byToken) {
      byToken = new Map();
      this.journal.setEntry(this.deposits, user, byToken);
    }
    this.journal.setEntry(byToken, asset, (byToken.get(asset) ?? 0n) + amount);
  }

  /** @throws NotEnoughCollateralError if the account holds less than `amount` */
  debit(account: string, token: string, amount: bigint): void {
    const user = normalizeAddress(account, "account");
    const asset = normalizeAddress(token, "collateral token");
    const available = this.balanceOf(user, asset);
    if (available < amount) {
      throw new NotEnoughCollateralError(user, asset, available, amount);
    }
    const byToken = this.deposits.get(user);
    if (byToken) {
      this.journal.setEntry(byToken, asset, available - amount);
    }
  }

  /** Every account that has ever held collateral */
  accounts(): string[] {
    return [...this.deposits.keys()];
  }
}
