import { normalizeAddress } from "./address";
import { NotEnoughDebtError } from "./errors";
import { StateJournal } from "./journal";

/** Pegged-token debt minted per account */
export class DebtLedger {
  private readonly minted = new Map<string, bigint>();

  constructor(private readonly journal: StateJournal) {}

  debtOf(account: string): bigint {
    return this.minted.get(normalizeAddress(account, "account")) ?? 0n;
  }

  increase(account: string, amount: bigint): void {
    const user = normalizeAddress(account, "account");
    this.journal.setEntry(this.minted, user, this.debtOf(user) + amount);
  }

  /** @throws NotEnoughDebtError carrying the current debt */
  decrease(account: string, amount: bigint): void {
    const user = normalizeAddress(account, "account");
    const current = this.debtOf(user);
    if (current < amount) {
      throw new NotEnoughDebtError(user, current, amount);
    }
    this.journal.setEntry(this.minted, user, current - amount);
  }

  totalDebt(): bigint {
    let total = 0n;
    for (const debt of this.minted.values()) total += debt;
    return total;
  }

  accounts(): string[] {
    return [...this.minted.keys()];
  }
}
