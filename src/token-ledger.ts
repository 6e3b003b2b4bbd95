/**
 * Stablecoin Engine - Fungible Token Ledger
 *
 * ERC-20 balance/allowance bookkeeping. Every check runs before the first
 * write, so a failed call leaves balances untouched even outside a journal
 * scope.
 */

import { ethers } from "ethers";
import { normalizeAddress, requireNonZeroAddress } from "./address";
import { InsufficientAllowanceError, InsufficientBalanceError, NegativeAmountError } from "./errors";
import { StateJournal } from "./journal";

export interface TokenLedgerOptions {
  address: string;
  name: string;
  symbol: string;
  decimals?: number;
  journal: StateJournal;
}

function requireUnsigned(amount: bigint): void {
  if (amount < 0n) throw new NegativeAmountError("amount", amount);
}

export class TokenLedger {
  readonly address: string;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  private supply = 0n;
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, Map<string, bigint>>();
  private readonly journal: StateJournal;

  constructor(options: TokenLedgerOptions) {
    this.address = normalizeAddress(options.address, `${options.symbol} token`);
    this.name = options.name;
    this.symbol = options.symbol;
    this.decimals = options.decimals ?? 18;
    this.journal = options.journal;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: string): bigint {
    return this.balances.get(normalizeAddress(account, "account")) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    const byOwner = this.allowances.get(normalizeAddress(owner, "owner"));
    return byOwner?.get(normalizeAddress(spender, "spender")) ?? 0n;
  }

  approve(owner: string, spender: string, amount: bigint): boolean {
    const from = requireNonZeroAddress(owner, "owner");
    const to = requireNonZeroAddress(spender, "spender");
    requireUnsigned(amount);
    let byOwner = this.allowances.get(from);
    if (!byOwner) {
      byOwner = new Map();
      this.journal.setEntry(this.allowances, from, byOwner);
    }
    this.journal.setEntry(byOwner, to, amount);
    return true;
  }

  transfer(from: string, to: string, amount: bigint): boolean {
    this.move(
      requireNonZeroAddress(from, "sender"),
      requireNonZeroAddress(to, "recipient"),
      amount,
    );
    return true;
  }

  /** Move `amount` from `from` to `to` on behalf of `spender`, consuming allowance */
  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean {
    const owner = requireNonZeroAddress(from, "sender");
    const recipient = requireNonZeroAddress(to, "recipient");
    const operator = normalizeAddress(spender, "spender");
    requireUnsigned(amount);

    const allowed = this.allowance(owner, operator);
    if (allowed < amount) {
      throw new InsufficientAllowanceError(this.address, operator, allowed, amount);
    }
    this.requireBalance(owner, amount);

    if (allowed !== ethers.MaxUint256) {
      this.approve(owner, operator, allowed - amount);
    }
    this.move(owner, recipient, amount);
    return true;
  }

  // ============================================================
  //                     SUPPLY (subclasses only)
  // ============================================================

  protected mintTo(to: string, amount: bigint): void {
    const recipient = requireNonZeroAddress(to, "recipient");
    requireUnsigned(amount);
    this.setSupply(this.supply + amount);
    this.journal.setEntry(this.balances, recipient, this.balanceOf(recipient) + amount);
  }

  protected burnFrom(from: string, amount: bigint): void {
    const owner = normalizeAddress(from, "account");
    requireUnsigned(amount);
    this.requireBalance(owner, amount);
    this.journal.setEntry(this.balances, owner, this.balanceOf(owner) - amount);
    this.setSupply(this.supply - amount);
  }

  private setSupply(value: bigint): void {
    const previous = this.supply;
    this.supply = value;
    this.journal.recordUndo(() => {
      this.supply = previous;
    });
  }

  private requireBalance(account: string, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new InsufficientBalanceError(this.address, account, balance, amount);
    }
  }

  private move(from: string, to: string, amount: bigint): void {
    requireUnsigned(amount);
    this.requireBalance(from, amount);
    this.journal.setEntry(this.balances, from, this.balanceOf(from) - amount);
    this.journal.setEntry(this.balances, to, this.balanceOf(to) + amount);
  }
}
