/**
 * Stablecoin Engine - Pegged Token
 *
 * Supply changes only through a MintAuthority capability handed over at
 * construction. The engine holds it; nobody else can mint or burn.
 */

import { normalizeAddress, ZERO_ADDRESS } from "./address";
import {
  BurnAmountExceedsBalanceError,
  MustBeMoreThanZeroError,
  UnauthorizedMinterError,
  ZeroAddressError,
} from "./errors";
import { TokenLedger, TokenLedgerOptions } from "./token-ledger";

/** Unforgeable mint/burn right. `holder` is the account whose balance `burn` draws on. */
export class MintAuthority {
  readonly holder: string;

  constructor(holder: string) {
    this.holder = normalizeAddress(holder, "mint authority holder");
  }
}

export interface StableTokenOptions extends TokenLedgerOptions {
  authority: MintAuthority;
}

export class StableToken extends TokenLedger {
  private readonly authority: MintAuthority;

  constructor(options: StableTokenOptions) {
    super(options);
    this.authority = options.authority;
  }

  /** Account allowed to mint and burn */
  get minter(): string {
    return this.authority.holder;
  }

  mint(authority: MintAuthority, to: string, amount: bigint): boolean {
    this.requireAuthority(authority);
    if (normalizeAddress(to, "recipient") === ZERO_ADDRESS) {
      throw new ZeroAddressError("recipient");
    }
    if (amount <= 0n) {
      throw new MustBeMoreThanZeroError();
    }
    this.mintTo(to, amount);
    return true;
  }

  /** Burn from the authority holder's own balance */
  burn(authority: MintAuthority, amount: bigint): void {
    this.requireAuthority(authority);
    if (amount <= 0n) {
      throw new MustBeMoreThanZeroError();
    }
    const balance = this.balanceOf(authority.holder);
    if (balance < amount) {
      throw new BurnAmountExceedsBalanceError(balance, amount);
    }
    this.burnFrom(authority.holder, amount);
  }

  private requireAuthority(authority: MintAuthority): void {
    if (authority !== this.authority) {
      throw new UnauthorizedMinterError(this.address);
    }
  }
}
