/**
 * Stablecoin Engine - Error Types
 *
 * Three families, each aborting the whole call:
 *   InputValidationError: rejected before any mutation
 *   InvariantViolationError: detected after a tentative mutation
 *   CollaboratorError: raised by a token or price feed
 */

export abstract class StablecoinError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export abstract class InputValidationError extends StablecoinError {}
export abstract class InvariantViolationError extends StablecoinError {}
export abstract class CollaboratorError extends StablecoinError {}

// ============================================================
//                     INPUT VALIDATION
// ============================================================

export class ArrayLengthMismatchError extends InputValidationError {
  readonly code = "ARRAY_LENGTH_MISMATCH";

  constructor(
    public readonly tokenCount: number,
    public readonly priceFeedCount: number,
  ) {
    super(`Token and price feed lists differ in length: ${tokenCount} tokens, ${priceFeedCount} feeds`);
  }
}

export class DuplicateCollateralError extends InputValidationError {
  readonly code = "DUPLICATE_COLLATERAL";

  constructor(public readonly token: string) {
    super(`Collateral token ${token} is registered more than once`);
  }
}

export class UnsupportedFeedDecimalsError extends InputValidationError {
  readonly code = "UNSUPPORTED_FEED_DECIMALS";

  constructor(
    public readonly feed: string,
    public readonly decimals: number,
    public readonly expected: number,
  ) {
    super(`Price feed ${feed} reports ${decimals} decimals, expected ${expected}`);
  }
}

export class InvalidAddressError extends InputValidationError {
  readonly code = "INVALID_ADDRESS";

  constructor(
    public readonly label: string,
    public readonly value: string,
  ) {
    super(`${label} is not a valid address: ${value.slice(0, 48)}`);
  }
}

export class MustBeMoreThanZeroError extends InputValidationError {
  readonly code = "MUST_BE_MORE_THAN_ZERO";

  constructor(public readonly label = "amount") {
    super(`${label} must be more than zero`);
  }
}

export class NegativeAmountError extends InputValidationError {
  readonly code = "NEGATIVE_AMOUNT";

  constructor(
    public readonly label: string,
    public readonly amount: bigint,
  ) {
    super(`${label} must not be negative: ${amount}`);
  }
}

export class NotAllowedTokenError extends InputValidationError {
  readonly code = "NOT_ALLOWED_TOKEN";

  constructor(public readonly token: string) {
    super(`Token ${token} is not an allowed collateral`);
  }
}

export class ZeroAddressError extends InputValidationError {
  readonly code = "ZERO_ADDRESS";

  constructor(public readonly label: string) {
    super(`${label} must not be the zero address`);
  }
}

export class ReentrantCallError extends InputValidationError {
  readonly code = "REENTRANT_CALL";

  constructor(
    public readonly operation: string,
    public readonly activeOperation: string,
  ) {
    super(`Reentrant call to ${operation} while ${activeOperation} is executing`);
  }
}

// ============================================================
//                     INVARIANT VIOLATIONS
// ============================================================

export class BreaksHealthFactorError extends InvariantViolationError {
  readonly code = "BREAKS_HEALTH_FACTOR";

  constructor(
    public readonly account: string,
    public readonly healthFactor: bigint,
  ) {
    super(`Health factor of ${account} would drop to ${healthFactor}`);
  }
}

export class NotEnoughCollateralError extends InvariantViolationError {
  readonly code = "NOT_ENOUGH_COLLATERAL";

  constructor(
    public readonly account: string,
    public readonly token: string,
    public readonly available: bigint,
    public readonly requested: bigint,
  ) {
    super(`${account} holds ${available} of ${token}, cannot redeem ${requested}`);
  }
}

export class NotEnoughDebtError extends InvariantViolationError {
  readonly code = "NOT_ENOUGH_DEBT";

  constructor(
    public readonly account: string,
    public readonly currentDebt: bigint,
    public readonly requested: bigint,
  ) {
    super(`${account} owes ${currentDebt}, cannot burn ${requested}`);
  }
}

export class HealthFactorOkError extends InvariantViolationError {
  readonly code = "HEALTH_FACTOR_OK";

  constructor(
    public readonly account: string,
    public readonly healthFactor: bigint,
  ) {
    super(`${account} is not liquidatable (health factor ${healthFactor})`);
  }
}

export class HealthFactorNotImprovedError extends InvariantViolationError {
  readonly code = "HEALTH_FACTOR_NOT_IMPROVED";

  constructor(
    public readonly account: string,
    public readonly startingHealthFactor: bigint,
    public readonly endingHealthFactor: bigint,
  ) {
    super(
      `Liquidation of ${account} did not improve its health factor ` +
        `(${startingHealthFactor} -> ${endingHealthFactor})`,
    );
  }
}

// ============================================================
//                     COLLABORATOR FAILURES
// ============================================================

export class TransferFailedError extends CollaboratorError {
  readonly code = "TRANSFER_FAILED";

  constructor(public readonly token: string) {
    super(`Transfer of ${token} failed`);
  }
}

export class MintFailedError extends CollaboratorError {
  readonly code = "MINT_FAILED";

  constructor(
    public readonly to: string,
    public readonly amount: bigint,
  ) {
    super(`Stable token refused to mint ${amount} to ${to}`);
  }
}

export class StalePriceError extends CollaboratorError {
  readonly code = "STALE_PRICE";

  constructor(
    public readonly feed: string,
    public readonly updatedAt: bigint,
    public readonly now: bigint,
  ) {
    super(`Price feed ${feed} is stale (updated at ${updatedAt}, now ${now})`);
  }
}

export class InvalidPriceError extends CollaboratorError {
  readonly code = "INVALID_PRICE";

  constructor(
    public readonly feed: string,
    public readonly answer: bigint,
  ) {
    super(`Price feed ${feed} returned a non-positive answer: ${answer}`);
  }
}

export class InsufficientBalanceError extends CollaboratorError {
  readonly code = "INSUFFICIENT_BALANCE";

  constructor(
    public readonly token: string,
    public readonly account: string,
    public readonly balance: bigint,
    public readonly needed: bigint,
  ) {
    super(`${account} holds ${balance} of ${token}, needs ${needed}`);
  }
}

export class InsufficientAllowanceError extends CollaboratorError {
  readonly code = "INSUFFICIENT_ALLOWANCE";

  constructor(
    public readonly token: string,
    public readonly spender: string,
    public readonly allowance: bigint,
    public readonly needed: bigint,
  ) {
    super(`${spender} may spend ${allowance} of ${token}, needs ${needed}`);
  }
}

export class BurnAmountExceedsBalanceError extends CollaboratorError {
  readonly code = "BURN_AMOUNT_EXCEEDS_BALANCE";

  constructor(
    public readonly balance: bigint,
    public readonly amount: bigint,
  ) {
    super(`Cannot burn ${amount}, balance is ${balance}`);
  }
}

export class UnauthorizedMinterError extends CollaboratorError {
  readonly code = "UNAUTHORIZED_MINTER";

  constructor(public readonly token: string) {
    super(`Caller does not hold the mint authority of ${token}`);
  }
}
