/**
 * Stablecoin Engine - Oracle Reader
 *
 * Wraps feed reads with the staleness bound. A stale feed aborts the
 * calling operation, which freezes everything that needs a valuation
 * until the feed reports again.
 */

import { Clock, systemClock } from "./clock";
import { DEFAULT_ORACLE_TIMEOUT_SECONDS } from "./constants";
import { StalePriceError } from "./errors";
import { PriceFeed, RoundData } from "./price-feed";

export interface PriceReader {
  read(feed: PriceFeed): RoundData;
}

/**
 * Whether a round last updated at `updatedAt` is past the bound.
 * A read exactly at the bound is still fresh.
 */
export function isStale(updatedAt: bigint, now: bigint, timeoutSeconds: bigint): boolean {
  if (updatedAt === 0n) return true;
  return now - updatedAt > timeoutSeconds;
}

export class StaleCheckedPriceReader implements PriceReader {
  constructor(
    private readonly clock: Clock = systemClock,
    readonly timeoutSeconds: bigint = DEFAULT_ORACLE_TIMEOUT_SECONDS,
  ) {}

  read(feed: PriceFeed): RoundData {
    const round = feed.latestRoundData();
    const now = this.clock.now();
    // An answer carried over from an older round is as good as stale
    if (round.answeredInRound < round.roundId || isStale(round.updatedAt, now, this.timeoutSeconds)) {
      throw new StalePriceError(feed.address, round.updatedAt, now);
    }
    return round;
  }
}
