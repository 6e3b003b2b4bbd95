/**
 * Stablecoin Engine - Price Feeds
 *
 * Chainlink AggregatorV3-shaped feeds. The engine only ever reads the
 * latest round through a PriceReader (see oracle.ts).
 */

import { Clock, systemClock } from "./clock";
import { normalizeAddress } from "./address";
import { FEED_DECIMALS } from "./constants";

export interface RoundData {
  roundId: bigint;
  /** Signed price, `decimals` decimal places */
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface PriceFeed {
  readonly address: string;
  readonly decimals: number;
  readonly description: string;
  latestRoundData(): RoundData;
}

export interface MockPriceFeedOptions {
  address: string;
  description: string;
  /** Initial answer, 8 decimals (e.g. 2000_00000000n = $2000) */
  initialAnswer: bigint;
  decimals?: number;
  clock?: Clock;
}

/**
 * In-process aggregator for deployments without a live oracle network.
 * Every `updateAnswer` opens a new round stamped with the clock.
 */
export class MockPriceFeed implements PriceFeed {
  readonly address: string;
  readonly decimals: number;
  readonly description: string;
  private readonly clock: Clock;
  private round: RoundData;

  constructor(options: MockPriceFeedOptions) {
    this.address = normalizeAddress(options.address, "price feed");
    this.decimals = options.decimals ?? FEED_DECIMALS;
    this.description = options.description;
    this.clock = options.clock ?? systemClock;
    const now = this.clock.now();
    this.round = {
      roundId: 1n,
      answer: options.initialAnswer,
      startedAt: now,
      updatedAt: now,
      answeredInRound: 1n,
    };
  }

  latestRoundData(): RoundData {
    return { ...this.round };
  }

  updateAnswer(answer: bigint): void {
    const now = this.clock.now();
    const roundId = this.round.roundId + 1n;
    this.round = { roundId, answer, startedAt: now, updatedAt: now, answeredInRound: roundId };
  }

  /** Write a raw round, e.g. to simulate an incomplete or stale answer */
  updateRoundData(round: RoundData): void {
    this.round = { ...round };
  }
}
