/**
 * Stablecoin Engine - Asset Registry
 *
 * Allowed collateral and the feed that prices each one. Fixed at
 * construction; iteration order is registration order. Valuation scales
 * answers by a fixed factor, so every feed must report FEED_DECIMALS.
 */

import { ethers } from "ethers";
import { normalizeAddress } from "./address";
import { FEED_DECIMALS } from "./constants";
import {
  ArrayLengthMismatchError,
  DuplicateCollateralError,
  NotAllowedTokenError,
  UnsupportedFeedDecimalsError,
} from "./errors";
import { PriceFeed } from "./price-feed";
import { CustodyToken } from "./types";

interface RegisteredAsset {
  token: CustodyToken;
  priceFeed: PriceFeed;
}

export class AssetRegistry {
  private readonly assets = new Map<string, RegisteredAsset>();
  private readonly order: string[] = [];

  constructor(tokens: readonly CustodyToken[], priceFeeds: readonly PriceFeed[]) {
    if (tokens.length !== priceFeeds.length) {
      throw new ArrayLengthMismatchError(tokens.length, priceFeeds.length);
    }
    tokens.forEach((token, i) => {
      const address = normalizeAddress(token.address, "collateral token");
      if (this.assets.has(address)) {
        throw new DuplicateCollateralError(address);
      }
      const priceFeed = priceFeeds[i];
      if (priceFeed.decimals !== FEED_DECIMALS) {
        throw new UnsupportedFeedDecimalsError(priceFeed.address, priceFeed.decimals, FEED_DECIMALS);
      }
      this.assets.set(address, { token, priceFeed });
      this.order.push(address);
    });
  }

  /** False for anything that is not a registered token, malformed identifiers included */
  isAllowed(token: string): boolean {
    return ethers.isAddress(token) && this.assets.has(ethers.getAddress(token));
  }

  /** Collateral token addresses in registration order */
  allowedAssets(): string[] {
    return [...this.order];
  }

  /** @throws NotAllowedTokenError */
  tokenOf(token: string): CustodyToken {
    return this.lookup(token).token;
  }

  /** @throws NotAllowedTokenError */
  priceFeedOf(token: string): PriceFeed {
    return this.lookup(token).priceFeed;
  }

  private lookup(token: string): RegisteredAsset {
    const entry = ethers.isAddress(token) ? this.assets.get(ethers.getAddress(token)) : undefined;
    if (!entry) {
      throw new NotAllowedTokenError(ethers.isAddress(token) ? ethers.getAddress(token) : token);
    }
    return entry;
  }
}
