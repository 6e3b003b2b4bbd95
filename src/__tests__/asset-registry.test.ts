import { AssetRegistry } from "../asset-registry";
import { CollateralToken } from "../collateral-token";
import {
  ArrayLengthMismatchError,
  DuplicateCollateralError,
  NotAllowedTokenError,
  UnsupportedFeedDecimalsError,
} from "../errors";
import { StateJournal } from "../journal";
import { MockPriceFeed } from "../price-feed";

const journal = new StateJournal();
const weth = new CollateralToken({ address: "0x" + "a1".repeat(20), name: "Wrapped Ether", symbol: "WETH", journal });
const wbtc = new CollateralToken({ address: "0x" + "a2".repeat(20), name: "Wrapped Bitcoin", symbol: "WBTC", journal });
const ethFeed = new MockPriceFeed({ address: "0x" + "f1".repeat(20), description: "ETH / USD", initialAnswer: 2000_00000000n });
const btcFeed = new MockPriceFeed({ address: "0x" + "f2".repeat(20), description: "BTC / USD", initialAnswer: 1000_00000000n });

describe("AssetRegistry", () => {
  it("should pair each token with its feed in registration order", () => {
    const registry = new AssetRegistry([weth, wbtc], [ethFeed, btcFeed]);
    expect(registry.allowedAssets()).toEqual([weth.address, wbtc.address]);
    expect(registry.priceFeedOf(wbtc.address)).toBe(btcFeed);
    expect(registry.tokenOf(weth.address.toLowerCase())).toBe(weth);
  });

  it("should reject lists of different length", () => {
    expect(() => new AssetRegistry([weth, wbtc], [ethFeed])).toThrow(ArrayLengthMismatchError);
  });

  it("should reject a token listed twice", () => {
    expect(() => new AssetRegistry([weth, weth], [ethFeed, btcFeed])).toThrow(DuplicateCollateralError);
  });

  it("should accept an empty registry", () => {
    expect(new AssetRegistry([], []).allowedAssets()).toEqual([]);
  });

  it("should reject lookups of unregistered tokens", () => {
    const registry = new AssetRegistry([weth], [ethFeed]);
    expect(registry.isAllowed(wbtc.address)).toBe(false);
    expect(() => registry.priceFeedOf(wbtc.address)).toThrow(NotAllowedTokenError);
  });

  it("should report malformed identifiers as not allowed", () => {
    const registry = new AssetRegistry([weth], [ethFeed]);
    expect(registry.isAllowed("bogus")).toBe(false);
    expect(registry.isAllowed("")).toBe(false);
    expect(() => registry.tokenOf("bogus")).toThrow(NotAllowedTokenError);
  });

  it("should reject a feed that does not report 8 decimals", () => {
    const wideFeed = new MockPriceFeed({
      address: "0x" + "f3".repeat(20),
      description: "ETH / USD (18)",
      decimals: 18,
      initialAnswer: 2000n * 10n ** 18n,
    });
    expect(() => new AssetRegistry([weth, wbtc], [ethFeed, wideFeed])).toThrow(UnsupportedFeedDecimalsError);
    expect(() => new AssetRegistry([weth], [wideFeed])).toThrow(
      `Price feed ${wideFeed.address} reports 18 decimals, expected 8`,
    );
  });

  it("should return a copy of the asset list", () => {
    const registry = new AssetRegistry([weth], [ethFeed]);
    registry.allowedAssets().push(wbtc.address);
    expect(registry.allowedAssets()).toEqual([weth.address]);
  });
});
