import { ethers } from "ethers";
import { ManualClock } from "../clock";
import { loadConfig } from "../config";
import { deployStablecoinSystem } from "../deploy";
import { DEPLOYER, deployTestSystem } from "./helpers";

describe("deployStablecoinSystem", () => {
  it("should derive every address from the deployer nonce", () => {
    const system = deployTestSystem();
    const at = (nonce: number) => ethers.getCreateAddress({ from: DEPLOYER, nonce });

    expect(system.wethUsdPriceFeed.address).toBe(at(0));
    expect(system.weth.address).toBe(at(1));
    expect(system.wbtcUsdPriceFeed.address).toBe(at(2));
    expect(system.wbtc.address).toBe(at(3));
    expect(system.stableToken.address).toBe(at(4));
    expect(system.engine.address).toBe(at(5));
  });

  it("should hand the mint authority to the engine", () => {
    const system = deployTestSystem();
    expect(system.stableToken.minter).toBe(system.engine.address);
  });

  it("should seed the feeds and token names from config", () => {
    const system = deployTestSystem({
      ETH_USD_PRICE: "3100",
      BTC_USD_PRICE: "65000",
      STABLE_TOKEN_NAME: "Test Dollar",
      STABLE_TOKEN_SYMBOL: "tUSD",
    });
    expect(system.wethUsdPriceFeed.latestRoundData().answer).toBe(310000000000n);
    expect(system.wbtcUsdPriceFeed.latestRoundData().answer).toBe(6500000000000n);
    expect(system.wethUsdPriceFeed.decimals).toBe(8);
    expect(system.stableToken.name).toBe("Test Dollar");
    expect(system.stableToken.symbol).toBe("tUSD");
  });

  it("should apply the configured oracle timeout", () => {
    const system = deployTestSystem({ ORACLE_TIMEOUT_SECONDS: "60" });
    system.manualClock.advance(61n);
    expect(() => system.engine.getUsdValue(system.weth.address, 1n)).toThrow("is stale");
  });

  it("should refuse an invalid config", () => {
    const config = { ...loadConfig({ NODE_ENV: "test" }), ethUsdPrice: 0n };
    expect(() => deployStablecoinSystem(config, { deployer: DEPLOYER, clock: new ManualClock() })).toThrow(
      "ETH_USD_PRICE must be > 0",
    );
  });

  it("should refuse a malformed deployer", () => {
    expect(() => deployStablecoinSystem(loadConfig({ NODE_ENV: "test" }), { deployer: "0xdead" })).toThrow(
      "deployer is not a valid address",
    );
  });
});
