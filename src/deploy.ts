/**
 * Stablecoin Engine - Local Deployment
 *
 * Wires a complete in-process system: two collateral tokens with their
 * USD feeds, the pegged token and the engine. Identities are derived the
 * way contract addresses are: from the deployer and a running nonce.
 *
 * Usage:
 *   const system = deployStablecoinSystem(loadConfig(), { deployer });
 *   system.weth.mint(user, ethers.parseEther("10"));
 */

import { ethers } from "ethers";
import { normalizeAddress } from "./address";
import { AssetRegistry } from "./asset-registry";
import { Clock, systemClock } from "./clock";
import { CollateralToken } from "./collateral-token";
import { EngineConfig, validateConfig } from "./config";
import { StateJournal } from "./journal";
import { configureLogger, moduleLogger } from "./logger";
import { StaleCheckedPriceReader } from "./oracle";
import { PositionController } from "./position-controller";
import { MockPriceFeed } from "./price-feed";
import { MintAuthority, StableToken } from "./stable-token";

const log = moduleLogger("deploy");

export interface DeployOptions {
  deployer: string;
  clock?: Clock;
}

export interface StablecoinSystem {
  journal: StateJournal;
  clock: Clock;
  weth: CollateralToken;
  wbtc: CollateralToken;
  wethUsdPriceFeed: MockPriceFeed;
  wbtcUsdPriceFeed: MockPriceFeed;
  stableToken: StableToken;
  engine: PositionController;
}

export function deployStablecoinSystem(config: EngineConfig, options: DeployOptions): StablecoinSystem {
  validateConfig(config);
  configureLogger(config);

  const deployer = normalizeAddress(options.deployer, "deployer");
  const clock = options.clock ?? systemClock;
  const journal = new StateJournal();

  let nonce = 0;
  const nextAddress = () => ethers.getCreateAddress({ from: deployer, nonce: nonce++ });

  const wethUsdPriceFeed = new MockPriceFeed({
    address: nextAddress(),
    description: "ETH / USD",
    initialAnswer: config.ethUsdPrice,
    clock,
  });
  const weth = new CollateralToken({ address: nextAddress(), name: "Wrapped Ether", symbol: "WETH", journal });

  const wbtcUsdPriceFeed = new MockPriceFeed({
    address: nextAddress(),
    description: "BTC / USD",
    initialAnswer: config.btcUsdPrice,
    clock,
  });
  const wbtc = new CollateralToken({ address: nextAddress(), name: "Wrapped Bitcoin", symbol: "WBTC", journal });

  // The engine is deployed after the token, so its address is known one nonce ahead
  const tokenAddress = nextAddress();
  const authority = new MintAuthority(nextAddress());
  const stableToken = new StableToken({
    address: tokenAddress,
    name: config.stableTokenName,
    symbol: config.stableTokenSymbol,
    authority,
    journal,
  });

  const engine = new PositionController({
    registry: new AssetRegistry([weth, wbtc], [wethUsdPriceFeed, wbtcUsdPriceFeed]),
    stableToken,
    authority,
    priceReader: new StaleCheckedPriceReader(clock, config.oracleTimeoutSeconds),
    journal,
  });

  log.info(
    `Deployed ${stableToken.symbol} ${stableToken.address} with engine ${engine.address} ` +
      `(WETH ${weth.address}, WBTC ${wbtc.address})`,
  );

  return { journal, clock, weth, wbtc, wethUsdPriceFeed, wbtcUsdPriceFeed, stableToken, engine };
}
