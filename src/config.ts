/**
 * Stablecoin Engine - Configuration
 *
 * Reads from environment variables with defaults. `loadConfigFromFile`
 * layers a dotenv file underneath the live environment; variables already
 * set in the environment win.
 */

import * as fs from "fs";
import * as dotenv from "dotenv";
import { ethers } from "ethers";
import { DEFAULT_ORACLE_TIMEOUT_SECONDS, FEED_DECIMALS } from "./constants";

export interface EngineConfig {
  /** production | staging | development | test */
  environment: string;
  /** winston level: error | warn | info | http | verbose | debug | silly */
  logLevel: string;
  /** Max age of a price round before reads fail */
  oracleTimeoutSeconds: bigint;
  /** Initial wETH/USD answer, 8 decimals */
  ethUsdPrice: bigint;
  /** Initial wBTC/USD answer, 8 decimals */
  btcUsdPrice: bigint;
  stableTokenName: string;
  stableTokenSymbol: string;
}

const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

type Env = Record<string, string | undefined>;

function parsePrice(raw: string | undefined, fallback: string, name: string): bigint {
  const value = raw || fallback;
  try {
    return ethers.parseUnits(value, FEED_DECIMALS);
  } catch {
    throw new Error(`${name} must be a decimal USD price, got "${value}"`);
  }
}

function parseSeconds(raw: string | undefined, fallback: bigint, name: string): bigint {
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a whole number of seconds, got "${raw}"`);
  }
  return BigInt(raw);
}

export function loadConfig(env: Env = process.env): EngineConfig {
  return {
    environment: env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL || "info",
    oracleTimeoutSeconds: parseSeconds(
      env.ORACLE_TIMEOUT_SECONDS,
      DEFAULT_ORACLE_TIMEOUT_SECONDS,
      "ORACLE_TIMEOUT_SECONDS",
    ),
    ethUsdPrice: parsePrice(env.ETH_USD_PRICE, "2000", "ETH_USD_PRICE"),
    btcUsdPrice: parsePrice(env.BTC_USD_PRICE, "1000", "BTC_USD_PRICE"),
    stableTokenName: env.STABLE_TOKEN_NAME ?? "Pegged USD",
    stableTokenSymbol: env.STABLE_TOKEN_SYMBOL ?? "pUSD",
  };
}

/** Config from a dotenv file, overridden by anything already in `env` */
export function loadConfigFromFile(path: string, env: Env = process.env): EngineConfig {
  const fromFile = dotenv.parse(fs.readFileSync(path));
  return loadConfig({ ...fromFile, ...env });
}

/**
 * Validate that the configuration can drive a deployment.
 * Throws on the first problem found.
 */
export function validateConfig(config: EngineConfig): void {
  if (config.oracleTimeoutSeconds <= 0n) {
    throw new Error("ORACLE_TIMEOUT_SECONDS must be > 0");
  }
  if (config.ethUsdPrice <= 0n) {
    throw new Error("ETH_USD_PRICE must be > 0");
  }
  if (config.btcUsdPrice <= 0n) {
    throw new Error("BTC_USD_PRICE must be > 0");
  }
  if (!LOG_LEVELS.includes(config.logLevel)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
  }
  if (!config.stableTokenName.trim() || !config.stableTokenSymbol.trim()) {
    throw new Error("STABLE_TOKEN_NAME and STABLE_TOKEN_SYMBOL must not be empty");
  }
}
