export * from "./address";
export * from "./asset-registry";
export * from "./calculator";
export * from "./clock";
export * from "./collateral-ledger";
export * from "./collateral-token";
export * from "./config";
export * from "./constants";
export * from "./debt-ledger";
export * from "./deploy";
export * from "./errors";
export * from "./event-log";
export * from "./journal";
export { logger, moduleLogger, configureLogger } from "./logger";
export * from "./oracle";
export * from "./position-controller";
export * from "./position-monitor";
export * from "./price-feed";
export * from "./risk-engine";
export * from "./stable-token";
export * from "./token-ledger";
export * from "./types";
