import { createLogger, format, transports } from "winston";

export const logger = createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.NODE_ENV === "test",
  format: format.combine(
    format.timestamp(),
    format.printf(({ timestamp, level, message, module: scope }) => {
      const prefix = typeof scope === "string" ? `[${scope}] ` : "";
      return `${timestamp} [${level.toUpperCase()}] ${prefix}${message}`;
    })
  ),
  transports: [new transports.Console()],
});

/** Scoped logger whose lines carry a `[module]` prefix */
export function moduleLogger(name: string) {
  return logger.child({ module: name });
}

/** Apply level and test-silencing from a loaded config */
export function configureLogger(options: { logLevel: string; environment: string }): void {
  logger.level = options.logLevel;
  logger.silent = options.environment === "test";
}
