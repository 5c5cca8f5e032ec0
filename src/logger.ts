import winston from "winston";

export type Logger = winston.Logger;

export type LogFormat = "json" | "pretty";

export interface LoggerOptions {
  level?: string;
  format?: LogFormat;
  silent?: boolean;
}

const SERVICE_NAME = "repo-compliance-engine";

function resolveFormat(format: LogFormat): winston.Logform.Format {
  const base = [winston.format.timestamp(), winston.format.errors({ stack: true })];

  if (format === "pretty") {
    return winston.format.combine(
      ...base,
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaText = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
        return `${String(timestamp)} [${level}] ${String(message)}${metaText}`;
      })
    );
  }

  return winston.format.combine(...base, winston.format.json());
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  const format: LogFormat = options.format ?? (process.env.LOG_FORMAT === "pretty" ? "pretty" : "json");

  return winston.createLogger({
    level,
    silent: options.silent ?? false,
    format: resolveFormat(format),
    defaultMeta: { service: SERVICE_NAME },
    transports: [new winston.transports.Console()]
  });
}

/**
 * Logger that drops everything; the default for components constructed without one.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })]
  });
}

export function componentLogger(logger: Logger | undefined, component: string): Logger {
  return (logger ?? createSilentLogger()).child({ component });
}
