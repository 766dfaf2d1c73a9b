import pino, { type LoggerOptions } from "pino";

/**
 * Logger Configuration
 *
 * Pino logger shared by the engine and the HTTP layer.
 * In development, it uses pino-pretty for human-readable logs.
 * In production, it outputs JSON logs suitable for log aggregation services.
 * Under test it is silent unless LOG_LEVEL says otherwise.
 */

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
type LogLevelName = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLevel(): LogLevelName {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  switch (process.env.NODE_ENV) {
    case "development":
      return "debug";
    case "test":
      return "silent";
    default:
      return "info";
  }
}

// Base configuration for all environments
const baseConfig: LoggerOptions = {
  level: resolveLevel(),
  redact: {
    paths: ["*.apiKey", "*.OPENAI_API_KEY", "*.GROQ_API_KEY", "req.headers.authorization"],
    censor: "[REDACTED]",
  },
};

// Development-specific configuration with pretty printing
const developmentConfig: LoggerOptions = {
  ...baseConfig,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  },
};

// Production-specific configuration optimized for log aggregation
const productionConfig: LoggerOptions = {
  ...baseConfig,
  base: {
    env: process.env.NODE_ENV,
    nodeVersion: process.version,
  },
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
};

export const logger = pino(
  process.env.NODE_ENV === "development" ? developmentConfig : productionConfig,
);

export default logger;
