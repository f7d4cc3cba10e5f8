import path from "path";
import { injectable } from "tsyringe";
import { AppError } from "../errors/AppError";
import { IConfig, LogLevel, NodeEnv } from "./IConfig";

const NODE_ENVS: readonly NodeEnv[] = ["development", "production", "test"];
const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

const DEFAULT_CORS_ORIGINS = [
  "http://localhost:5173",
  "http://localhost:4173",
];

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR", false);
    this.name = "ConfigError";
  }
}

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some((env) => env === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseInteger(
  name: string,
  raw: string | undefined,
  fallback: number,
): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`Invalid ${name}: ${raw}`);
  }
  return value;
}

/**
 * Environment-based configuration implementation
 *
 * Reads configuration from process.env and validates on startup
 */
@injectable()
export class EnvConfig implements IConfig {
  readonly port: number;
  readonly nodeEnv: NodeEnv;
  readonly corsOrigins: readonly string[];

  readonly logLevel: LogLevel;

  readonly dataDir: string;

  readonly enableRateLimiting: boolean;
  readonly rateLimitWindowMs: number;
  readonly rateLimitMax: number;

  constructor() {
    this.port = parseInteger("PORT", process.env.PORT, 3001);

    const nodeEnv = process.env.NODE_ENV || "development";
    if (!isNodeEnv(nodeEnv)) {
      throw new ConfigError(`Invalid NODE_ENV: ${nodeEnv}`);
    }
    this.nodeEnv = nodeEnv;

    const logLevel = (process.env.LOG_LEVEL || "info").toLowerCase();
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(`Invalid LOG_LEVEL: ${logLevel}`);
    }
    this.logLevel = logLevel;

    // src/shared/config -> <api package>/data, same depth from dist
    this.dataDir = process.env.DATA_DIR
      ? path.resolve(process.env.DATA_DIR)
      : path.resolve(__dirname, "..", "..", "..", "data");

    this.corsOrigins = process.env.CORS_ORIGINS
      ? process.env.CORS_ORIGINS.split(",")
          .map((origin) => origin.trim())
          .filter((origin) => origin.length > 0)
      : DEFAULT_CORS_ORIGINS;

    this.enableRateLimiting = process.env.ENABLE_RATE_LIMITING !== "false";
    this.rateLimitWindowMs = parseInteger(
      "RATE_LIMIT_WINDOW_MS",
      process.env.RATE_LIMIT_WINDOW_MS,
      15 * 60 * 1000,
    );
    this.rateLimitMax = parseInteger(
      "RATE_LIMIT_MAX",
      process.env.RATE_LIMIT_MAX,
      100,
    );

    this.validate();
  }

  validate(): void {
    if (this.port < 1 || this.port > 65535) {
      throw new ConfigError(`Invalid PORT: ${this.port}`);
    }

    if (this.rateLimitWindowMs < 1) {
      throw new ConfigError(
        `Invalid RATE_LIMIT_WINDOW_MS: ${this.rateLimitWindowMs}`,
      );
    }

    if (this.rateLimitMax < 1) {
      throw new ConfigError(`Invalid RATE_LIMIT_MAX: ${this.rateLimitMax}`);
    }
  }
}
