/**
 * Configuration interface
 *
 * Defines all configuration values needed by the application.
 * Implementations can come from environment variables, files, or config services.
 */

export type NodeEnv = "development" | "production" | "test";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export interface IConfig {
  // Server
  readonly port: number;
  readonly nodeEnv: NodeEnv;
  readonly corsOrigins: readonly string[];

  // Logging
  readonly logLevel: LogLevel;

  // Datasets
  readonly dataDir: string;

  // Features
  readonly enableRateLimiting: boolean;
  readonly rateLimitWindowMs: number;
  readonly rateLimitMax: number;

  // Validation
  validate(): void;
}
