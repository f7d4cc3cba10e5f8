import { IConfig } from "../../shared/config/IConfig";

/**
 * Plain IConfig for unit tests that should not depend on process.env
 */
export function createTestConfig(overrides: Partial<IConfig> = {}): IConfig {
  return {
    port: 3001,
    nodeEnv: "test",
    corsOrigins: ["http://localhost:5173"],
    logLevel: "info",
    dataDir: "/nonexistent",
    enableRateLimiting: false,
    rateLimitWindowMs: 60_000,
    rateLimitMax: 100,
    validate: () => undefined,
    ...overrides,
  };
}
