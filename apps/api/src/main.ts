/**
 * API Entry Point
 */

import "reflect-metadata"; // Must be first import for TSyringe
import "dotenv/config";
import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";

// Initialize DI container
import { container } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { ILogger } from "./infrastructure/logging/ILogger";
import { IBibleDataRepository } from "./domain/bible/repositories/IBibleDataRepository";

// Routes
import { createVersesRouter } from "./presentation/http/routes/verses.routes";
import { createLexiconRouter } from "./presentation/http/routes/lexicon.routes";
import { createMorphologyRouter } from "./presentation/http/routes/morphology.routes";

// Middleware
import { errorHandler } from "./presentation/http/middleware/ErrorHandler";
import { createApiLimiter } from "./presentation/http/middleware/RateLimit";

export function createApp(config: IConfig): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS
  app.use(cors({ origin: [...config.corsOrigins] }));

  // Access log
  if (config.nodeEnv !== "test") {
    app.use(morgan(config.nodeEnv === "production" ? "combined" : "dev"));
  }

  // Body parsing
  app.use(express.json());

  // Health check
  app.get("/health", (_req, res) => {
    res.type("text/plain").send("Healthy");
  });

  if (config.enableRateLimiting) {
    app.use("/api", createApiLimiter(config));
  }

  // API Routes
  app.use("/api/verses", createVersesRouter());
  app.use("/api/lexicon", createLexiconRouter());
  app.use("/api/morphology", createMorphologyRouter());

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not Found" });
  });

  // Centralized error handler (must be last)
  app.use(errorHandler);

  return app;
}

async function bootstrap() {
  // Get configuration and logger from DI container
  const config = container.resolve<IConfig>(TYPES.Config);
  const logger = container.resolve<ILogger>(TYPES.Logger);

  logger.info("Starting API server...");

  // Load datasets before accepting traffic
  const status = container
    .resolve<IBibleDataRepository>(TYPES.BibleDataRepository)
    .getStatus();
  if (!status.initialized) {
    logger.warn("Datasets did not load completely", { ...status });
  }

  const app = createApp(config);

  // Start server
  app.listen(config.port, () => {
    logger.info("API server started", {
      port: config.port,
      env: config.nodeEnv,
      dataDir: config.dataDir,
    });
  });
}

if (require.main === module) {
  bootstrap().catch((error) => {
    console.error("Failed to start server:", error);
    process.exit(1);
  });
}
