import "reflect-metadata";
import { container, instanceCachingFactory } from "tsyringe";
import pino from "pino";
import { TYPES } from "./types";

// Configuration
import { IConfig } from "../shared/config/IConfig";
import { EnvConfig } from "../shared/config/EnvConfig";

// Logging
import { ILogger } from "../infrastructure/logging/ILogger";
import { PinoLogger } from "../infrastructure/logging/PinoLogger";
import { createPinoInstance } from "../infrastructure/logging/createPinoInstance";

// Persistence
import { IBibleDataRepository } from "../domain/bible/repositories/IBibleDataRepository";
import { JsonBibleDataRepository } from "../infrastructure/persistence/json/JsonBibleDataRepository";

// Domain Services
import { IRmacParser } from "../domain/morphology/services/IRmacParser";
import { RmacParser } from "../domain/morphology/services/RmacParser";
import { IVerseReferenceNormalizer } from "../domain/references/services/IVerseReferenceNormalizer";
import { VerseReferenceNormalizer } from "../domain/references/services/VerseReferenceNormalizer";
import { IStrongsNumberNormalizer } from "../domain/lexicon/services/IStrongsNumberNormalizer";
import { StrongsNumberNormalizer } from "../domain/lexicon/services/StrongsNumberNormalizer";

// Use Cases
import { LookupVersesUseCase } from "../application/verses/use-cases/LookupVersesUseCase";
import { GetDatasetStatusUseCase } from "../application/verses/use-cases/GetDatasetStatusUseCase";
import { GetLexiconEntryUseCase } from "../application/lexicon/use-cases/GetLexiconEntryUseCase";
import { ParseMorphologyUseCase } from "../application/morphology/use-cases/ParseMorphologyUseCase";

/**
 * Dependency Injection Container Configuration
 *
 * Registers all dependencies and their implementations
 */
export class DIContainer {
  static initialize(): void {
    // Configuration
    container.registerSingleton<IConfig>(TYPES.Config, EnvConfig);

    // Logging
    container.register<pino.Logger>(TYPES.PinoInstance, {
      useFactory: instanceCachingFactory((c) =>
        createPinoInstance(c.resolve<IConfig>(TYPES.Config)),
      ),
    });
    container.register<ILogger>(TYPES.Logger, {
      useClass: PinoLogger,
    });

    // Repositories (datasets are loaded once per process)
    container.registerSingleton<IBibleDataRepository>(
      TYPES.BibleDataRepository,
      JsonBibleDataRepository,
    );

    // Domain Services
    container.registerSingleton<IRmacParser>(TYPES.RmacParser, RmacParser);
    container.registerSingleton<IVerseReferenceNormalizer>(
      TYPES.VerseReferenceNormalizer,
      VerseReferenceNormalizer,
    );
    container.registerSingleton<IStrongsNumberNormalizer>(
      TYPES.StrongsNumberNormalizer,
      StrongsNumberNormalizer,
    );

    // Use Cases
    container.register(TYPES.LookupVersesUseCase, {
      useClass: LookupVersesUseCase,
    });
    container.register(TYPES.GetDatasetStatusUseCase, {
      useClass: GetDatasetStatusUseCase,
    });
    container.register(TYPES.GetLexiconEntryUseCase, {
      useClass: GetLexiconEntryUseCase,
    });
    container.register(TYPES.ParseMorphologyUseCase, {
      useClass: ParseMorphologyUseCase,
    });
  }

  static getContainer() {
    return container;
  }
}

// Initialize container on module load
DIContainer.initialize();

export { container };
