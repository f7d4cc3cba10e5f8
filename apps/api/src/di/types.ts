/**
 * Dependency Injection Types/Tokens
 *
 * All injectable dependencies are registered here using symbols
 * to avoid string-based injection which is error-prone
 */

export const TYPES = {
  // Configuration
  Config: Symbol.for("Config"),

  // Logging
  Logger: Symbol.for("Logger"),
  PinoInstance: Symbol.for("PinoInstance"),

  // Repositories
  BibleDataRepository: Symbol.for("BibleDataRepository"),

  // Domain Services
  RmacParser: Symbol.for("RmacParser"),
  VerseReferenceNormalizer: Symbol.for("VerseReferenceNormalizer"),
  StrongsNumberNormalizer: Symbol.for("StrongsNumberNormalizer"),

  // Use Cases
  LookupVersesUseCase: Symbol.for("LookupVersesUseCase"),
  GetDatasetStatusUseCase: Symbol.for("GetDatasetStatusUseCase"),
  GetLexiconEntryUseCase: Symbol.for("GetLexiconEntryUseCase"),
  ParseMorphologyUseCase: Symbol.for("ParseMorphologyUseCase"),
} as const;

export type DITypes = typeof TYPES;
