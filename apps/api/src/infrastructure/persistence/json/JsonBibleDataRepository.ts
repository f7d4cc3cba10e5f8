import fs from "fs";
import path from "path";
import { inject, injectable } from "tsyringe";
import { z } from "zod";
import { TYPES } from "../../../di/types";
import {
  DatasetStatus,
  LexiconDataset,
  VerseData,
  VerseDataset,
} from "../../../domain/bible/entities/VerseData";
import { IBibleDataRepository } from "../../../domain/bible/repositories/IBibleDataRepository";
import { IConfig } from "../../../shared/config/IConfig";
import { ILogger } from "../../logging/ILogger";
import { lexiconDatasetSchema, verseDatasetSchema } from "./datasetSchemas";

export const VERSES_FILE = "verses.json";
export const LEXICON_FILE = "lexicon.json";

interface LoadedDatasets {
  verses: ReadonlyMap<string, VerseData>;
  lexicon: ReadonlyMap<string, string>;
  initialized: boolean;
}

/**
 * JSON file implementation of IBibleDataRepository
 *
 * Reads both datasets from the configured data directory on first use
 * and keeps them in memory. A file that is missing or fails validation
 * is logged and leaves its dataset empty; the repository then reports
 * itself as not initialized.
 */
@injectable()
export class JsonBibleDataRepository implements IBibleDataRepository {
  private readonly logger: ILogger;
  private datasets: LoadedDatasets | null = null;

  constructor(
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ component: "JsonBibleDataRepository" });
  }

  findVerse(reference: string): VerseData | null {
    return this.load().verses.get(reference) ?? null;
  }

  findDefinition(strongsNumber: string): string | null {
    return this.load().lexicon.get(strongsNumber) ?? null;
  }

  getStatus(): DatasetStatus {
    const { verses, lexicon, initialized } = this.load();
    return {
      initialized,
      versesCount: verses.size,
      lexiconCount: lexicon.size,
    };
  }

  private load(): LoadedDatasets {
    if (this.datasets) {
      return this.datasets;
    }

    const verses = this.readDataset<VerseDataset>(
      VERSES_FILE,
      verseDatasetSchema,
      "verses",
    );
    const lexicon = this.readDataset<LexiconDataset>(
      LEXICON_FILE,
      lexiconDatasetSchema,
      "lexicon entries",
    );

    this.datasets = {
      verses: new Map(verses ? Object.entries(verses) : []),
      lexicon: new Map(lexicon ? Object.entries(lexicon) : []),
      initialized: verses !== null && lexicon !== null,
    };

    return this.datasets;
  }

  private readDataset<T extends object>(
    fileName: string,
    schema: z.ZodType<T>,
    label: string,
  ): T | null {
    const filePath = path.join(this.config.dataDir, fileName);

    if (!fs.existsSync(filePath)) {
      this.logger.warn("Dataset file not found", { filePath });
      return null;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      const result = schema.safeParse(raw);

      if (!result.success) {
        this.logger.error(
          "Dataset file failed validation",
          result.error,
          { filePath, issues: result.error.issues.length },
        );
        return null;
      }

      this.logger.info(`Loaded ${label}`, {
        filePath,
        count: Object.keys(result.data).length,
      });
      return result.data;
    } catch (error) {
      this.logger.error(
        "Failed to read dataset file",
        error instanceof Error ? error : new Error(String(error)),
        { filePath },
      );
      return null;
    }
  }
}
