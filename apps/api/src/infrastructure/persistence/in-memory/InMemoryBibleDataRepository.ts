import {
  DatasetStatus,
  VerseData,
} from "../../../domain/bible/entities/VerseData";
import { IBibleDataRepository } from "../../../domain/bible/repositories/IBibleDataRepository";

/**
 * In-memory implementation of IBibleDataRepository for testing
 *
 * Seeded programmatically instead of from dataset files
 */
export class InMemoryBibleDataRepository implements IBibleDataRepository {
  private verses: Map<string, VerseData> = new Map();
  private lexicon: Map<string, string> = new Map();
  private initialized = true;

  findVerse(reference: string): VerseData | null {
    return this.verses.get(reference) ?? null;
  }

  findDefinition(strongsNumber: string): string | null {
    return this.lexicon.get(strongsNumber) ?? null;
  }

  getStatus(): DatasetStatus {
    return {
      initialized: this.initialized,
      versesCount: this.verses.size,
      lexiconCount: this.lexicon.size,
    };
  }

  // Test helper methods
  addVerse(reference: string, verse: VerseData): void {
    this.verses.set(reference, verse);
  }

  addDefinition(strongsNumber: string, definition: string): void {
    this.lexicon.set(strongsNumber, definition);
  }

  setInitialized(initialized: boolean): void {
    this.initialized = initialized;
  }

  clear(): void {
    this.verses.clear();
    this.lexicon.clear();
    this.initialized = true;
  }
}
