import { DatasetStatus, VerseData } from "../entities/VerseData";

/**
 * Bible Data Repository Interface
 *
 * Read-only access to the verse and lexicon datasets. Keys are the
 * canonical forms produced by the reference and Strong's normalizers.
 */
export interface IBibleDataRepository {
  findVerse(reference: string): VerseData | null;
  findDefinition(strongsNumber: string): string | null;
  getStatus(): DatasetStatus;
}
