/**
 * Dataset records as stored in `verses.json` and `lexicon.json`.
 */

export interface TokenRecord {
  readonly gloss: string;
  readonly greek: string;
  readonly translit: string;
  readonly strongs: string;
  readonly rmac: string;
  /** Human-readable description of `rmac`, carried by the dataset. */
  readonly rmac_desc?: string | null;
}

export interface VerseData {
  readonly tokens: readonly TokenRecord[];
}

/** Canonical reference (`Matt.1.1`) to verse. */
export type VerseDataset = Readonly<Record<string, VerseData>>;

/** Canonical Strong's number (`G976`) to definition. */
export type LexiconDataset = Readonly<Record<string, string>>;

export interface DatasetStatus {
  readonly initialized: boolean;
  readonly versesCount: number;
  readonly lexiconCount: number;
}
