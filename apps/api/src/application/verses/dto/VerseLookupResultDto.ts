import { MorphologyInfo } from "../../../domain/morphology/entities/MorphologyInfo";

/**
 * Verse lookup response DTOs
 */

export interface TokenDto {
  gloss: string;
  greek: string;
  translit: string;
  strongs: string;
  rmac: string;
  rmacDesc: string | null;
  morph: MorphologyInfo | null;
  lexiconEntry: string | null;
}

export interface VerseDto {
  reference: string;
  tokens: TokenDto[];
}

export interface VerseLookupResultDto {
  verses: VerseDto[];
  /** Inputs that did not normalize, then normalized references with no data. */
  notFound: string[];
}
