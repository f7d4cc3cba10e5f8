/**
 * Canonicalizes free-form verse citations to `Book.Chapter.Verse`.
 */
export interface IVerseReferenceNormalizer {
  /** Returns `null` when the input is not a recognizable reference. */
  tryNormalize(input: string | null | undefined): string | null;
  /** Throws `InvalidReferenceError` when the input is not recognizable. */
  normalize(input: string | null | undefined): string;
  isValid(input: string | null | undefined): boolean;
}
