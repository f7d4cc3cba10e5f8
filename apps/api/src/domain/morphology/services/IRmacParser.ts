import { MorphologyInfo } from "../entities/MorphologyInfo";

/**
 * Decodes Robinson's Morphological Analysis Codes.
 *
 * `parse` returns `null` for codes it cannot read; it never throws.
 */
export interface IRmacParser {
  parse(code: string | null | undefined): MorphologyInfo | null;
  isValid(code: string | null | undefined): boolean;
}
