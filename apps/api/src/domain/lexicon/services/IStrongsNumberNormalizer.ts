/**
 * Canonicalizes Strong's numbers to an uppercase prefix and digits
 * without leading zeros, e.g. `g 0025` to `G25`.
 */
export interface IStrongsNumberNormalizer {
  tryNormalize(input: string | null | undefined): string | null;
  normalize(input: string | null | undefined): string;
  isValid(input: string | null | undefined): boolean;
}
