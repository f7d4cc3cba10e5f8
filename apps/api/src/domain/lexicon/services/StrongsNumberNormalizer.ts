import { injectable } from "tsyringe";
import { InvalidStrongsNumberError } from "../../../shared/errors/DomainError";
import { IStrongsNumberNormalizer } from "./IStrongsNumberNormalizer";

const STRONGS_PATTERN = /^\s*([GH])\s*0*(\d+)\s*$/i;

@injectable()
export class StrongsNumberNormalizer implements IStrongsNumberNormalizer {
  tryNormalize(input: string | null | undefined): string | null {
    if (!input) {
      return null;
    }

    const match = STRONGS_PATTERN.exec(input);
    if (!match) {
      return null;
    }

    // "0*" is greedy but backtracks to leave one digit, so G000 yields G0
    return match[1].toUpperCase() + match[2];
  }

  /**
   * @throws InvalidStrongsNumberError
   */
  normalize(input: string | null | undefined): string {
    const normalized = this.tryNormalize(input);
    if (normalized === null) {
      throw new InvalidStrongsNumberError(input);
    }
    return normalized;
  }

  isValid(input: string | null | undefined): boolean {
    return this.tryNormalize(input) !== null;
  }
}

const sharedNormalizer = new StrongsNumberNormalizer();

export function normalizeStrongsNumber(
  input: string | null | undefined,
): string | null {
  return sharedNormalizer.tryNormalize(input);
}
