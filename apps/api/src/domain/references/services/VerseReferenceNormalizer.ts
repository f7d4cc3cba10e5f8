import { injectable } from "tsyringe";
import { InvalidReferenceError } from "../../../shared/errors/DomainError";
import { resolveBook } from "../tables/BookAliases";
import { IVerseReferenceNormalizer } from "./IVerseReferenceNormalizer";

// [ordinal] book [sep] chapter sep verse
const VERSE_REFERENCE_PATTERN =
  /^\s*(?:(\d|I{1,3}|First|Second|Third)\s*)?([A-Za-z]+)[\s.]*(\d+)[\s:.-]+(\d+)\s*$/i;

const ORDINALS: ReadonlyMap<string, string> = new Map([
  ["I", "1"],
  ["FIRST", "1"],
  ["II", "2"],
  ["SECOND", "2"],
  ["III", "3"],
  ["THIRD", "3"],
]);

function canonicalOrdinal(prefix: string | undefined): string {
  if (prefix === undefined) {
    return "";
  }
  return ORDINALS.get(prefix.toUpperCase()) ?? prefix;
}

function stripLeadingZeros(digits: string): string {
  const stripped = digits.replace(/^0+/, "");
  return stripped.length > 0 ? stripped : "0";
}

@injectable()
export class VerseReferenceNormalizer implements IVerseReferenceNormalizer {
  tryNormalize(input: string | null | undefined): string | null {
    if (!input || input.trim().length === 0) {
      return null;
    }

    const match = VERSE_REFERENCE_PATTERN.exec(input);
    if (!match) {
      return null;
    }

    const [, prefix, bookWord, chapter, verse] = match;
    const book = resolveBook(canonicalOrdinal(prefix) + bookWord);
    if (book === null) {
      return null;
    }

    return `${book}.${stripLeadingZeros(chapter)}.${stripLeadingZeros(verse)}`;
  }

  normalize(input: string | null | undefined): string {
    const normalized = this.tryNormalize(input);
    if (normalized === null) {
      throw new InvalidReferenceError(input);
    }
    return normalized;
  }

  isValid(input: string | null | undefined): boolean {
    return this.tryNormalize(input) !== null;
  }
}

const sharedNormalizer = new VerseReferenceNormalizer();

export function normalizeVerseReference(
  input: string | null | undefined,
): string | null {
  return sharedNormalizer.tryNormalize(input);
}
