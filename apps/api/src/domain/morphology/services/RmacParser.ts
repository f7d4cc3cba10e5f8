import { injectable } from "tsyringe";
import {
  createMorphology,
  MorphologyInfo,
  withOverrides,
} from "../entities/MorphologyInfo";
import {
  CASES,
  DEPONENT_FLAG,
  DEPONENT_VOICES,
  FINITE_MOODS,
  FLAGS,
  GENDERS,
  INFINITIVE_CODE,
  NUMBERS,
  PART_OF_SPEECH,
  PARTICIPLE_CODE,
  PERSONS,
  SIMPLE_TYPES,
  TENSES,
  VOICES,
} from "../tables/RmacTables";
import { IRmacParser } from "./IRmacParser";

function charAt<T>(
  table: ReadonlyMap<string, T>,
  segment: string,
  index: number,
): T | null {
  return table.get(segment.charAt(index)) ?? null;
}

function flagsFrom(segment: string | undefined): string[] {
  const flag = segment === undefined ? undefined : FLAGS.get(segment);
  return flag === undefined ? [] : [flag];
}

/**
 * RMAC parser
 *
 * Dispatches on the shape of the code, first match wins:
 * indeclinable types, adverbs, verbs, personal pronouns, then other
 * nominals. Unknown characters inside a recognized layout decode to
 * `null`; only an unknown part of speech (or a verb/pronoun modifier
 * that is too short) fails the whole code.
 */
@injectable()
export class RmacParser implements IRmacParser {
  parse(code: string | null | undefined): MorphologyInfo | null {
    if (code === null || code === undefined) {
      return null;
    }

    const normalized = code.trim().toUpperCase();
    if (normalized.length === 0) {
      return null;
    }

    const parts = normalized.split("-");

    if (SIMPLE_TYPES.has(parts[0])) {
      return createMorphology({
        pos: PART_OF_SPEECH.get(parts[0]),
        flags: flagsFrom(parts[1]),
      });
    }

    if (normalized.startsWith("ADV")) {
      return createMorphology({ pos: "Adverb", flags: flagsFrom(parts[1]) });
    }

    if (normalized.startsWith("V-")) {
      return this.parseVerb(parts);
    }

    if (normalized.startsWith("P-")) {
      return this.parsePersonalPronoun(parts);
    }

    return this.parseNominal(parts);
  }

  isValid(code: string | null | undefined): boolean {
    return this.parse(code) !== null;
  }

  /** `V-<tense><voice><form>[-<person/number or case/number/gender>]` */
  private parseVerb(parts: string[]): MorphologyInfo | null {
    const modifiers = parts[1] ?? "";
    if (modifiers.length < 3) {
      return null;
    }

    const secondary = modifiers.charAt(0) === "2" && modifiers.length >= 4;
    const tenseKey = secondary ? modifiers.slice(0, 2) : modifiers.charAt(0);
    const voiceIndex = secondary ? 2 : 1;
    const voiceCode = modifiers.charAt(voiceIndex);
    const formCode = modifiers.charAt(voiceIndex + 1);

    const base = createMorphology({
      pos: "Verb",
      tense: TENSES.get(tenseKey),
      voice: VOICES.get(voiceCode),
      flags: DEPONENT_VOICES.has(voiceCode) ? [DEPONENT_FLAG] : [],
    });

    if (formCode === INFINITIVE_CODE) {
      return withOverrides(base, { verbForm: "Infinitive" });
    }

    const inflection = parts[2] ?? "";

    if (formCode === PARTICIPLE_CODE) {
      return withOverrides(base, {
        verbForm: "Participle",
        case: charAt(CASES, inflection, 0),
        number: charAt(NUMBERS, inflection, 1),
        gender: charAt(GENDERS, inflection, 2),
      });
    }

    return withOverrides(base, {
      verbForm: "Finite",
      mood: FINITE_MOODS.get(formCode),
      person: charAt(PERSONS, inflection, 0),
      number: charAt(NUMBERS, inflection, 1),
    });
  }

  /**
   * `P-<person><case>[<number>]` for first and second person,
   * `P-<case>[<number>][<gender>]` with third person implied.
   */
  private parsePersonalPronoun(parts: string[]): MorphologyInfo | null {
    const modifiers = parts[1] ?? "";
    if (modifiers.length < 2) {
      return null;
    }

    const flags = flagsFrom(parts[2]);
    const person = charAt(PERSONS, modifiers, 0);

    if (person !== null) {
      return createMorphology({
        pos: "PersonalPronoun",
        person,
        case: charAt(CASES, modifiers, 1),
        number: charAt(NUMBERS, modifiers, 2),
        flags,
      });
    }

    return createMorphology({
      pos: "PersonalPronoun",
      person: "Third",
      case: charAt(CASES, modifiers, 0),
      number: charAt(NUMBERS, modifiers, 1),
      gender: charAt(GENDERS, modifiers, 2),
      flags,
    });
  }

  private parseNominal(parts: string[]): MorphologyInfo | null {
    if (parts.length < 2) {
      return null;
    }

    const pos = PART_OF_SPEECH.get(parts[0]);
    if (pos === undefined) {
      return null;
    }

    const inflection = parts[1];
    return createMorphology({
      pos,
      case: charAt(CASES, inflection, 0),
      number: charAt(NUMBERS, inflection, 1),
      gender: charAt(GENDERS, inflection, 2),
      flags: flagsFrom(parts[2]),
    });
  }
}

const sharedParser = new RmacParser();

export function parseMorphology(
  code: string | null | undefined,
): MorphologyInfo | null {
  return sharedParser.parse(code);
}
