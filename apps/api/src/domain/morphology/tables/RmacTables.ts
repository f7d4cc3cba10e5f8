import {
  Gender,
  GrammaticalCase,
  GrammaticalNumber,
  Mood,
  PartOfSpeech,
  Person,
  Tense,
  Voice,
} from "../entities/MorphologyInfo";

/**
 * RMAC code tables. Keys are uppercase.
 */

function table<T>(
  entries: ReadonlyArray<readonly [string, T]>,
): ReadonlyMap<string, T> {
  return new Map(entries);
}

export const PART_OF_SPEECH = table<PartOfSpeech>([
  ["A", "Adjective"],
  ["ADV", "Adverb"],
  ["ARAM", "Aramaic"],
  ["C", "ReciprocalPronoun"],
  ["CONJ", "Conjunction"],
  ["D", "DemonstrativePronoun"],
  ["F", "ReflexivePronoun"],
  ["HEB", "Hebrew"],
  ["I", "InterrogativePronoun"],
  ["INJ", "Interjection"],
  ["K", "CorrelativePronoun"],
  ["N", "Noun"],
  ["P", "PersonalPronoun"],
  ["PREP", "Preposition"],
  ["PRT", "Particle"],
  ["Q", "CorrelativeAdjective"],
  ["R", "RelativePronoun"],
  ["S", "PossessivePronoun"],
  ["T", "Article"],
  ["V", "Verb"],
  ["X", "IndefinitePronoun"],
]);

/** Codes that carry no inflection, only an optional flag. */
export const SIMPLE_TYPES: ReadonlySet<string> = new Set([
  "CONJ",
  "INJ",
  "ARAM",
  "HEB",
  "PRT",
  "PREP",
]);

export const CASES = table<GrammaticalCase>([
  ["A", "Accusative"],
  ["D", "Dative"],
  ["G", "Genitive"],
  ["N", "Nominative"],
  ["V", "Vocative"],
]);

export const NUMBERS = table<GrammaticalNumber>([
  ["S", "Singular"],
  ["P", "Plural"],
]);

export const GENDERS = table<Gender>([
  ["M", "Masculine"],
  ["F", "Feminine"],
  ["N", "Neuter"],
]);

export const PERSONS = table<Person>([
  ["1", "First"],
  ["2", "Second"],
  ["3", "Third"],
]);

export const TENSES = table<Tense>([
  ["P", "Present"],
  ["I", "Imperfect"],
  ["F", "Future"],
  ["A", "Aorist"],
  ["R", "Perfect"],
  ["L", "Pluperfect"],
  ["2P", "SecondPresent"],
  ["2I", "SecondImperfect"],
  ["2F", "SecondFuture"],
  ["2A", "SecondAorist"],
  ["2R", "SecondPerfect"],
  ["2L", "SecondPluperfect"],
]);

export const VOICES = table<Voice>([
  ["A", "Active"],
  ["M", "Middle"],
  ["P", "Passive"],
  ["E", "MiddleOrPassive"],
  ["D", "Deponent"],
  ["N", "MiddleOrPassiveDeponent"],
  ["O", "PassiveDeponent"],
]);

export const DEPONENT_VOICES: ReadonlySet<string> = new Set(["D", "N", "O"]);

export const INFINITIVE_CODE = "N";
export const PARTICIPLE_CODE = "P";

export const FINITE_MOODS = table<Mood>([
  ["I", "Indicative"],
  ["S", "Subjunctive"],
  ["M", "Imperative"],
  ["O", "Optative"],
]);

// A, D and G double as flags on some indeclinable forms.
export const FLAGS = table<string>([
  ["C", "Comparative"],
  ["I", "Interrogative"],
  ["K", "Krasis"],
  ["L", "Location"],
  ["LG", "LocationGentilic"],
  ["LI", "LetterIndeclinable"],
  ["N", "Negative"],
  ["NUI", "IndeclinableNumber"],
  ["P", "ProperName"],
  ["PG", "PersonGentilic"],
  ["S", "Superlative"],
  ["T", "Title"],
  ["A", "Accusative"],
  ["D", "Dative"],
  ["G", "Genitive"],
]);

export const DEPONENT_FLAG = "Deponent";
