/**
 * Decoded morphology of a single RMAC code.
 *
 * Every field is present; fields that do not apply to the part of speech
 * are `null`. Instances are frozen.
 */

export type PartOfSpeech =
  | "Adjective"
  | "Adverb"
  | "Aramaic"
  | "ReciprocalPronoun"
  | "Conjunction"
  | "DemonstrativePronoun"
  | "ReflexivePronoun"
  | "Hebrew"
  | "InterrogativePronoun"
  | "Interjection"
  | "CorrelativePronoun"
  | "Noun"
  | "PersonalPronoun"
  | "Preposition"
  | "Particle"
  | "CorrelativeAdjective"
  | "RelativePronoun"
  | "PossessivePronoun"
  | "Article"
  | "Verb"
  | "IndefinitePronoun";

export type Tense =
  | "Present"
  | "Imperfect"
  | "Future"
  | "Aorist"
  | "Perfect"
  | "Pluperfect"
  | "SecondPresent"
  | "SecondImperfect"
  | "SecondFuture"
  | "SecondAorist"
  | "SecondPerfect"
  | "SecondPluperfect";

export type Voice =
  | "Active"
  | "Middle"
  | "Passive"
  | "MiddleOrPassive"
  | "Deponent"
  | "MiddleOrPassiveDeponent"
  | "PassiveDeponent";

export type VerbForm = "Finite" | "Infinitive" | "Participle";

export type Mood = "Indicative" | "Subjunctive" | "Imperative" | "Optative";

export type GrammaticalCase =
  | "Nominative"
  | "Genitive"
  | "Dative"
  | "Accusative"
  | "Vocative";

export type GrammaticalNumber = "Singular" | "Plural";

export type Gender = "Masculine" | "Feminine" | "Neuter";

export type Person = "First" | "Second" | "Third";

export interface MorphologyInfo {
  readonly pos: PartOfSpeech | null;
  readonly tense: Tense | null;
  readonly voice: Voice | null;
  readonly verbForm: VerbForm | null;
  readonly mood: Mood | null;
  readonly case: GrammaticalCase | null;
  readonly number: GrammaticalNumber | null;
  readonly gender: Gender | null;
  readonly person: Person | null;
  readonly flags: readonly string[];
}

export type MorphologyFields = Partial<MorphologyInfo>;

export function createMorphology(fields: MorphologyFields = {}): MorphologyInfo {
  return Object.freeze({
    pos: fields.pos ?? null,
    tense: fields.tense ?? null,
    voice: fields.voice ?? null,
    verbForm: fields.verbForm ?? null,
    mood: fields.mood ?? null,
    case: fields.case ?? null,
    number: fields.number ?? null,
    gender: fields.gender ?? null,
    person: fields.person ?? null,
    flags: Object.freeze([...(fields.flags ?? [])]),
  });
}

/** Copy-with-overrides; the base is left untouched. */
export function withOverrides(
  base: MorphologyInfo,
  overrides: MorphologyFields,
): MorphologyInfo {
  return createMorphology({ ...base, ...overrides });
}
