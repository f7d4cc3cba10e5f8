import { describe, it, expect } from "@jest/globals";
import { RmacParser, parseMorphology } from "../RmacParser";

describe("RmacParser", () => {
  const parser = new RmacParser();

  describe("finite verbs", () => {
    it.each([
      ["V-AAI-3S", "Aorist", "Active", "Indicative", "Third", "Singular"],
      ["V-PAI-1P", "Present", "Active", "Indicative", "First", "Plural"],
      ["V-RAI-1P", "Perfect", "Active", "Indicative", "First", "Plural"],
      ["V-FMI-2S", "Future", "Middle", "Indicative", "Second", "Singular"],
      ["V-IAI-3P", "Imperfect", "Active", "Indicative", "Third", "Plural"],
      ["V-LAI-1S", "Pluperfect", "Active", "Indicative", "First", "Singular"],
      ["V-PAS-3S", "Present", "Active", "Subjunctive", "Third", "Singular"],
      ["V-AAM-2P", "Aorist", "Active", "Imperative", "Second", "Plural"],
      ["V-PAO-3S", "Present", "Active", "Optative", "Third", "Singular"],
    ])("should parse %s", (code, tense, voice, mood, person, number) => {
      const result = parser.parse(code);

      expect(result).toEqual({
        pos: "Verb",
        tense,
        voice,
        verbForm: "Finite",
        mood,
        case: null,
        number,
        gender: null,
        person,
        flags: [],
      });
    });

    it.each([
      ["V-2AAI-3S", "SecondAorist", "Third", "Singular"],
      ["V-2RAI-1P", "SecondPerfect", "First", "Plural"],
    ])("should read a two-character tense in %s", (code, tense, person, number) => {
      const result = parser.parse(code);

      expect(result?.tense).toBe(tense);
      expect(result?.voice).toBe("Active");
      expect(result?.mood).toBe("Indicative");
      expect(result?.person).toBe(person);
      expect(result?.number).toBe(number);
    });

    it("should leave an unknown voice unset", () => {
      const result = parser.parse("V-IXI-3S");

      expect(result?.tense).toBe("Imperfect");
      expect(result?.voice).toBeNull();
      expect(result?.verbForm).toBe("Finite");
      expect(result?.mood).toBe("Indicative");
      expect(result?.flags).toEqual([]);
    });

    it("should mark an unknown form character as finite without mood", () => {
      const result = parser.parse("V-PAZ-3S");

      expect(result?.verbForm).toBe("Finite");
      expect(result?.mood).toBeNull();
      expect(result?.person).toBe("Third");
    });

    it("should parse a finite verb without person and number", () => {
      const result = parser.parse("V-AAI");

      expect(result?.verbForm).toBe("Finite");
      expect(result?.person).toBeNull();
      expect(result?.number).toBeNull();
    });
  });

  describe("infinitives", () => {
    it.each([
      ["V-AAN", "Aorist", "Active"],
      ["V-PAN", "Present", "Active"],
      ["V-PMN", "Present", "Middle"],
    ])("should parse %s", (code, tense, voice) => {
      const result = parser.parse(code);

      expect(result).toEqual({
        pos: "Verb",
        tense,
        voice,
        verbForm: "Infinitive",
        mood: null,
        case: null,
        number: null,
        gender: null,
        person: null,
        flags: [],
      });
    });

    it("should ignore a trailing segment on an infinitive", () => {
      const result = parser.parse("V-PAN-3S");

      expect(result?.verbForm).toBe("Infinitive");
      expect(result?.person).toBeNull();
      expect(result?.number).toBeNull();
    });
  });

  describe("participles", () => {
    it.each([
      ["V-PAP-NSM", "Present", "Active", "Nominative", "Singular", "Masculine"],
      ["V-AAP-GPF", "Aorist", "Active", "Genitive", "Plural", "Feminine"],
      ["V-PMP-DPN", "Present", "Middle", "Dative", "Plural", "Neuter"],
      ["V-PAP-DPM", "Present", "Active", "Dative", "Plural", "Masculine"],
    ])("should parse %s", (code, tense, voice, grammaticalCase, number, gender) => {
      const result = parser.parse(code);

      expect(result).toEqual({
        pos: "Verb",
        tense,
        voice,
        verbForm: "Participle",
        mood: null,
        case: grammaticalCase,
        number,
        gender,
        person: null,
        flags: [],
      });
    });

    it("should leave case, number and gender unset without a second segment", () => {
      const result = parser.parse("V-PAP");

      expect(result?.verbForm).toBe("Participle");
      expect(result?.case).toBeNull();
      expect(result?.number).toBeNull();
      expect(result?.gender).toBeNull();
    });
  });

  describe("voices", () => {
    it.each([
      ["V-PPI-3S", "Passive", false],
      ["V-PMI-3S", "Middle", false],
      ["V-PEI-3S", "MiddleOrPassive", false],
      ["V-PDI-3S", "Deponent", true],
      ["V-ADI-3S", "Deponent", true],
      ["V-PNI-3S", "MiddleOrPassiveDeponent", true],
      ["V-POI-3S", "PassiveDeponent", true],
    ])("should decode %s as %s", (code, voice, deponent) => {
      const result = parser.parse(code);

      expect(result?.voice).toBe(voice);
      expect(result?.flags).toEqual(deponent ? ["Deponent"] : []);
    });

    it("should flag a deponent participle", () => {
      const result = parser.parse("V-PNP-NSM");

      expect(result?.verbForm).toBe("Participle");
      expect(result?.flags).toEqual(["Deponent"]);
    });
  });

  describe("personal pronouns", () => {
    it("should parse a first person pronoun without gender", () => {
      const result = parser.parse("P-1NS");

      expect(result).toEqual({
        pos: "PersonalPronoun",
        tense: null,
        voice: null,
        verbForm: null,
        mood: null,
        case: "Nominative",
        number: "Singular",
        gender: null,
        person: "First",
        flags: [],
      });
    });

    it("should parse a second person plural pronoun", () => {
      const result = parser.parse("P-2GP");

      expect(result?.person).toBe("Second");
      expect(result?.case).toBe("Genitive");
      expect(result?.number).toBe("Plural");
      expect(result?.gender).toBeNull();
    });

    it("should imply third person when no person digit is given", () => {
      const result = parser.parse("P-ASM");

      expect(result?.person).toBe("Third");
      expect(result?.case).toBe("Accusative");
      expect(result?.number).toBe("Singular");
      expect(result?.gender).toBe("Masculine");
    });

    it("should read a flag segment", () => {
      expect(parser.parse("P-1NS-K")?.flags).toEqual(["Krasis"]);
    });

    it("should reject modifiers shorter than two characters", () => {
      expect(parser.parse("P-1")).toBeNull();
      expect(parser.parse("P-")).toBeNull();
    });
  });

  describe("nominals", () => {
    it.each([
      ["N-NSM", "Noun", "Nominative", "Singular", "Masculine"],
      ["N-GSF", "Noun", "Genitive", "Singular", "Feminine"],
      ["N-DPN", "Noun", "Dative", "Plural", "Neuter"],
      ["N-APM", "Noun", "Accusative", "Plural", "Masculine"],
      ["N-VSF", "Noun", "Vocative", "Singular", "Feminine"],
      ["A-NSM", "Adjective", "Nominative", "Singular", "Masculine"],
      ["T-GPN", "Article", "Genitive", "Plural", "Neuter"],
    ])("should parse %s", (code, pos, grammaticalCase, number, gender) => {
      const result = parser.parse(code);

      expect(result?.pos).toBe(pos);
      expect(result?.case).toBe(grammaticalCase);
      expect(result?.number).toBe(number);
      expect(result?.gender).toBe(gender);
      expect(result?.person).toBeNull();
      expect(result?.verbForm).toBeNull();
    });

    it.each([
      ["N-GSM-P", "ProperName"],
      ["N-NSM-T", "Title"],
      ["N-ASF-L", "Location"],
      ["A-NSM-C", "Comparative"],
      ["A-NSM-S", "Superlative"],
    ])("should read the flag of %s", (code, flag) => {
      expect(parser.parse(code)?.flags).toEqual([flag]);
    });

    it.each([
      ["D-NSM", "DemonstrativePronoun"],
      ["R-ASF", "RelativePronoun"],
      ["I-NSN", "InterrogativePronoun"],
      ["X-GSM", "IndefinitePronoun"],
      ["K-APM", "CorrelativePronoun"],
      ["C-DPM", "ReciprocalPronoun"],
      ["F-3ASM", "ReflexivePronoun"],
      ["S-1SNSF", "PossessivePronoun"],
      ["Q-NPN", "CorrelativeAdjective"],
    ])("should map %s to %s", (code, pos) => {
      expect(parser.parse(code)?.pos).toBe(pos);
    });

    it("should drop an unknown flag segment", () => {
      expect(parser.parse("N-GSM-ZZ")?.flags).toEqual([]);
    });

    it("should leave trailing fields unset for short inflection", () => {
      const result = parser.parse("N-G");

      expect(result?.case).toBe("Genitive");
      expect(result?.number).toBeNull();
      expect(result?.gender).toBeNull();
    });

    it("should leave unknown inflection characters unset", () => {
      const result = parser.parse("N-PRI");

      expect(result?.pos).toBe("Noun");
      expect(result?.case).toBeNull();
      expect(result?.number).toBeNull();
      expect(result?.gender).toBeNull();
    });
  });

  describe("indeclinable types", () => {
    it.each([
      ["CONJ", "Conjunction"],
      ["INJ", "Interjection"],
      ["PREP", "Preposition"],
      ["PRT", "Particle"],
      ["ARAM", "Aramaic"],
      ["HEB", "Hebrew"],
    ])("should parse %s as %s", (code, pos) => {
      expect(parser.parse(code)).toEqual({
        pos,
        tense: null,
        voice: null,
        verbForm: null,
        mood: null,
        case: null,
        number: null,
        gender: null,
        person: null,
        flags: [],
      });
    });

    it("should read a flag after an indeclinable type", () => {
      expect(parser.parse("CONJ-T")?.flags).toEqual(["Title"]);
      expect(parser.parse("PRT-N")?.flags).toEqual(["Negative"]);
      expect(parser.parse("PRT-I")?.flags).toEqual(["Interrogative"]);
    });

    it("should parse a bare adverb", () => {
      const result = parser.parse("ADV");

      expect(result?.pos).toBe("Adverb");
      expect(result?.flags).toEqual([]);
    });

    it.each([
      ["ADV-C", "Comparative"],
      ["ADV-S", "Superlative"],
      ["ADV-I", "Interrogative"],
      ["ADV-N", "Negative"],
    ])("should read the flag of %s", (code, flag) => {
      expect(parser.parse(code)?.flags).toEqual([flag]);
    });
  });

  describe("failures", () => {
    it.each([null, undefined, "", "   "])("should return null for %p", (code) => {
      expect(parser.parse(code)).toBeNull();
    });

    it.each(["INVALID", "Hello World", "Z-NSM", "N", "V-AA", "V-"])(
      "should return null for %s",
      (code) => {
        expect(parser.parse(code)).toBeNull();
        expect(parser.isValid(code)).toBe(false);
      },
    );
  });

  it("should ignore case and surrounding whitespace", () => {
    expect(parser.parse("  v-aai-3s ")).toEqual(parser.parse("V-AAI-3S"));
    expect(parser.parse("n-gsm-p")?.flags).toEqual(["ProperName"]);
  });

  it("should report valid codes", () => {
    expect(parser.isValid("V-AAI-3S")).toBe(true);
    expect(parser.isValid("CONJ")).toBe(true);
  });

  it("should return frozen results", () => {
    const result = parser.parse("N-GSM-P");

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result?.flags)).toBe(true);
  });

  it("should return a fresh result per call", () => {
    expect(parser.parse("CONJ")).not.toBe(parser.parse("CONJ"));
  });

  describe("parseMorphology", () => {
    it("should delegate to a shared parser", () => {
      expect(parseMorphology("V-AAI-3S")?.person).toBe("Third");
      expect(parseMorphology("")).toBeNull();
    });
  });
});
