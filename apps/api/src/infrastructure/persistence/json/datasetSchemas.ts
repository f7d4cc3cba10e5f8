import { z } from "zod";

export const tokenRecordSchema = z.object({
  gloss: z.string(),
  greek: z.string(),
  translit: z.string(),
  strongs: z.string(),
  rmac: z.string(),
  rmac_desc: z.string().nullish(),
});

export const verseDatasetSchema = z.record(
  z.string().min(1),
  z.object({
    tokens: z.array(tokenRecordSchema),
  }),
);

export const lexiconDatasetSchema = z.record(
  z
    .string()
    .regex(
      /^[GH](0|[1-9]\d*)$/,
      "Lexicon keys must be canonical Strong's numbers",
    ),
  z.string().trim().min(1, "Lexicon definitions must not be blank"),
);
