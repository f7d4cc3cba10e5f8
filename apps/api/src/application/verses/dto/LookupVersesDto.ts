import { z } from "zod";
import { ValidationError } from "../../../shared/errors/DomainError";

const bodySchema = z.object({
  verseReferences: z.array(z.string()),
});

const querySchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) =>
    value === undefined ? [] : Array.isArray(value) ? value : [value],
  );

/**
 * Lookup Verses DTO
 *
 * Verse references as typed by the caller, not yet normalized
 */
export class LookupVersesDto {
  constructor(public readonly verseReferences: readonly string[]) {}

  static fromBody(body: unknown): LookupVersesDto {
    const result = bodySchema.safeParse(body);
    if (!result.success) {
      throw new ValidationError(
        "Request body must contain a 'verseReferences' array of strings",
        "verseReferences",
      );
    }
    return new LookupVersesDto(result.data.verseReferences);
  }

  /** `?verseReferences=a&verseReferences=b`; absent means an empty lookup. */
  static fromQuery(query: Record<string, unknown>): LookupVersesDto {
    const result = querySchema.safeParse(query.verseReferences);
    if (!result.success) {
      throw new ValidationError(
        "Query parameter 'verseReferences' must be one or more strings",
        "verseReferences",
      );
    }
    return new LookupVersesDto(result.data);
  }
}
