import bookAliases from "./bookAliases.json";

/**
 * Canonical New Testament book codes keyed by lowercase alias.
 */

export const CANONICAL_BOOKS: readonly string[] = Object.freeze(
  Object.keys(bookAliases),
);

export const BOOK_ALIASES: ReadonlyMap<string, string> = new Map(
  Object.entries(bookAliases).flatMap(([canonical, aliases]) =>
    aliases.map((alias): [string, string] => [alias.toLowerCase(), canonical]),
  ),
);

export function resolveBook(alias: string): string | null {
  return BOOK_ALIASES.get(alias.toLowerCase()) ?? null;
}
