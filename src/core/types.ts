/** Shared core types used by module contracts. */

export type Word = string;

/** A stored word as the caller spelled it, with its popularity. */
export interface WordEntry {
  word: Word;
  popularity: number;
}

/** A ranked candidate produced by a query. */
export interface Suggestion {
  word: Word;
  /** Edit distance from the query; always 0 on the prefix path. */
  distance: number;
  popularity: number;
}

export type PrefixLookup =
  | { status: "found"; suggestions: Suggestion[] }
  | { status: "not_found" };

export interface SuggestResult {
  /** "corrected" when no stored word had the prefix and fuzzy matching ran instead. */
  mode: "prefix" | "corrected";
  suggestions: Suggestion[];
}
