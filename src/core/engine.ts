import type { PrefixLookup, Suggestion, SuggestResult, Word, WordEntry } from "./types.js";

/** Core API consumed by the HTTP layer. */
export interface SuggestionEngine {
  readonly size: number;
  insert(word: Word, popularity: number): void;
  insertMany(entries: Iterable<WordEntry>): void;
  lookupPrefix(prefix: string): PrefixLookup;
  correctSpelling(input: string): Suggestion[];
  /** Prefix lookup, falling back to spelling correction when nothing has the prefix. */
  suggest(input: string): SuggestResult;
  /** All stored words, ascending by code unit. */
  listAll(): WordEntry[];
}
