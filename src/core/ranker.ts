import type { Suggestion, Word } from "./types.js";

/**
 * Keeps the best K suggestions offered so far.
 *
 * Order: distance ascending, then popularity descending. An offer made at capacity
 * replaces the worst retained entry only when it is strictly better.
 */
export interface SuggestionRanker {
  readonly capacity: number;
  offer(word: Word, distance: number, popularity: number): void;
  /** Retained entries in rank order, at most `capacity`. */
  finalize(): Suggestion[];
}

export type RankerFactory = (capacity: number) => SuggestionRanker;

/** Array.sort comparator for the ranking order (<0 means a ranks first). */
export function compareSuggestions(a: Suggestion, b: Suggestion): number {
  return a.distance - b.distance || b.popularity - a.popularity;
}
