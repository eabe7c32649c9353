import type { SuggestionRanker } from "./ranker.js";
import type { Suggestion } from "./types.js";

export interface EditDistanceMatcher {
  /** Unit-cost insert/delete/substitute distance. */
  distance(a: string, b: string): number;

  /**
   * Case-insensitively scores every dictionary word against `input` and ranks those
   * within `maxDistance`. Candidates are offered with popularity 0.
   */
  matchDictionary(
    input: string,
    dictionary: Iterable<string>,
    maxDistance?: number,
    ranker?: SuggestionRanker,
  ): Suggestion[];
}
