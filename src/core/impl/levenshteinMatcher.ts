import { DEFAULT_MAX_EDIT_DISTANCE, DEFAULT_SUGGESTION_LIMIT } from "../constants.js";
import type { EditDistanceMatcher } from "../distance.js";
import { guardAllocation } from "../errors.js";
import type { RankerFactory, SuggestionRanker } from "../ranker.js";
import type { Suggestion } from "../types.js";
import { BoundedSuggestionRanker } from "./boundedSuggestionRanker.js";

/**
 * Levenshtein distance with two rolling rows sized by the shorter string.
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  // distance is symmetric: keep the shorter string on the row axis
  if (a.length < b.length) [a, b] = [b, a];
  if (b.length === 0) return a.length;

  const n = b.length;
  let { prev, curr } = guardAllocation("edit distance rows", () => ({
    prev: new Uint32Array(n + 1),
    curr: new Uint32Array(n + 1),
  }));

  for (let j = 0; j <= n; j++) prev[j] = j;

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    const ca = a.charCodeAt(i - 1);
    for (let j = 1; j <= n; j++) {
      const cost = ca === b.charCodeAt(j - 1) ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[n];
}

export class LevenshteinMatcher implements EditDistanceMatcher {
  constructor(
    private readonly createRanker: RankerFactory = (capacity) => new BoundedSuggestionRanker(capacity),
  ) {}

  distance(a: string, b: string): number {
    return levenshtein(a, b);
  }

  matchDictionary(
    input: string,
    dictionary: Iterable<string>,
    maxDistance: number = DEFAULT_MAX_EDIT_DISTANCE,
    ranker: SuggestionRanker = this.createRanker(DEFAULT_SUGGESTION_LIMIT),
  ): Suggestion[] {
    const needle = input.toLowerCase();

    for (const word of dictionary) {
      // length gap is a lower bound on the distance
      if (Math.abs(word.length - needle.length) > maxDistance) continue;

      const d = this.distance(needle, word.toLowerCase());
      if (d <= maxDistance) ranker.offer(word, d, 0);
    }

    return ranker.finalize();
  }
}
