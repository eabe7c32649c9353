import { DEFAULT_SUGGESTION_LIMIT } from "../constants.js";
import { compareSuggestions, type SuggestionRanker } from "../ranker.js";
import type { Suggestion, Word } from "../types.js";
import { ArrayHeap } from "./arrayHeap.js";

type Entry = Suggestion & { seq: number };

/** Rank order with offer sequence as the final tie-break. */
function compareEntries(a: Entry, b: Entry): number {
  return compareSuggestions(a, b) || a.seq - b.seq;
}

/**
 * Online top-K over a fixed-size heap whose top is the *worst of the best*.
 *
 * Equal (distance, popularity) entries keep offer order: the later one is treated as
 * worse, so it is evicted first and listed last.
 */
export class BoundedSuggestionRanker implements SuggestionRanker {
  private readonly heap = new ArrayHeap<Entry>((a, b) => compareEntries(a, b) > 0);
  private seq = 0;

  constructor(readonly capacity: number = DEFAULT_SUGGESTION_LIMIT) {}

  offer(word: Word, distance: number, popularity: number): void {
    if (this.capacity <= 0) return;

    const entry: Entry = { word, distance, popularity, seq: this.seq++ };
    if (this.heap.size() < this.capacity) {
      this.heap.push(entry);
      return;
    }

    const worst = this.heap.peek();
    // strictly better on (distance, popularity) only; sequence never wins a slot
    if (worst && compareSuggestions(entry, worst) < 0) {
      this.heap.pop();
      this.heap.push(entry);
    }
  }

  finalize(): Suggestion[] {
    return this.heap
      .toArray()
      .sort(compareEntries)
      .slice(0, this.capacity)
      .map(({ word, distance, popularity }) => ({ word, distance, popularity }));
  }
}
