import { DEFAULT_MAX_EDIT_DISTANCE, DEFAULT_SUGGESTION_LIMIT } from "../constants.js";
import type { EditDistanceMatcher } from "../distance.js";
import type { SuggestionEngine } from "../engine.js";
import type { RankerFactory } from "../ranker.js";
import type { WordTrie } from "../trie.js";
import type { PrefixLookup, Suggestion, SuggestResult, Word, WordEntry } from "../types.js";
import { WordDictionary } from "./wordDictionary.js";

export interface SuggestionEngineOptions {
  /** Max suggestions per query. */
  limit?: number;
  /** Max edit distance for spelling correction. */
  maxDistance?: number;
}

export interface EngineDeps {
  trie: WordTrie;
  matcher: EditDistanceMatcher;
  createRanker: RankerFactory;
}

export class MemorySuggestionEngine implements SuggestionEngine {
  private readonly limit: number;
  private readonly maxDistance: number;
  private dictionary: WordDictionary | undefined;

  constructor(
    private readonly deps: EngineDeps,
    options?: SuggestionEngineOptions,
  ) {
    this.limit = options?.limit ?? DEFAULT_SUGGESTION_LIMIT;
    this.maxDistance = options?.maxDistance ?? DEFAULT_MAX_EDIT_DISTANCE;
  }

  get size(): number {
    return this.deps.trie.size;
  }

  insert(word: Word, popularity: number): void {
    this.deps.trie.insert(word, popularity);
  }

  insertMany(entries: Iterable<WordEntry>): void {
    for (const e of entries) this.deps.trie.insert(e.word, e.popularity);
  }

  lookupPrefix(prefix: string): PrefixLookup {
    const node = this.deps.trie.lookupSubtree(prefix);
    if (!node) return { status: "not_found" };

    const ranker = this.deps.createRanker(this.limit);
    for (const e of this.deps.trie.enumerate(node)) ranker.offer(e.word, 0, e.popularity);

    return { status: "found", suggestions: ranker.finalize() };
  }

  correctSpelling(input: string): Suggestion[] {
    const dictionary = this.snapshot();
    if (dictionary.size === 0) return [];

    return this.deps.matcher.matchDictionary(input, dictionary, this.maxDistance, this.deps.createRanker(this.limit));
  }

  suggest(input: string): SuggestResult {
    const found = this.lookupPrefix(input);
    if (found.status === "found") return { mode: "prefix", suggestions: found.suggestions };
    return { mode: "corrected", suggestions: this.correctSpelling(input) };
  }

  listAll(): WordEntry[] {
    const all = Array.from(this.deps.trie.enumerate());
    // code-unit order, not locale order: "Banana" sorts before "apple"
    all.sort((a, b) => (a.word < b.word ? -1 : a.word > b.word ? 1 : 0));
    return all;
  }

  private snapshot(): WordDictionary {
    if (!this.dictionary || this.dictionary.isStaleFor(this.deps.trie)) {
      this.dictionary = WordDictionary.fromStore(this.deps.trie);
    }
    return this.dictionary;
  }
}
