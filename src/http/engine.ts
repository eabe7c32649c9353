import {
  BoundedSuggestionRanker,
  LevenshteinMatcher,
  MemorySuggestionEngine,
  MemoryTrie,
  type RankerFactory,
  type SuggestionEngine,
  type SuggestionEngineOptions,
} from "../core/index.js";

export type Engine = SuggestionEngine;

export function createInMemoryEngine(options: SuggestionEngineOptions = {}): Engine {
  const createRanker: RankerFactory = (capacity) => new BoundedSuggestionRanker(capacity);
  const trie = new MemoryTrie();
  const matcher = new LevenshteinMatcher(createRanker);

  return new MemorySuggestionEngine({ trie, matcher, createRanker }, options);
}
