export * from "./constants.js";
export * from "./errors.js";
export { compareSuggestions, type RankerFactory, type SuggestionRanker } from "./ranker.js";
export type { EditDistanceMatcher } from "./distance.js";
export type { SuggestionEngine } from "./engine.js";
export type { Heap } from "./heap.js";
export type { TrieNode, WordTrie } from "./trie.js";
export type * from "./types.js";
export * from "./impl/index.js";
