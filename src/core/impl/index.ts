export { ArrayHeap } from "./arrayHeap.js";
export { BoundedSuggestionRanker } from "./boundedSuggestionRanker.js";
export { LevenshteinMatcher, levenshtein } from "./levenshteinMatcher.js";
export { MemorySuggestionEngine, type EngineDeps, type SuggestionEngineOptions } from "./memorySuggestionEngine.js";
export { MemoryTrie } from "./memoryTrie.js";
export { WordDictionary } from "./wordDictionary.js";
export { parseWordToken, parseWordTokens, validatePopularity, validateWord, type ParsedTokens } from "./wordToken.js";
