import type { Word, WordEntry } from "./types.js";

/** Read-only view of one letter position in the tree. */
export interface TrieNode {
  readonly children: ReadonlyMap<string, TrieNode>;
  /** True iff some stored word ends exactly here. */
  readonly terminal: boolean;
  /** Original-case spelling; set iff `terminal`. */
  readonly word: Word | undefined;
  readonly popularity: number;
}

/**
 * Case-insensitive prefix trie holding one canonical spelling per word.
 *
 * Contract notes:
 * - `insert` keeps the spelling and popularity of the first insertion that reached
 *   the highest popularity seen for the case-folded word
 * - `enumerate` walks children in ascending letter order and may be iterated again
 */
export interface WordTrie {
  /** Number of distinct stored words. */
  readonly size: number;
  /** Bumped whenever `insert` changes the stored words. */
  readonly revision: number;

  insert(word: Word, popularity: number): void;

  /** Node spelling `prefix`, or undefined when no stored word starts with it. */
  lookupSubtree(prefix: string): TrieNode | undefined;

  /** Every stored word under `node` (the root when omitted). */
  enumerate(node?: TrieNode): Iterable<WordEntry>;
}
