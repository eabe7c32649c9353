import type { WordTrie } from "../trie.js";
import type { Word } from "../types.js";

/**
 * Flat snapshot of every canonical word in a trie, in enumeration order.
 * Goes stale on the next insert; take a new snapshot rather than patching it.
 */
export class WordDictionary implements Iterable<Word> {
  private constructor(
    readonly words: readonly Word[],
    readonly revision: number,
  ) {}

  static fromStore(store: WordTrie): WordDictionary {
    const words: Word[] = [];
    for (const entry of store.enumerate()) words.push(entry.word);
    return new WordDictionary(words, store.revision);
  }

  get size(): number {
    return this.words.length;
  }

  isStaleFor(store: WordTrie): boolean {
    return store.revision !== this.revision;
  }

  [Symbol.iterator](): Iterator<Word> {
    return this.words[Symbol.iterator]();
  }
}
