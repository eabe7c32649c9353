import { describe, expect, it } from "vitest";
import { MemoryTrie } from "../memoryTrie.js";
import { WordDictionary } from "../wordDictionary.js";

describe("WordDictionary", () => {
  it("snapshots canonical words in enumeration order", () => {
    const trie = new MemoryTrie();
    trie.insert("pear", 1);
    trie.insert("Peach", 2);
    trie.insert("plum", 3);

    const dict = WordDictionary.fromStore(trie);
    expect(Array.from(dict)).toEqual(["Peach", "pear", "plum"]);
    expect(dict.size).toBe(3);
  });

  it("goes stale after an insert and is unaffected by it", () => {
    const trie = new MemoryTrie();
    trie.insert("fig", 1);
    const dict = WordDictionary.fromStore(trie);
    expect(dict.isStaleFor(trie)).toBe(false);

    trie.insert("date", 1);
    expect(dict.isStaleFor(trie)).toBe(true);
    expect(dict.words).toEqual(["fig"]);
    expect(WordDictionary.fromStore(trie).words).toEqual(["date", "fig"]);
  });
});
