import { describe, expect, it, vi } from "vitest";
import { ResourceExhaustedError } from "../../errors.js";
import { MemoryTrie } from "../memoryTrie.js";

describe("MemoryTrie", () => {
  it("keeps the spelling of the first insertion that reached the max popularity", () => {
    const trie = new MemoryTrie();
    trie.insert("apple", 3);
    trie.insert("Apple", 5);
    trie.insert("APPLE", 5);
    trie.insert("aPPle", 2);

    const node = trie.lookupSubtree("apple");
    expect(node?.word).toBe("Apple");
    expect(node?.popularity).toBe(5);
    expect(trie.size).toBe(1);
  });

  it("marks a word terminal on first insert even at popularity 0", () => {
    const trie = new MemoryTrie();
    trie.insert("Zero", 0);
    trie.insert("zero", 0);

    expect(Array.from(trie.enumerate())).toEqual([{ word: "Zero", popularity: 0 }]);
  });

  it("bumps the revision only when stored words change", () => {
    const trie = new MemoryTrie();
    expect(trie.revision).toBe(0);
    trie.insert("cat", 2);
    expect(trie.revision).toBe(1);
    trie.insert("CAT", 1);
    expect(trie.revision).toBe(1);
    trie.insert("Cat", 4);
    expect(trie.revision).toBe(2);
  });

  it("looks up prefixes case-insensitively", () => {
    const trie = new MemoryTrie();
    trie.insert("apple", 1);
    trie.insert("apt", 1);

    const node = trie.lookupSubtree("AP");
    expect(node).toBeDefined();
    expect(node?.terminal).toBe(false);
    expect(node?.word).toBeUndefined();
    expect(trie.lookupSubtree("apx")).toBeUndefined();
    expect(trie.lookupSubtree("applesauce")).toBeUndefined();
  });

  it("enumerates depth-first in ascending letter order", () => {
    const trie = new MemoryTrie();
    for (const w of ["b", "ab", "a", "abc"]) trie.insert(w, 1);

    expect(Array.from(trie.enumerate(), (e) => e.word)).toEqual(["a", "ab", "abc", "b"]);

    const sub = trie.lookupSubtree("ab");
    expect(sub).toBeDefined();
    if (sub) expect(Array.from(trie.enumerate(sub), (e) => e.word)).toEqual(["ab", "abc"]);
  });

  it("can iterate an enumeration more than once", () => {
    const trie = new MemoryTrie();
    trie.insert("dog", 1);
    trie.insert("do", 2);

    const all = trie.enumerate();
    expect(Array.from(all)).toEqual(Array.from(all));
    expect(Array.from(all)).toHaveLength(2);
  });

  it("leaves the tree untouched when a node cannot be allocated", () => {
    const trie = new MemoryTrie();
    trie.insert("cat", 1);

    const set = Map.prototype.set;
    let calls = 0;
    const spy = vi.spyOn(Map.prototype, "set").mockImplementation(function (this: Map<unknown, unknown>, key: unknown, value: unknown) {
      calls++;
      if (calls === 3) throw new RangeError("Map maximum size exceeded");
      return set.call(this, key, value);
    });

    let caught: unknown;
    try {
      trie.insert("dogfish", 2);
    } catch (e) {
      caught = e;
    } finally {
      spy.mockRestore();
    }

    expect(caught).toBeInstanceOf(ResourceExhaustedError);
    expect(trie.lookupSubtree("d")).toBeUndefined();
    expect(trie.size).toBe(1);
    expect(trie.revision).toBe(1);
    expect(Array.from(trie.enumerate(), (e) => e.word)).toEqual(["cat"]);

    trie.insert("dogfish", 2);
    expect(trie.lookupSubtree("dogfish")?.popularity).toBe(2);
  });
});
