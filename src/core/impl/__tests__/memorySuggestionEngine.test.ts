import { describe, expect, it } from "vitest";
import { BoundedSuggestionRanker } from "../boundedSuggestionRanker.js";
import { LevenshteinMatcher } from "../levenshteinMatcher.js";
import { MemorySuggestionEngine, type SuggestionEngineOptions } from "../memorySuggestionEngine.js";
import { MemoryTrie } from "../memoryTrie.js";

function makeEngine(options?: SuggestionEngineOptions): MemorySuggestionEngine {
  const createRanker = (capacity: number) => new BoundedSuggestionRanker(capacity);
  return new MemorySuggestionEngine(
    { trie: new MemoryTrie(), matcher: new LevenshteinMatcher(createRanker), createRanker },
    options,
  );
}

describe("MemorySuggestionEngine", () => {
  it("ranks prefix matches by popularity", () => {
    const engine = makeEngine();
    engine.insertMany([
      { word: "apple", popularity: 5 },
      { word: "app", popularity: 3 },
      { word: "apt", popularity: 1 },
    ]);

    expect(engine.lookupPrefix("ap")).toEqual({
      status: "found",
      suggestions: [
        { word: "apple", distance: 0, popularity: 5 },
        { word: "app", distance: 0, popularity: 3 },
        { word: "apt", distance: 0, popularity: 1 },
      ],
    });
  });

  it("returns the original spelling for a case-folded prefix", () => {
    const engine = makeEngine();
    engine.insert("Hello", 5);

    expect(engine.lookupPrefix("hel")).toEqual({
      status: "found",
      suggestions: [{ word: "Hello", distance: 0, popularity: 5 }],
    });
  });

  it("caps prefix results at the limit", () => {
    const engine = makeEngine();
    const letters = "abcdefghijklmno";
    for (let i = 0; i < letters.length; i++) engine.insert(`c${letters[i]}`, i);

    const r = engine.lookupPrefix("C");
    expect(r.status).toBe("found");
    if (r.status !== "found") return;
    expect(r.suggestions).toHaveLength(10);
    expect(r.suggestions.map((s) => s.popularity)).toEqual([14, 13, 12, 11, 10, 9, 8, 7, 6, 5]);
    expect(r.suggestions.every((s) => s.word.toLowerCase().startsWith("c"))).toBe(true);
  });

  it("honours a configured limit", () => {
    const engine = makeEngine({ limit: 2 });
    for (const w of ["tea", "team", "tear"]) engine.insert(w, 1);

    const r = engine.lookupPrefix("te");
    expect(r.status === "found" ? r.suggestions.map((s) => s.word) : []).toEqual(["tea", "team"]);
  });

  it("corrects spelling against the whole vocabulary", () => {
    const engine = makeEngine();
    engine.insertMany([
      { word: "apple", popularity: 5 },
      { word: "app", popularity: 3 },
      { word: "apt", popularity: 1 },
      { word: "zebra", popularity: 9 },
    ]);

    const out = engine.correctSpelling("aple");
    expect(out).toEqual([
      { word: "apple", distance: 1, popularity: 0 },
      { word: "app", distance: 2, popularity: 0 },
      { word: "apt", distance: 2, popularity: 0 },
    ]);
    expect(out.every((s, i) => s.distance <= 2 && (i === 0 || out[i - 1].distance <= s.distance))).toBe(true);
  });

  it("honours a configured maxDistance", () => {
    const engine = makeEngine({ maxDistance: 0 });
    engine.insert("apple", 1);
    expect(engine.correctSpelling("aple")).toEqual([]);
  });

  it("sees words inserted after an earlier correction", () => {
    const engine = makeEngine();
    engine.insert("cat", 1);
    expect(engine.correctSpelling("cot")).toEqual([{ word: "cat", distance: 1, popularity: 0 }]);

    engine.insert("dot", 1);
    expect(engine.correctSpelling("cot")).toEqual([
      { word: "cat", distance: 1, popularity: 0 },
      { word: "dot", distance: 1, popularity: 0 },
    ]);
  });

  it("handles an empty store", () => {
    const engine = makeEngine();
    expect(engine.lookupPrefix("x")).toEqual({ status: "not_found" });
    expect(engine.correctSpelling("x")).toEqual([]);
    expect(engine.listAll()).toEqual([]);
  });

  it("falls back to correction when no word has the prefix", () => {
    const engine = makeEngine();
    engine.insert("apple", 5);

    expect(engine.suggest("app")).toEqual({
      mode: "prefix",
      suggestions: [{ word: "apple", distance: 0, popularity: 5 }],
    });
    expect(engine.suggest("appel")).toEqual({
      mode: "corrected",
      suggestions: [{ word: "apple", distance: 2, popularity: 0 }],
    });
  });

  it("lists every word in code-unit order", () => {
    const engine = makeEngine();
    engine.insert("apple", 1);
    engine.insert("Cherry", 1);
    engine.insert("Banana", 1);

    expect(engine.listAll()).toEqual([
      { word: "Banana", popularity: 1 },
      { word: "Cherry", popularity: 1 },
      { word: "apple", popularity: 1 },
    ]);
    expect(engine.size).toBe(3);
  });
});
