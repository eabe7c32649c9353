import { guardAllocation } from "../errors.js";
import type { TrieNode, WordTrie } from "../trie.js";
import type { Word, WordEntry } from "../types.js";

type Node = {
  children: Map<string, Node>;
  terminal: boolean;
  word: Word | undefined;
  popularity: number;
};

function makeNode(): Node {
  return { children: new Map(), terminal: false, word: undefined, popularity: 0 };
}

function foldCase(s: string): string {
  return s.toLowerCase();
}

/**
 * Builds the missing tail of a path detached from the tree, so a failed
 * allocation never leaves a half-linked branch behind.
 */
function buildPath(key: string, from: number): { head: Node; leaf: Node } {
  const leaf = makeNode();
  let head = leaf;
  for (let i = key.length - 1; i > from; i--) {
    const parent = makeNode();
    parent.children.set(key.charAt(i), head);
    head = parent;
  }
  return { head, leaf };
}

function* walk(start: TrieNode): Generator<WordEntry> {
  const stack: TrieNode[] = [start];

  while (stack.length) {
    const node = stack.pop();
    if (!node) break;
    if (node.terminal && node.word !== undefined) yield { word: node.word, popularity: node.popularity };

    // push children in reverse letter order so pop() yields ascending order
    const keys = Array.from(node.children.keys()).sort().reverse();
    for (const ch of keys) {
      const child = node.children.get(ch);
      if (child) stack.push(child);
    }
  }
}

export class MemoryTrie implements WordTrie {
  private readonly root: Node = makeNode();
  private count = 0;
  private rev = 0;

  get size(): number {
    return this.count;
  }

  get revision(): number {
    return this.rev;
  }

  insert(word: Word, popularity: number): void {
    const key = foldCase(word);

    let cur = this.root;
    let i = 0;
    for (; i < key.length; i++) {
      const next = cur.children.get(key.charAt(i));
      if (!next) break;
      cur = next;
    }

    if (i < key.length) {
      const branch = cur;
      const ch = key.charAt(i);
      cur = guardAllocation("trie node", () => {
        const { head, leaf } = buildPath(key, i);
        branch.children.set(ch, head);
        return leaf;
      });
    }

    if (cur.terminal && popularity <= cur.popularity) return;

    if (!cur.terminal) this.count++;
    cur.terminal = true;
    cur.word = word;
    cur.popularity = popularity;
    this.rev++;
  }

  lookupSubtree(prefix: string): TrieNode | undefined {
    const key = foldCase(prefix);
    let cur: Node | undefined = this.root;
    for (let i = 0; i < key.length; i++) {
      cur = cur.children.get(key.charAt(i));
      if (!cur) return undefined;
    }
    return cur;
  }

  enumerate(node: TrieNode = this.root): Iterable<WordEntry> {
    return { [Symbol.iterator]: () => walk(node) };
  }
}
