import { DEFAULT_MAX_WORD_LENGTH } from "../constants.js";
import { InvalidWordError } from "../errors.js";
import type { WordEntry } from "../types.js";

const LETTERS = /^[A-Za-z]+$/;
const DIGITS = /^\d+$/;

/** Accepts 1..maxLength ASCII letters; throws InvalidWordError otherwise. */
export function validateWord(raw: string, maxLength: number = DEFAULT_MAX_WORD_LENGTH): string {
  if (raw.length === 0) {
    throw new InvalidWordError(raw, "EMPTY", "word must be non-empty");
  }
  if (raw.length > maxLength) {
    throw new InvalidWordError(raw, "TOO_LONG", `word must be at most ${maxLength} characters`);
  }
  if (!LETTERS.test(raw)) {
    throw new InvalidWordError(raw, "NOT_ALPHABETIC", "word must contain only letters");
  }
  return raw;
}

export function validatePopularity(token: string, popularity: number): number {
  if (!Number.isSafeInteger(popularity) || popularity < 0) {
    throw new InvalidWordError(token, "BAD_POPULARITY", "popularity must be a non-negative integer");
  }
  return popularity;
}

/**
 * Parses `word` or `word:popularity`. Popularity defaults to 0.
 */
export function parseWordToken(raw: string, maxLength?: number): WordEntry {
  const colon = raw.indexOf(":");
  const word = validateWord(colon >= 0 ? raw.slice(0, colon) : raw, maxLength);
  if (colon < 0) return { word, popularity: 0 };

  const digits = raw.slice(colon + 1);
  const popularity = DIGITS.test(digits) ? Number(digits) : Number.NaN;
  return { word, popularity: validatePopularity(raw, popularity) };
}

export interface ParsedTokens {
  entries: WordEntry[];
  rejected: Array<{ token: string; message: string }>;
}

/** Splits whitespace-separated tokens, keeping the valid ones in order. */
export function parseWordTokens(text: string, maxLength?: number): ParsedTokens {
  const out: ParsedTokens = { entries: [], rejected: [] };

  for (const token of text.split(/\s+/)) {
    if (!token) continue;
    try {
      out.entries.push(parseWordToken(token, maxLength));
    } catch (e) {
      if (!(e instanceof InvalidWordError)) throw e;
      out.rejected.push({ token, message: e.message });
    }
  }

  return out;
}
