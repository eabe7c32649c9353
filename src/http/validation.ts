import { InvalidWordError, validatePopularity, validateWord, type WordEntry } from "../core/index.js";
import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/** Validates a word-valued field, recording a field error when it is not a valid word. */
export function wordField(raw: string, field: string, maxLength: number, errors: FieldError[]): string | undefined {
  try {
    return validateWord(raw, maxLength);
  } catch (e) {
    if (!(e instanceof InvalidWordError)) throw e;
    pushErr(errors, `$.${field}`, e.message);
    return undefined;
  }
}

/** `{ word, popularity? }` item of a POST /words body; throws InvalidWordError. */
export function wordObject(item: Record<string, unknown>, maxLength: number): WordEntry {
  const word = validateWord(asString(item.word) ?? "", maxLength);
  if (item.popularity === undefined) return { word, popularity: 0 };
  return { word, popularity: validatePopularity(word, asInt(item.popularity) ?? Number.NaN) };
}
