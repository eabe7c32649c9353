import { DEFAULT_MAX_EDIT_DISTANCE, DEFAULT_MAX_WORD_LENGTH, DEFAULT_SUGGESTION_LIMIT } from "./core/index.js";

export interface AppConfig {
  port: number;
  metricsEnabled: boolean;
  suggestionLimit: number;
  maxEditDistance: number;
  maxWordLength: number;
  /** Text file of whitespace-separated `word:popularity` tokens loaded at startup. */
  seedFile?: string;
}

type Env = Record<string, string | undefined>;

function readInt(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  warn: (msg: string) => void,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;

  const n = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(n) || n < min || n > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    warn(`ignoring ${name}=${JSON.stringify(raw)}: expected an integer ${range}, using ${fallback}`);
    return fallback;
  }
  return n;
}

export function loadConfig(env: Env = process.env, warn: (msg: string) => void = console.warn): AppConfig {
  return {
    port: readInt(env, "PORT", 3000, 0, warn, 65535),
    metricsEnabled: env.METRICS_ENABLED === "1",
    suggestionLimit: readInt(env, "SUGGESTION_LIMIT", DEFAULT_SUGGESTION_LIMIT, 1, warn),
    maxEditDistance: readInt(env, "MAX_EDIT_DISTANCE", DEFAULT_MAX_EDIT_DISTANCE, 0, warn),
    maxWordLength: readInt(env, "MAX_WORD_LENGTH", DEFAULT_MAX_WORD_LENGTH, 1, warn),
    seedFile: env.SEED_FILE || undefined,
  };
}
