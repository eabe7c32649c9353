import http from "node:http";
import { randomUUID } from "node:crypto";

import {
  DEFAULT_MAX_WORD_LENGTH,
  InvalidWordError,
  parseWordToken,
  ResourceExhaustedError,
  type WordEntry,
} from "../core/index.js";
import { createInMemoryEngine, type Engine } from "./engine.js";
import { Metrics } from "./metrics.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError } from "./problem.js";
import { asString, isRecord, pushErr, wordField, wordObject } from "./validation.js";

const SERVICE = "word_suggest";
const VERSION = "0.1.0";
const MAX_BATCH = 1000;

const JSON_ROUTES = new Set(["/words", "/prefix", "/correct", "/suggest"]);

export interface ServerOptions {
  port?: number;
  host?: string;
  metricsEnabled?: boolean;
  maxWordLength?: number;
  engine?: Engine;
  metrics?: Metrics;
  /** Called after the failing request is answered when memory runs out; the process should exit. */
  onFatal?: (err: ResourceExhaustedError) => void;
}

interface InsertFailure {
  index: number;
  word: string | null;
  code: string;
  message: string;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createInMemoryEngine();
  const metrics = opts.metrics ?? new Metrics();
  const metricsEnabled = opts.metricsEnabled ?? false;
  const maxWordLength = opts.maxWordLength ?? DEFAULT_MAX_WORD_LENGTH;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const target = req.url ?? "/";
    metrics.inc("requests_total");

    try {
      const path = requestPath(target);
      if (path === undefined) {
        return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "malformed request target", instance: target, requestId }));
      }

      if (req.method === "GET" && path === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          words: engine.size,
        });
      }

      if (req.method === "GET" && path === "/metrics") {
        if (!metricsEnabled) {
          return sendProblem(res, 404, problem({ status: 404, code: "NOT_FOUND", detail: "metrics not enabled", instance: path, requestId }));
        }
        res.statusCode = 200;
        res.setHeader("content-type", "text/plain; version=0.0.4");
        res.end(metrics.render());
        return;
      }

      if (req.method === "GET" && path === "/words") {
        const words = engine.listAll();
        return sendJson(res, 200, { words, total: words.length });
      }

      if (req.method !== "POST" || !JSON_ROUTES.has(path)) {
        return sendProblem(res, 404, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: path, requestId }));
      }

      if (!isJson(req)) {
        return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: path, requestId }));
      }

      let body: unknown;
      try {
        body = await readJson(req);
      } catch (e) {
        if (!(e instanceof SyntaxError)) throw e;
        return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be valid JSON", instance: path, requestId }));
      }
      if (!isRecord(body)) {
        return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: path, requestId }));
      }

      const errors: FieldError[] = [];

      if (path === "/words") {
        const items = body.words;
        if (!Array.isArray(items)) pushErr(errors, "$.words", "must be an array");
        else if (items.length < 1) pushErr(errors, "$.words", "must contain at least 1 item");
        else if (items.length > MAX_BATCH) pushErr(errors, "$.words", `must contain at most ${MAX_BATCH} items`);

        if (errors.length || !Array.isArray(items)) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: path, requestId, errors }));
        }

        let inserted = 0;
        const failures: InsertFailure[] = [];

        for (let i = 0; i < items.length; i++) {
          const item: unknown = items[i];
          let entry: WordEntry;
          try {
            if (typeof item === "string") entry = parseWordToken(item, maxWordLength);
            else if (isRecord(item) && typeof item.word === "string") entry = wordObject(item, maxWordLength);
            else if (isRecord(item)) {
              failures.push({ index: i, word: null, code: "INVALID_ARGUMENT", message: "word must be a string" });
              continue;
            }
            else {
              failures.push({ index: i, word: null, code: "INVALID_ARGUMENT", message: "item must be a token string or an object" });
              continue;
            }
          } catch (e) {
            if (!(e instanceof InvalidWordError)) throw e;
            failures.push({ index: i, word: e.token, code: e.code, message: e.message });
            continue;
          }

          engine.insert(entry.word, entry.popularity);
          inserted++;
        }

        metrics.inc("words_inserted_total", inserted);
        metrics.inc("words_rejected_total", failures.length);

        const failed = failures.length;
        const status = failed > 0 ? 207 : 200;
        return sendJson(res, status, { inserted, failed, failures, total: engine.size });
      }

      const field = path === "/prefix" ? "prefix" : "input";
      const raw = asString(body[field]);
      if (raw === undefined) {
        pushErr(errors, `$.${field}`, "must be a string");
        return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: path, requestId, errors }));
      }

      const query = wordField(raw, field, maxWordLength, errors);
      if (query === undefined) {
        return sendProblem(res, 400, problem({ status: 400, code: "INVALID_WORD", detail: "invalid request", instance: path, requestId, errors }));
      }

      if (path === "/prefix") {
        const r = engine.lookupPrefix(query);
        if (r.status === "not_found") {
          metrics.inc("prefix_misses_total");
          return sendProblem(res, 404, problem({ status: 404, code: "NOT_FOUND", detail: `no words start with "${query}"`, instance: path, requestId }));
        }
        metrics.inc("prefix_hits_total");
        return sendJson(res, 200, { suggestions: r.suggestions });
      }

      if (path === "/correct") {
        metrics.inc("corrections_total");
        return sendJson(res, 200, { suggestions: engine.correctSpelling(query) });
      }

      const r = engine.suggest(query);
      metrics.inc(r.mode === "prefix" ? "prefix_hits_total" : "prefix_misses_total");
      if (r.mode === "corrected") metrics.inc("corrections_total");
      return sendJson(res, 200, r);
    } catch (e) {
      console.error(`[${requestId}] ${req.method} ${target} failed:`, e);
      if (e instanceof ResourceExhaustedError) {
        sendProblem(res, 500, problem({ status: 500, code: e.code, detail: e.message, instance: target, requestId }));
        opts.onFatal?.(e);
        return;
      }
      return sendProblem(res, 500, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: target, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? Number(process.env.PORT ?? 3000);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, opts.host, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

/** Pathname of the request target, or undefined when it is not a valid URL path. */
function requestPath(target: string): string | undefined {
  try {
    return new URL(target, "http://localhost").pathname;
  } catch (e) {
    if (e instanceof TypeError) return undefined;
    throw e;
  }
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return ct.split(";")[0].trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  return raw.length ? JSON.parse(raw) : null;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
