import { readFile } from "node:fs/promises";

import { loadConfig } from "./config.js";
import { parseWordTokens } from "./core/index.js";
import { createInMemoryEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";

const config = loadConfig();
const engine = createInMemoryEngine({ limit: config.suggestionLimit, maxDistance: config.maxEditDistance });

if (config.seedFile) {
  const { entries, rejected } = parseWordTokens(await readFile(config.seedFile, "utf8"), config.maxWordLength);
  for (const r of rejected) console.warn(`seed: skipping "${r.token}": ${r.message}`);
  engine.insertMany(entries);
  console.log(`seeded ${engine.size} words from ${config.seedFile}`);
}

const { server, port } = await startServer({
  port: config.port,
  metricsEnabled: config.metricsEnabled,
  maxWordLength: config.maxWordLength,
  engine,
  onFatal: (err) => {
    console.error(`fatal: ${err.message}, shutting down`);
    shutdown(1);
  },
});

function shutdown(code = 0): void {
  server.close(() => process.exit(code));
}

process.on("SIGINT", () => shutdown());
process.on("SIGTERM", () => shutdown());

console.log(`listening on :${port}`);
