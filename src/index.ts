#!/usr/bin/env node
import "dotenv/config";
import { runCliExitStatus } from "./app.js";
import { loadEnv } from "./config.js";
import { createLogger } from "./logger.js";
import { formatError } from "./util/error-format.js";

async function main() {
  const env = loadEnv();
  const logger = createLogger({ level: env.LOG_LEVEL });
  process.exitCode = await runCliExitStatus({ argv: process.argv.slice(2), env, logger });
}

// Only reached before a logger exists (bad environment).
main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(formatError(err));
  process.exitCode = 1;
});
