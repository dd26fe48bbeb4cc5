#!/usr/bin/env node
// scripts/scratchers/run_ms.ts
import { describeError, logger } from "../../lib/logger.js";
import { loadConfig } from "./config.js";
import { main } from "./fetch_ms_scratchers.js";

async function run() {
  const config = loadConfig(process.argv.slice(2));
  await main(config);
}

run().catch((err) => {
  logger.error("[ms] fatal", describeError(err));
  process.exit(1);
});
