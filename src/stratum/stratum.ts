#!/usr/bin/env node
/**
 * stratum CLI entry point
 */

import { runStratumCli } from "./cli/main.js";

runStratumCli().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
