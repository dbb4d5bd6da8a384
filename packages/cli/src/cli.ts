#!/usr/bin/env node

/**
 * Record Index CLI entry point
 */

import { run } from "./program.js";

async function main() {
  process.exitCode = await run(process.argv);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
