/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" style references are left untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the records file
 * Priority: CLI option > RECORD_INDEX_FILE env var > default "./records.json"
 */
export function resolveRecordsFile(cliFile?: string): string {
  const file = cliFile ?? process.env.RECORD_INDEX_FILE ?? "./records.json";
  return path.resolve(expandTilde(file));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.RECORD_INDEX_CLI_DEBUG === "1";
}
