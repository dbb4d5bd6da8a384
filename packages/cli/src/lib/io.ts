/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      throw new CliError(`Records file not found: ${filePath}`, { cause: err });
    }
    throw new CliError(`Failed to read records file: ${filePath}`, { cause: err });
  }
  return parseJson(content, `file ${filePath}`);
}
