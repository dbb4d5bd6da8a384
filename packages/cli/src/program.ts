/**
 * Command definitions for the record index CLI
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import {
  formatRecord,
  lookupByKey,
  materializeSorted,
  type PersonRecord,
  type TraversalOrder,
} from "@record-index/sdk";
import { isVerbose, resolveRecordsFile } from "./lib/env.js";
import { parseTraversalOrder } from "./lib/arg.js";
import { loadRecords } from "./lib/records.js";
import { printJson, printLines, colorize, processOutput, type Output } from "./lib/render.js";
import {
  CliError,
  EXIT_DELETED,
  EXIT_NOT_FOUND,
  mapSdkErrorToExitCode,
  formatCliError,
} from "./lib/errors.js";
import { withTiming, type MetricSink } from "./lib/telemetry.js";

const localRequire = createRequire(import.meta.url);

type GlobalOptions = {
  file?: string;
  verbose?: boolean;
};

interface JsonOptions {
  json?: boolean;
  raw?: boolean;
}

/**
 * Read this package's version; resolved by package name so it is found from the
 * sources and from the compiled output under dist/ alike
 */
export function readVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(localRequire.resolve("@record-index/cli/package.json"), "utf-8")
  );
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

function describeRecord(record: PersonRecord): string {
  return record.deleted ? `${formatRecord(record)} [deleted]` : formatRecord(record);
}

/**
 * Build the CLI program writing to the given output
 */
export function createProgram(output: Output = processOutput): Command {
  const program = new Command();

  // Configure output and errors before any subcommand so they inherit it
  program
    .configureOutput({
      writeOut: (str) => output.stdout(str),
      writeErr: (str) => output.stderr(colorize(str, "red", output.colorErrors ?? false)),
    })
    .exitOverride();

  // Global options
  program
    .name("record-index")
    .description("Record Index - look up person records by CPF through a binary search tree")
    .version(readVersion())
    .option("--file <path>", "Records file (JSON array)")
    .option("--verbose", "Verbose diagnostics");

  const load = () => loadRecords(resolveRecordsFile(program.opts<GlobalOptions>().file));
  const timing = (): MetricSink => ({
    output,
    enabled: isVerbose() || (program.opts<GlobalOptions>().verbose ?? false),
  });

  // Lookup command
  program
    .command("lookup <cpf>")
    .description("Look up a record by CPF")
    .option("--json", "Output as JSON")
    .action(async (cpf: string, options: JsonOptions) => {
      await withTiming(timing(), "lookup", async () => {
        const { list, index } = await load();
        const result = lookupByKey(index, list, cpf);

        if (result.status === "not-found") {
          throw new CliError(`Record not found: ${cpf}`, { exitCode: EXIT_NOT_FOUND });
        }
        if (result.status === "deleted") {
          throw new CliError(`Record deleted: ${cpf}`, { exitCode: EXIT_DELETED });
        }

        if (options.json) {
          printJson(output, { position: result.position, record: result.record });
        } else {
          printLines(output, [formatRecord(result.record)]);
        }
      });
    });

  // Sorted command
  program
    .command("sorted")
    .description("List records in ascending CPF order")
    .option("--json", "Output as JSON array")
    .option("--raw", "Output compact JSON (with --json)")
    .action(async (options: JsonOptions) => {
      await withTiming(timing(), "sorted", async () => {
        const { list, index } = await load();
        const sorted = materializeSorted(index, list);

        if (options.json) {
          printJson(output, sorted, { raw: options.raw });
        } else {
          printLines(output, sorted.map(describeRecord));
        }
      });
    });

  // Traverse command
  program
    .command("traverse")
    .description("List indexed CPFs in traversal order")
    .argument("<order>", "pre, in, post or breadth", parseTraversalOrder)
    .option("--json", "Output as JSON array")
    .action(async (order: TraversalOrder, options: JsonOptions) => {
      await withTiming(timing(), "traverse", async () => {
        const { index } = await load();
        const cpfs = index.traverse(order).map((record) => record.cpf);

        if (options.json) {
          printJson(output, cpfs, { raw: true });
        } else {
          printLines(output, cpfs);
        }
      });
    });

  // Stats command
  program
    .command("stats")
    .description("Show record and index statistics")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: JsonOptions) => {
      await withTiming(timing(), "stats", async () => {
        const { list, index } = await load();
        const stats = {
          records: list.length,
          deleted: list.toArray().filter((record) => record.deleted).length,
          indexed: index.size,
          height: index.height(),
        };

        if (options.json) {
          printJson(output, stats, { raw: true });
        } else {
          printLines(output, [
            `Records: ${stats.records}`,
            `Deleted: ${stats.deleted}`,
            `Indexed: ${stats.indexed}`,
            `Height: ${stats.height}`,
          ]);
        }
      });
    });

  return program;
}

/**
 * Parse and run a command line
 * @returns The process exit code
 */
export async function run(argv: string[], output: Output = processOutput): Promise<number> {
  const program = createProgram(output);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander has already written its own message (or help/version output),
    // except for argument errors raised inside an action
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode;
    }

    const verbose = isVerbose() || (program.opts<GlobalOptions>().verbose ?? false);
    output.stderr(`Error: ${formatCliError(err, verbose)}\n`);
    return mapSdkErrorToExitCode(err);
  }
}
