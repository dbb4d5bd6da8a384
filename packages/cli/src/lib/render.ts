/**
 * Output rendering helpers
 */

type Color = "red" | "green" | "yellow";

/**
 * Destination for command output
 */
export interface Output {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Whether stderr is an interactive terminal (enables color) */
  colorErrors?: boolean;
}

/**
 * Output bound to the process streams
 */
export const processOutput: Output = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  colorErrors: process.stderr.isTTY ?? false,
};

/**
 * Print JSON to stdout
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(output: Output, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  output.stdout(json + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(output: Output, lines: string[]): void {
  lines.forEach((line) => output.stdout(line + "\n"));
}

/**
 * Apply ANSI color only when enabled
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
