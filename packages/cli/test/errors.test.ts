/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import { InvalidRecordError, RecordPositionError } from "@record-index/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should use the exit code of a CliError", () => {
      expect(mapSdkErrorToExitCode(new CliError("deleted", { exitCode: 3 }))).toBe(3);
    });

    it("should use the exit code of a commander error", () => {
      expect(mapSdkErrorToExitCode(new CommanderError(0, "commander.version", "0.1.0"))).toBe(0);
      expect(mapSdkErrorToExitCode(new InvalidArgumentError("bad"))).toBe(1);
    });

    it("should fall through to exit code 1 for SDK errors", () => {
      expect(mapSdkErrorToExitCode(new InvalidRecordError([{ path: "cpf", message: "x" }]))).toBe(
        1
      );
      expect(mapSdkErrorToExitCode(new RecordPositionError("1", 4, 2))).toBe(1);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapSdkErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapSdkErrorToExitCode("string error")).toBe(1);
      expect(mapSdkErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      const err = new Error("test error");
      expect(formatCliError(err)).toBe("test error");
    });

    it("should truncate long messages", () => {
      const longMessage = "x".repeat(3000);
      const formatted = formatCliError(new Error(longMessage));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include cause in verbose mode", () => {
      const err = new Error("wrapper", { cause: new Error("underlying") });

      const formatted = formatCliError(err, true);
      expect(formatted).toContain("\n  Cause: Error: underlying");
    });

    it("should not include stack in non-verbose mode", () => {
      const err = new Error("test");
      expect(formatCliError(err, false)).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
