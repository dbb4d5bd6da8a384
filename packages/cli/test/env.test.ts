/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { resolveRecordsFile, isVerbose } from "../src/lib/env.js";
import * as path from "node:path";
import { homedir } from "node:os";

describe("environment resolution", () => {
  let originalFile: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalFile = process.env.RECORD_INDEX_FILE;
    originalDebug = process.env.RECORD_INDEX_CLI_DEBUG;
  });

  afterEach(() => {
    if (originalFile !== undefined) {
      process.env.RECORD_INDEX_FILE = originalFile;
    } else {
      delete process.env.RECORD_INDEX_FILE;
    }
    if (originalDebug !== undefined) {
      process.env.RECORD_INDEX_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.RECORD_INDEX_CLI_DEBUG;
    }
  });

  describe("resolveRecordsFile", () => {
    it("should use CLI option when provided", () => {
      process.env.RECORD_INDEX_FILE = "/env/records.json";
      expect(resolveRecordsFile("/cli/records.json")).toBe(path.resolve("/cli/records.json"));
    });

    it("should use RECORD_INDEX_FILE when CLI option not provided", () => {
      process.env.RECORD_INDEX_FILE = "/env/records.json";
      expect(resolveRecordsFile()).toBe(path.resolve("/env/records.json"));
    });

    it("should default to ./records.json", () => {
      delete process.env.RECORD_INDEX_FILE;
      expect(resolveRecordsFile()).toBe(path.resolve("./records.json"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveRecordsFile("~/data/records.json")).toBe(
        path.join(homedir(), "data/records.json")
      );
      expect(resolveRecordsFile("~")).toBe(homedir());
    });

    it("should leave ~user references untouched", () => {
      expect(resolveRecordsFile("~other/records.json")).toBe(path.resolve("~other/records.json"));
    });
  });

  describe("isVerbose", () => {
    it("should be enabled only by RECORD_INDEX_CLI_DEBUG=1", () => {
      delete process.env.RECORD_INDEX_CLI_DEBUG;
      expect(isVerbose()).toBe(false);
      process.env.RECORD_INDEX_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
