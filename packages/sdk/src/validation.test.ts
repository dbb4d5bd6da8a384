import { describe, it, expect } from "vitest";
import { parseRecord, parseRecords } from "./validation.js";
import { InvalidRecordError } from "./errors.js";

describe("parseRecord", () => {
  it("should accept a valid record and default deleted", () => {
    expect(parseRecord({ cpf: "123", name: "Lucas", birthDate: "2005-07-10" })).toEqual({
      cpf: "123",
      name: "Lucas",
      birthDate: "2005-07-10",
      deleted: false,
    });
  });

  it("should reject an empty CPF", () => {
    expect(() => parseRecord({ cpf: "", name: "A", birthDate: "" })).toThrow(
      "Invalid record input: cpf: cpf must be a non-empty string"
    );
  });

  it("should reject unknown fields", () => {
    expect(() => parseRecord({ cpf: "1", name: "A", birthDate: "", age: 3 })).toThrow(
      InvalidRecordError
    );
  });

  it("should expose issues and the stable code", () => {
    try {
      parseRecord({ cpf: 123, name: "A" });
      expect.fail("expected parseRecord to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidRecordError);
      if (err instanceof InvalidRecordError) {
        expect(err.code).toBe("E_INVALID_RECORD");
        expect(err.name).toBe("InvalidRecordError");
        expect(err.issues.map((issue) => issue.path)).toEqual(["cpf", "birthDate"]);
      }
    }
  });
});

describe("parseRecords", () => {
  it("should parse an array of inputs in order", () => {
    const records = parseRecords([
      { cpf: "2", name: "B", birthDate: "", deleted: true },
      { cpf: "1", name: "A", birthDate: "" },
    ]);
    expect(records.map((record) => [record.cpf, record.deleted])).toEqual([
      ["2", true],
      ["1", false],
    ]);
  });

  it("should prefix issue paths with the array offset", () => {
    try {
      parseRecords([{ cpf: "1", name: "A", birthDate: "" }, { cpf: "2", name: "B" }]);
      expect.fail("expected parseRecords to throw");
    } catch (err) {
      expect(err instanceof InvalidRecordError && err.issues[0]?.path).toBe("1.birthDate");
    }
  });

  it("should reject a non-array", () => {
    expect(() => parseRecords({ cpf: "1" })).toThrow(InvalidRecordError);
  });
});
