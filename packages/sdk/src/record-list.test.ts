import { describe, it, expect } from "vitest";
import { RecordList } from "./record-list.js";

describe("RecordList", () => {
  it("should append records at increasing positions", () => {
    const list = new RecordList();
    expect(list.append({ cpf: "123", name: "Lucas", birthDate: "2005-07-10" })).toBe(0);
    expect(list.append({ cpf: "456", name: "Ana", birthDate: "2002-03-15" })).toBe(1);
    expect(list.length).toBe(2);
    expect(list.get(1)?.name).toBe("Ana");
  });

  it("should return undefined outside its range", () => {
    const list = new RecordList([{ cpf: "1", name: "A", birthDate: "" }]);
    expect(list.get(1)).toBeUndefined();
    expect(list.get(-1)).toBeUndefined();
    expect(list.get(0.5)).toBeUndefined();
  });

  it("should mark a record deleted once", () => {
    const list = new RecordList([{ cpf: "1", name: "A", birthDate: "" }]);
    expect(list.markDeleted(0)).toBe(true);
    expect(list.get(0)?.deleted).toBe(true);
    expect(list.markDeleted(0)).toBe(false);
    expect(list.markDeleted(5)).toBe(false);
    expect(list.length).toBe(1);
  });

  it("should find positions by linear scan", () => {
    const list = new RecordList([
      { cpf: "1", name: "A", birthDate: "" },
      { cpf: "2", name: "B", birthDate: "" },
    ]);
    expect(list.indexOf("2")).toBe(1);
    expect(list.indexOf("3")).toBe(-1);
  });

  it("should iterate in position order and copy out", () => {
    const list = new RecordList([
      { cpf: "2", name: "B", birthDate: "" },
      { cpf: "1", name: "A", birthDate: "" },
    ]);
    expect([...list].map((record) => record.cpf)).toEqual(["2", "1"]);

    const array = list.toArray();
    array.pop();
    expect(list.length).toBe(2);
  });
});
