/**
 * Record construction, ordering and display
 */

import type { PersonRecord, RecordInput } from "./types.js";

/**
 * Create a record; `deleted` defaults to false
 */
export function createRecord(input: RecordInput): PersonRecord {
  return {
    cpf: input.cpf,
    name: input.name,
    birthDate: input.birthDate,
    deleted: input.deleted ?? false,
  };
}

/**
 * Compare two CPF keys by UTF-16 code unit order
 * @returns Negative if a < b, 0 if equal, positive if a > b
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Compare two records by CPF
 */
export function compareRecords(a: PersonRecord, b: PersonRecord): number {
  return compareKeys(a.cpf, b.cpf);
}

/**
 * Records are equal when their CPFs are equal, regardless of other fields
 */
export function recordsEqual(a: PersonRecord, b: PersonRecord): boolean {
  return a.cpf === b.cpf;
}

/**
 * Deep copy of a record; the copy shares no mutable state with the source
 */
export function cloneRecord(record: PersonRecord): PersonRecord {
  return structuredClone(record);
}

/**
 * Human-readable single-line rendering
 * @example "CPF: 123, Name: Lucas, Birth date: 2005-07-10"
 */
export function formatRecord(record: PersonRecord): string {
  return `CPF: ${record.cpf}, Name: ${record.name}, Birth date: ${record.birthDate}`;
}
