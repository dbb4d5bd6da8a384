/**
 * In-memory append-only record list
 *
 * Holds the authoritative record content and deletion state. Records are never
 * removed or moved, so positions handed out by `append` stay valid.
 */

import { createRecord } from "./record.js";
import type { PersonRecord, RecordInput, RecordSequence } from "./types.js";

export class RecordList implements RecordSequence, Iterable<PersonRecord> {
  #records: PersonRecord[] = [];

  constructor(records: Iterable<RecordInput> = []) {
    for (const record of records) {
      this.append(record);
    }
  }

  get length(): number {
    return this.#records.length;
  }

  /**
   * Append a record
   * @returns The position of the new record
   */
  append(input: RecordInput): number {
    this.#records.push(createRecord(input));
    return this.#records.length - 1;
  }

  get(position: number): PersonRecord | undefined {
    if (!Number.isInteger(position) || position < 0) return undefined;
    return this.#records[position];
  }

  /**
   * Mark the record at a position as logically deleted
   * @returns false if the position is out of range or already deleted
   */
  markDeleted(position: number): boolean {
    const record = this.get(position);
    if (!record || record.deleted) return false;
    record.deleted = true;
    return true;
  }

  /**
   * Position of the first record with a CPF, by linear scan
   */
  indexOf(cpf: string): number {
    return this.#records.findIndex((record) => record.cpf === cpf);
  }

  toArray(): PersonRecord[] {
    return [...this.#records];
  }

  [Symbol.iterator](): Iterator<PersonRecord> {
    return this.#records[Symbol.iterator]();
  }
}
