/**
 * Index node: a record copy used for key comparison, plus the position of the
 * authoritative record in the record sequence
 */

import type { PersonRecord } from "../types.js";

export class IndexNode {
  left: IndexNode | undefined = undefined;
  right: IndexNode | undefined = undefined;

  constructor(
    public record: PersonRecord,
    public position: number
  ) {}

  get key(): string {
    return this.record.cpf;
  }
}
