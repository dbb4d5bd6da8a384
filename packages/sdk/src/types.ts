/**
 * Core types for the record index
 */

/**
 * A person record stored in the external record list.
 *
 * Ordering and equality are defined by `cpf` alone.
 */
export interface PersonRecord {
  /** Taxpayer identifier, the index key (compared lexicographically) */
  cpf: string;
  /** Display name */
  name: string;
  /** Date of birth, opaque to the index */
  birthDate: string;
  /** Logical deletion flag, written only by the record list */
  deleted: boolean;
}

/**
 * Input shape accepted when creating a record; `deleted` defaults to false
 */
export type RecordInput = Omit<PersonRecord, "deleted"> & { deleted?: boolean };

/**
 * Position-addressable record sequence that holds the authoritative record content.
 *
 * Positions are zero-based and must stay stable for the lifetime of an index built
 * over the sequence. Rebuild the index after any compaction.
 */
export interface RecordSequence {
  /**
   * Fetch the record at a position
   * @returns The record, or undefined if the position is out of range
   */
  get(position: number): PersonRecord | undefined;

  /** Number of slots in the sequence, deleted records included */
  readonly length: number;
}

/**
 * Traversal orders supported by the index
 */
export type TraversalOrder = "pre" | "in" | "post" | "breadth";

/**
 * All traversal orders, in declaration order
 */
export const TRAVERSAL_ORDERS: readonly TraversalOrder[] = ["pre", "in", "post", "breadth"];

/**
 * Outcome of resolving a key through the index and the record sequence
 */
export type LookupResult =
  | { status: "found"; record: PersonRecord; position: number }
  | { status: "deleted"; record: PersonRecord; position: number }
  | { status: "not-found" };

/**
 * Shape summary of an index
 */
export interface IndexStats {
  /** Number of indexed keys */
  size: number;
  /** Number of levels (0 for an empty index) */
  height: number;
}
