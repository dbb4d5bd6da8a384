/**
 * Query helpers resolving index entries against the record sequence
 *
 * The index only locates records. Content and deletion state always come from the
 * sequence, so a key can be indexed yet resolve to a deleted record.
 */

import { RecordPositionError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { IndexNode } from "./tree/node.js";
import type { RecordIndex } from "./tree/bst.js";
import type { LookupResult, PersonRecord, RecordSequence } from "./types.js";

function resolve(node: IndexNode, sequence: RecordSequence): PersonRecord {
  const record = sequence.get(node.position);
  if (!record) {
    logger.error("query.position.invalid", {
      cpf: node.key,
      position: node.position,
      details: { length: sequence.length },
    });
    throw new RecordPositionError(node.key, node.position, sequence.length);
  }
  return record;
}

/**
 * Look up a CPF through the index and fetch the record from the sequence
 *
 * @throws RecordPositionError if the stored position is outside the sequence
 */
export function lookupByKey(
  index: RecordIndex,
  sequence: RecordSequence,
  cpf: string
): LookupResult {
  const node = index.search(cpf);
  if (!node) {
    metrics.increment("lookupMisses");
    logger.debug("query.lookup", { cpf, message: "not found" });
    return { status: "not-found" };
  }

  const record = resolve(node, sequence);
  if (record.deleted) {
    metrics.increment("lookupDeleted");
    logger.debug("query.lookup", { cpf, position: node.position, message: "deleted" });
    return { status: "deleted", record, position: node.position };
  }

  metrics.increment("lookupHits");
  logger.debug("query.lookup", { cpf, position: node.position, message: "found" });
  return { status: "found", record, position: node.position };
}

/**
 * New array of the sequence's records in ascending CPF order (in-order traversal).
 *
 * Deleted records are included; neither the index nor the sequence is modified.
 *
 * @throws RecordPositionError if a stored position is outside the sequence
 */
export function materializeSorted(index: RecordIndex, sequence: RecordSequence): PersonRecord[] {
  const sorted: PersonRecord[] = [];
  for (const node of index.traverseNodes("in")) {
    sorted.push(resolve(node, sequence));
  }
  return sorted;
}
