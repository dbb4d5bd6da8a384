/**
 * Binary search tree index over a record sequence
 *
 * Keys are CPFs; each node holds its own copy of the record (for key comparison)
 * and the position of the authoritative record in the sequence.
 *
 * Invariants:
 * - Every key in a left subtree is strictly less than its ancestor's key,
 *   every key in a right subtree strictly greater
 * - No two nodes share a key; inserting an existing key is a no-op
 * - No rebalancing: height depends on insertion order and can reach `size`
 * - Positions are stored as given and never validated against the sequence
 */

import { cloneRecord, compareKeys } from "../record.js";
import { logger } from "../observability/logs.js";
import { metrics } from "../observability/metrics.js";
import type { IndexStats, PersonRecord, TraversalOrder } from "../types.js";
import { IndexNode } from "./node.js";
import { postOrder, traverseNodes } from "./traversal.js";

export class RecordIndex {
  #root: IndexNode | undefined = undefined;
  #size = 0;

  /**
   * Build an index whose positions are the records' offsets in `records`
   */
  static fromRecords(records: Iterable<PersonRecord>): RecordIndex {
    const index = new RecordIndex();
    let position = 0;
    for (const record of records) {
      index.insert(record, position++);
    }
    logger.debug("index.build", { details: { records: position, indexed: index.size } });
    return index;
  }

  /** Number of indexed keys */
  get size(): number {
    return this.#size;
  }

  /** Root node, for read-only inspection */
  get root(): IndexNode | undefined {
    return this.#root;
  }

  isEmpty(): boolean {
    return this.#root === undefined;
  }

  /**
   * Index a record at a position in the record sequence.
   *
   * The record is copied into the new node. If the key is already indexed the call
   * changes nothing; `search` first when the caller needs to know.
   */
  insert(record: PersonRecord, position: number): void {
    const node = new IndexNode(cloneRecord(record), position);

    if (!this.#root) {
      this.#root = node;
      this.#inserted(node);
      return;
    }

    let current = this.#root;
    for (;;) {
      const cmp = compareKeys(record.cpf, current.key);
      if (cmp === 0) {
        metrics.increment("duplicateInserts");
        logger.debug("index.insert.duplicate", { cpf: record.cpf, position });
        return;
      }

      if (cmp < 0) {
        if (!current.left) {
          current.left = node;
          break;
        }
        current = current.left;
      } else {
        if (!current.right) {
          current.right = node;
          break;
        }
        current = current.right;
      }
    }

    this.#inserted(node);
  }

  #inserted(node: IndexNode): void {
    this.#size++;
    metrics.increment("inserts");
    logger.debug("index.insert", { cpf: node.key, position: node.position });
  }

  /**
   * Find the node holding a key
   * @returns The node, or undefined if the key is not indexed
   */
  search(cpf: string): IndexNode | undefined {
    let current = this.#root;
    while (current) {
      const cmp = compareKeys(cpf, current.key);
      if (cmp === 0) return current;
      current = cmp < 0 ? current.left : current.right;
    }
    return undefined;
  }

  has(cpf: string): boolean {
    return this.search(cpf) !== undefined;
  }

  /**
   * Remove a key from the index (Hibbard deletion).
   *
   * A node with two children keeps its place in the tree and takes over the record
   * and position of its in-order successor, whose node is then unlinked. Removing
   * a key that is not indexed changes nothing.
   */
  remove(cpf: string): void {
    let parent: IndexNode | undefined;
    let node = this.#root;
    while (node) {
      const cmp = compareKeys(cpf, node.key);
      if (cmp === 0) break;
      parent = node;
      node = cmp < 0 ? node.left : node.right;
    }

    if (!node) {
      metrics.increment("missedRemoves");
      logger.debug("index.remove.missing", { cpf });
      return;
    }

    const right = node.right;
    if (node.left && right) {
      // Successor: leftmost node of the right subtree; it has no left child
      let successorParent = node;
      let successor = right;
      while (successor.left) {
        successorParent = successor;
        successor = successor.left;
      }

      node.record = successor.record;
      node.position = successor.position;

      if (successorParent === node) {
        successorParent.right = successor.right;
      } else {
        successorParent.left = successor.right;
      }
    } else {
      this.#replaceChild(parent, node, node.left ?? right);
    }

    this.#size--;
    metrics.increment("removes");
    logger.debug("index.remove", { cpf });
  }

  #replaceChild(
    parent: IndexNode | undefined,
    child: IndexNode,
    replacement: IndexNode | undefined
  ): void {
    if (!parent) {
      this.#root = replacement;
    } else if (parent.left === child) {
      parent.left = replacement;
    } else {
      parent.right = replacement;
    }
  }

  /**
   * Deep copy: no node or record is shared between this index and the copy
   */
  copy(): RecordIndex {
    const clone = new RecordIndex();
    if (!this.#root) return clone;

    const cloneNode = (source: IndexNode): IndexNode =>
      new IndexNode(cloneRecord(source.record), source.position);

    const root = cloneNode(this.#root);
    const pending: Array<[IndexNode, IndexNode]> = [[this.#root, root]];
    let pair: [IndexNode, IndexNode] | undefined;
    while ((pair = pending.pop())) {
      const [source, target] = pair;
      if (source.left) {
        target.left = cloneNode(source.left);
        pending.push([source.left, target.left]);
      }
      if (source.right) {
        target.right = cloneNode(source.right);
        pending.push([source.right, target.right]);
      }
    }

    clone.#root = root;
    clone.#size = this.#size;
    logger.debug("index.copy", { details: { size: this.#size } });
    return clone;
  }

  /**
   * Remove every node, leaving the index empty
   */
  clear(): void {
    // Post-order teardown: a node is unlinked only after both its subtrees
    for (const node of postOrder(this.#root)) {
      node.left = undefined;
      node.right = undefined;
    }
    const removed = this.#size;
    this.#root = undefined;
    this.#size = 0;
    logger.debug("index.clear", { details: { removed } });
  }

  /**
   * Records in the given order; an empty index yields an empty array
   */
  traverse(order: TraversalOrder): PersonRecord[] {
    return Array.from(traverseNodes(this.#root, order), (node) => node.record);
  }

  /**
   * Nodes in the given order, produced lazily
   */
  traverseNodes(order: TraversalOrder): Generator<IndexNode> {
    return traverseNodes(this.#root, order);
  }

  /**
   * Sorted CPFs (in-order)
   */
  keys(): string[] {
    return Array.from(traverseNodes(this.#root, "in"), (node) => node.key);
  }

  /**
   * Record with the smallest key
   */
  min(): PersonRecord | undefined {
    let current = this.#root;
    while (current?.left) current = current.left;
    return current?.record;
  }

  /**
   * Record with the largest key
   */
  max(): PersonRecord | undefined {
    let current = this.#root;
    while (current?.right) current = current.right;
    return current?.record;
  }

  /**
   * Number of levels: 0 when empty, 1 for a single node
   */
  height(): number {
    if (!this.#root) return 0;

    let height = 0;
    let level: IndexNode[] = [this.#root];
    while (level.length > 0) {
      height++;
      const next: IndexNode[] = [];
      for (const node of level) {
        if (node.left) next.push(node.left);
        if (node.right) next.push(node.right);
      }
      level = next;
    }
    return height;
  }

  stats(): IndexStats {
    return { size: this.#size, height: this.height() };
  }

  [Symbol.iterator](): Iterator<PersonRecord> {
    return this.traverse("in")[Symbol.iterator]();
  }
}
