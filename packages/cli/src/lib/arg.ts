/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { TRAVERSAL_ORDERS, type TraversalOrder } from "@record-index/sdk";

/**
 * Parse a traversal order argument
 */
export function parseTraversalOrder(value: string): TraversalOrder {
  const order = TRAVERSAL_ORDERS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!order) {
    throw new InvalidArgumentError(`Allowed orders: ${TRAVERSAL_ORDERS.join(", ")}.`);
  }
  return order;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
