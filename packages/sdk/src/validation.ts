/**
 * Validation of record input
 */

import { z } from "zod";
import { InvalidRecordError, type RecordIssue } from "./errors.js";
import { createRecord } from "./record.js";
import type { PersonRecord } from "./types.js";

export const RecordInputSchema = z
  .object({
    cpf: z.string().min(1, "cpf must be a non-empty string"),
    name: z.string(),
    birthDate: z.string(),
    deleted: z.boolean().optional(),
  })
  .strict();

export const RecordInputListSchema = z.array(RecordInputSchema);

function toIssues(error: z.ZodError): RecordIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validate a single record input
 * @throws InvalidRecordError listing every issue
 */
export function parseRecord(value: unknown): PersonRecord {
  const result = RecordInputSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidRecordError(toIssues(result.error), { cause: result.error });
  }
  return createRecord(result.data);
}

/**
 * Validate an array of record inputs
 * @throws InvalidRecordError listing every issue, paths prefixed with the array offset
 */
export function parseRecords(value: unknown): PersonRecord[] {
  const result = RecordInputListSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidRecordError(toIssues(result.error), { cause: result.error });
  }
  return result.data.map(createRecord);
}
