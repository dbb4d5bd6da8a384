/**
 * Loads a records file into a record list and builds its index
 */

import { RecordIndex, RecordList, parseRecords } from "@record-index/sdk";
import { readJsonFromFile } from "./io.js";

export interface LoadedRecords {
  file: string;
  list: RecordList;
  index: RecordIndex;
}

/**
 * Read a JSON array of records; positions are the array offsets
 */
export async function loadRecords(file: string): Promise<LoadedRecords> {
  const raw = await readJsonFromFile(file);
  const list = new RecordList(parseRecords(raw));
  const index = RecordIndex.fromRecords(list);
  return { file, list, index };
}
