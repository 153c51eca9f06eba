/**
 * Column lookup for snapshot rows
 */

import { schemaMismatchError } from "../utils/errors";

export type ColumnIndex = ReadonlyMap<string, number>;

export function indexColumns(header: readonly string[]): ColumnIndex {
  const index = new Map<string, number>();
  header.forEach((heading, idx) => {
    if (!index.has(heading)) index.set(heading, idx);
  });
  return index;
}

/** Reads one cell by heading; cells past the end of a short row read as "" */
export function readCell(columns: ColumnIndex, row: readonly string[], heading: string): string {
  const idx = columns.get(heading);
  if (idx === undefined) {
    throw schemaMismatchError([heading], []);
  }
  return row[idx] ?? "";
}
