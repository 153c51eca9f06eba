/**
 * Snapshot Parser
 *
 * Turns the relay feed's CSV export into a header plus rows. The feed wraps
 * its table in `*`-prefixed comment lines and marks the header with a
 * leading `#`; data rows are sometimes shorter than the header. A quote
 * inside an unquoted cell is kept as a literal character.
 */

import { parse } from "csv-parse/sync";
import { errorMessage, formatError } from "../utils/errors";

export interface SnapshotTable {
  header: string[];
  rows: string[][];
}

interface SourceLine {
  text: string;
  number: number;
}

const COMMENT_PREFIX = "*";
const HEADER_PREFIX = "#";

export function parseSnapshot(text: string): SnapshotTable {
  const lines: SourceLine[] = text
    .split(/\r\n|\n|\r/)
    .map((raw, idx) => ({ text: raw.trim(), number: idx + 1 }))
    .filter((line) => line.text.length > 0);

  const content = stripCommentBlocks(lines);

  const [headerLine, ...dataLines] = content;
  if (!headerLine.text.startsWith(HEADER_PREFIX)) {
    throw formatError("Snapshot must start with a '#' header line", { line: headerLine.number });
  }
  const strayHeader = dataLines.find((line) => line.text.startsWith(HEADER_PREFIX));
  if (strayHeader) {
    throw formatError("Only one '#' header line is allowed", { line: strayHeader.number });
  }

  const header = parseCsv(headerLine.text.slice(HEADER_PREFIX.length))[0] ?? [];
  const nCols = header.length;

  const records = parseCsv(dataLines.map((line) => line.text).join("\n"));
  const rows = records.map((record, idx) => {
    if (record.length > nCols) {
      throw formatError(`Too many columns on row ${idx + 1}: found ${record.length}, header has ${nCols}`, {
        row: idx + 1,
      });
    }
    if (record.length < nCols) {
      return [...record, ...new Array<string>(nCols - record.length).fill("")];
    }
    return record;
  });

  return { header, rows };
}

/**
 * Drops the leading and trailing comment blocks. Anything left must be
 * comment-free and non-empty.
 */
function stripCommentBlocks(lines: SourceLine[]): SourceLine[] {
  const first = lines.findIndex((line) => !line.text.startsWith(COMMENT_PREFIX));
  if (first === -1) {
    throw formatError("Snapshot has no data: every line is a comment or blank");
  }

  let last = lines.length - 1;
  while (lines[last].text.startsWith(COMMENT_PREFIX)) last--;

  const content = lines.slice(first, last + 1);
  const stray = content.find((line) => line.text.startsWith(COMMENT_PREFIX));
  if (stray) {
    throw formatError("Comment found in the middle of the snapshot", { line: stray.number });
  }
  return content;
}

function parseCsv(text: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, { relax_column_count: true, relax_quotes: true, skip_empty_lines: true });
  } catch (error) {
    throw formatError("Malformed CSV text could not be parsed", { reason: errorMessage(error) });
  }

  if (!Array.isArray(parsed)) {
    throw formatError("CSV parser returned an unexpected structure");
  }
  return parsed.map((record: unknown) => {
    if (!Array.isArray(record)) {
      throw formatError("CSV parser returned an unexpected record");
    }
    return record.map((cell: unknown) => String(cell));
  });
}
