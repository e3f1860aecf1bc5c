import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

const RECORDS_PER_CHUNK = 4096;

const NEEDS_QUOTES = /[",\r\n]|^\s/;

export function formatCsvField(field: string): string {
  if (!NEEDS_QUOTES.test(field)) {
    return field;
  }
  return `"${field.replaceAll('"', '""')}"`;
}

export function formatCsvRecord(fields: readonly string[]): string {
  return `${fields.map(formatCsvField).join(",")}\n`;
}

export async function writeCsv(path: string, rows: Iterable<readonly string[]>): Promise<void> {
  await pipeline(Readable.from(csvChunks(rows)), createWriteStream(path));
}

function* csvChunks(rows: Iterable<readonly string[]>): Generator<string> {
  let chunk = "";
  let count = 0;
  for (const row of rows) {
    chunk += formatCsvRecord(row);
    count += 1;
    if (count === RECORDS_PER_CHUNK) {
      yield chunk;
      chunk = "";
      count = 0;
    }
  }
  if (chunk.length > 0) {
    yield chunk;
  }
}
