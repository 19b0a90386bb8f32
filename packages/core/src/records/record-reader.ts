import { extname } from 'node:path';
import { parse } from 'csv-parse/sync';
import { MalformedSourceError } from '../shared/errors.js';
import { parseStructuredText, readSourceText } from '../shared/source-reader.js';
import type { AlertRecord } from '../rules-engine/types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Plain decimals only: "0x1A", "1e3" and "007" stay text.
const DECIMAL = /^-?(0|[1-9]\d*)(\.\d+)?$/;

/**
 * CSV with a header row. Decimal cells become numbers, empty cells are left
 * out so a rule on that column sees the field as missing.
 */
export function parseCsvRecords(content: string, source: string): AlertRecord[] {
  let rows: unknown;
  try {
    rows = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      cast: (value, context) => {
        if (context.header || !DECIMAL.test(value)) return value;
        return Number(value);
      },
    });
  } catch (error) {
    throw new MalformedSourceError(source, 'not valid CSV', error);
  }
  return toRecords(rows, source).map(dropEmptyCells);
}

function dropEmptyCells(record: AlertRecord): AlertRecord {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== ''));
}

/**
 * Validate a parsed record document: an array of objects, or `{ records: [...] }`.
 */
export function toRecords(document: unknown, source: string): AlertRecord[] {
  const entries = isPlainObject(document) ? document.records : document;
  if (!Array.isArray(entries)) {
    throw new MalformedSourceError(source, 'expected an array of records or { records: [...] }');
  }

  return entries.map((entry: unknown, index) => {
    if (!isPlainObject(entry)) {
      throw new MalformedSourceError(source, `record #${index} is not an object`);
    }
    return entry;
  });
}

/**
 * Read records from a .csv, .json, .yaml or .yml file.
 */
export function loadRecordsFromFile(filePath: string): AlertRecord[] {
  const content = readSourceText(filePath);
  if (extname(filePath).toLowerCase() === '.csv') {
    return parseCsvRecords(content, filePath);
  }
  return toRecords(parseStructuredText(content, filePath), filePath);
}
