/**
 * Minimal CSV reading for the reference lists: comma separated, double
 * quotes group a field (a doubled quote inside quotes is a literal quote),
 * blank lines are ignored, header names are matched case-insensitively.
 */

import { ReferenceDataError } from './errors.js';

export function splitCsvLine(line: string): string[] {
  const out: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i += 1;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }
    if (ch === ',' && !inQuotes) {
      out.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }
  out.push(current.trim());
  return out;
}

export function parseCsvTable(content: string, source: string): { header: string[]; rows: string[][] } {
  const lines = content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const firstLine = lines[0];
  if (firstLine === undefined) {
    throw new ReferenceDataError('CSV header missing', source);
  }
  const header = splitCsvLine(firstLine).map((v) => v.toLowerCase());
  const rows: string[][] = [];
  for (let i = 1; i < lines.length; i += 1) {
    const line = lines[i];
    if (line === undefined) continue;
    rows.push(splitCsvLine(line));
  }
  return { header, rows };
}

/**
 * Values of one named column, in file order. Empty cells are dropped.
 */
export function readCsvColumn(content: string, column: string, source: string): string[] {
  const { header, rows } = parseCsvTable(content, source);
  const idx = header.indexOf(column.toLowerCase());
  if (idx < 0) {
    throw new ReferenceDataError(`CSV header must include a ${column} column`, source);
  }

  const values: string[] = [];
  for (const cols of rows) {
    const value = cols[idx];
    if (!value) continue;
    values.push(value);
  }
  return values;
}
