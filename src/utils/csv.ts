import fs from 'fs/promises';
import { PreconditionFailedError } from '../core/errors.js';
import type { NormalizedRow } from '../core/types.js';

/**
 * Minimal RFC 4180 CSV reader/writer
 *
 * Quoted fields may contain commas, doubled quotes and line breaks.
 * Line endings may be LF or CRLF.
 */

export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  // Strip UTF-8 BOM
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
      if (char === '\r' && text[i + 1] === '\n') i++;
    } else {
      field += char;
    }
    i++;
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  // Drop blank lines
  return rows.filter((r) => !(r.length === 1 && r[0] === ''));
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(columns: readonly string[], rows: readonly NormalizedRow[]): string {
  const lines = [columns.map(escapeField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeField(row[column] ?? '')).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Header row + data rows to one mapping per data row
 *
 * Short rows leave trailing columns absent; extra cells are ignored.
 */
export function tableToRecords(table: readonly string[][]): Record<string, string>[] {
  if (table.length === 0) {
    throw new PreconditionFailedError([], 'Input file has no header row');
  }

  const header = table[0].map((h) => h.trim());
  return table.slice(1).map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((column, idx) => {
      if (column && idx < cells.length) {
        record[column] = cells[idx];
      }
    });
    return record;
  });
}

/**
 * Load raw input rows from a CSV file
 */
export async function loadCsvRecords(filePath: string): Promise<Record<string, string>[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return tableToRecords(parseCsv(content));
}
