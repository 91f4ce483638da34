/**
 * Minimal RFC 4180 CSV encoding for the exported diagnostics tables.
 */

import { MalformedAggregateError } from '../utils/errors.js';

export type TableCell = string | number;

/** A rendered table: header plus rows of the same width. */
export interface Table {
  columns: readonly string[];
  rows: TableCell[][];
}

function escapeCell(cell: TableCell): string {
  const text = typeof cell === 'number' ? String(cell) : cell;
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Serialize a table as CSV text with a trailing newline.
 */
export function toCsv(table: Table): string {
  const lines = [table.columns.map(escapeCell).join(',')];
  for (const row of table.rows) {
    lines.push(row.map(escapeCell).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Parse CSV text into rows of raw string cells.
 * Throws MalformedAggregateError on an unterminated quoted field.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        cell += ch;
      }
      i++;
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
    } else if (ch === '\n' || ch === '\r') {
      row.push(cell);
      rows.push(row);
      row = [];
      cell = '';
      if (ch === '\r' && text[i + 1] === '\n') i++;
    } else {
      cell += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new MalformedAggregateError('Unterminated quoted field in CSV', 'MALFORMED_CSV');
  }

  // Last line without a trailing newline
  if (cell.length > 0 || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }

  return rows;
}
