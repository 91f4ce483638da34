/**
 * Reads schema.sql and splits it into executable statements.
 */

import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Schema version written by schema.sql. */
export const SCHEMA_VERSION = 1;

/**
 * Load schema.sql from beside this module as individual statements.
 */
export function loadSchemaStatements(): string[] {
  const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
  return splitStatements(schema);
}

/**
 * Split SQL text on semicolons at line ends.
 * Comment lines before a statement are dropped; the trailing semicolon is removed.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current: string[] = [];

  for (const line of sql.split('\n')) {
    const trimmed = line.trim();
    if (current.length === 0 && (trimmed === '' || trimmed.startsWith('--'))) continue;

    current.push(line);
    if (trimmed.endsWith(';')) {
      const stmt = current.join('\n').trim().replace(/;$/, '').trim();
      if (stmt) statements.push(stmt);
      current = [];
    }
  }

  const rest = current.join('\n').trim();
  if (rest) statements.push(rest);

  return statements;
}
