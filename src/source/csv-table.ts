import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { SourceFormatError, handleSourceOperation } from '../exception/index.js';

const csvRowsSchema = z.array(z.array(z.string()));

export type TableRow = Record<string, string>;

/**
 * Read a CSV file with a header row into objects keyed by column name.
 * Throws `SourceFormatError` when a required column is missing from the header.
 */
export function readTable(filePath: string, requiredColumns: readonly string[]): Promise<TableRow[]> {
  return handleSourceOperation(filePath, async () => {
    const content = await readFile(filePath, 'utf8');
    const rows = csvRowsSchema.parse(parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }));

    const [header, ...body] = rows;
    if (!header) {
      throw new SourceFormatError(422, `Missing header row in ${filePath}`);
    }
    const columns = header.map((column) => column.trim());
    const missing = requiredColumns.filter((column) => !columns.includes(column));
    if (missing.length > 0) {
      throw new SourceFormatError(422, `Missing column(s) ${missing.join(', ')} in ${filePath}`);
    }

    return body.map((cells) => {
      const row: TableRow = {};
      columns.forEach((column, index) => {
        row[column] = cells[index] ?? '';
      });
      return row;
    });
  })();
}

/**
 * Read a line-oriented file, dropping blank lines and `#` comments.
 */
export function readLines(filePath: string): Promise<string[]> {
  return handleSourceOperation(filePath, async () => {
    const content = await readFile(filePath, 'utf8');
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  })();
}
