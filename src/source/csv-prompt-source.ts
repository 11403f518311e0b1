import { writeFile } from 'node:fs/promises';
import { stringify } from 'csv-stringify/sync';
import logger from '../logger/logger.js';
import { handleSourceOperation } from '../exception/index.js';
import { readLines, readTable } from './csv-table.js';
import { PromptSink, PromptSource } from './prompt-source.js';
import {
  CATEGORY_COLUMN,
  OUTPUT_COLUMNS,
  PROMPT_COLUMNS,
  type CategorizedPromptRecord,
  type CategoryTaxonomy,
  type PromptRecord,
} from './prompt-record.js';

const _log = logger.child({ module: 'prompt-screener.source.csv-prompt-source' });

export interface CsvPromptSourceOptions {
  /** CSV with at least `name`, `description` and `system_prompt` columns. */
  promptsFile: string;
  /** CSV with at least a `category` column, one category per row. */
  categoriesFile: string;
  /** Line-oriented pattern list; blank lines and `#` comments are skipped. */
  piiFile: string;
}

export class CsvPromptSource extends PromptSource {
  readonly options: CsvPromptSourceOptions;

  constructor(options: CsvPromptSourceOptions) {
    super();
    this.options = options;
  }

  async loadPiiPatterns(): Promise<string[]> {
    const patterns = await readLines(this.options.piiFile);
    _log.debug({ msg: 'Loaded PII filter patterns', count: patterns.length, file: this.options.piiFile });
    return patterns;
  }

  async loadPrompts(): Promise<PromptRecord[]> {
    const rows = await readTable(this.options.promptsFile, PROMPT_COLUMNS);
    return rows.map((row) => ({
      name: row.name ?? '',
      description: row.description ?? '',
      system_prompt: row.system_prompt ?? '',
    }));
  }

  async loadTaxonomy(): Promise<CategoryTaxonomy> {
    const rows = await readTable(this.options.categoriesFile, [CATEGORY_COLUMN]);
    return rows
      .map((row) => (row[CATEGORY_COLUMN] ?? '').trim())
      .filter((category) => category.length > 0);
  }
}

export class CsvPromptSink extends PromptSink {
  readonly destination: string;

  constructor(outputFile: string) {
    super();
    this.destination = outputFile;
  }

  async write(records: readonly CategorizedPromptRecord[]): Promise<void> {
    // Header goes out even when there are no records
    const header = stringify([[...OUTPUT_COLUMNS]], { record_delimiter: 'windows' });
    const body = stringify(
      records.map((record) => ({
        name: record.name,
        description: record.description,
        system_prompt: record.system_prompt,
        category_1: record.category_1,
        category_2: record.category_2,
        category_3: record.category_3,
      })),
      { columns: [...OUTPUT_COLUMNS], record_delimiter: 'windows' }
    );
    const content = header + body;
    await handleSourceOperation(this.destination, () => writeFile(this.destination, content, 'utf8'))();
  }
}

/**
 * Read back a table written by `CsvPromptSink`.
 */
export async function readCategorizedPrompts(filePath: string): Promise<CategorizedPromptRecord[]> {
  const rows = await readTable(filePath, OUTPUT_COLUMNS);
  return rows.map((row) => ({
    name: row.name ?? '',
    description: row.description ?? '',
    system_prompt: row.system_prompt ?? '',
    category_1: row.category_1 ?? '',
    category_2: row.category_2 ?? '',
    category_3: row.category_3 ?? '',
  }));
}
