export { PromptSource, PromptSink } from './prompt-source.js';
export { CsvPromptSource, CsvPromptSink, readCategorizedPrompts } from './csv-prompt-source.js';
export type { CsvPromptSourceOptions } from './csv-prompt-source.js';
export { readTable, readLines } from './csv-table.js';
export type { TableRow } from './csv-table.js';
export {
  PROMPT_COLUMNS,
  CATEGORY_COLUMN,
  OUTPUT_COLUMNS,
  combinedPromptText,
} from './prompt-record.js';
export type {
  PromptRecord,
  CategorySlots,
  CategorizedPromptRecord,
  CategoryTaxonomy,
} from './prompt-record.js';
