import type { CategorizedPromptRecord, CategoryTaxonomy, PromptRecord } from './prompt-record.js';

export abstract class PromptSource {
  abstract loadPiiPatterns(): Promise<string[]>;
  abstract loadPrompts(): Promise<PromptRecord[]>;
  abstract loadTaxonomy(): Promise<CategoryTaxonomy>;
}

export abstract class PromptSink {
  /** Where the records end up, for log lines. */
  abstract readonly destination: string;
  abstract write(records: readonly CategorizedPromptRecord[]): Promise<void>;
}
