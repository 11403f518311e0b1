export interface PromptRecord {
  name: string;
  description: string;
  system_prompt: string;
}

export interface CategorySlots {
  category_1: string;
  category_2: string;
  category_3: string;
}

export type CategorizedPromptRecord = PromptRecord & CategorySlots;

export type CategoryTaxonomy = readonly string[];

export const PROMPT_COLUMNS = ['name', 'description', 'system_prompt'] as const;
export const CATEGORY_COLUMN = 'category';
export const OUTPUT_COLUMNS = [
  'name',
  'description',
  'system_prompt',
  'category_1',
  'category_2',
  'category_3',
] as const;

/**
 * Text the PII screen and keyword fallback look at: every field, space separated.
 */
export function combinedPromptText(prompt: PromptRecord): string {
  return `${prompt.name} ${prompt.description} ${prompt.system_prompt}`;
}
