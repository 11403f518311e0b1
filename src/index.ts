export { PromptScreeningPipeline } from './pipeline/index.js';
export type { PromptScreeningPipelineOptions, PromptScreeningResult, PIIFilteredCallback } from './pipeline/index.js';
export { containsPII, findPII, HIGH_RISK_PATTERNS } from './pii-detection/index.js';
export type { PIIPattern } from './pii-detection/index.js';
export {
  OllamaCategoryClassifier,
  CategoryResolver,
  parseClassifierResponse,
  toCategorySlots,
  fallbackCategorize,
  scoreFallbackCategories,
  FALLBACK_KEYWORDS,
  MAX_CATEGORIES,
} from './category-classifier/index.js';
export type { CategoryClassifier, CategoryResolution, CategorySourceKind, FallbackScore } from './category-classifier/index.js';
export {
  PromptSource,
  PromptSink,
  CsvPromptSource,
  CsvPromptSink,
  readCategorizedPrompts,
  OUTPUT_COLUMNS,
  combinedPromptText,
} from './source/index.js';
export type { PromptRecord, CategorizedPromptRecord, CategoryTaxonomy, CsvPromptSourceOptions } from './source/index.js';
export { OllamaInstanceConfig, OllamaModelConfig } from './ollama/index.js';
export { loadScreenerConfig, DEFAULT_FILES } from './config/index.js';
export type { ScreenerConfig, ScreenerConfigOverrides } from './config/index.js';
export { createSeededRandom } from './utils/index.js';
export type { RandomSource } from './utils/index.js';
export { LlmBaseModel } from './llm-base-model.js';
export type { ModelInvokeReturn, OllamaGenerateRequest } from './llm-base-model.js';
export {
  ScreenerException,
  LlmError,
  LlmTransportError,
  LlmAPIError,
  LlmResponseError,
  CategorizationError,
  SourceError,
  SourceNotFoundError,
  SourceFormatError,
  ConfigError,
  handleLlmOperation,
  handleSourceOperation,
} from './exception/index.js';
