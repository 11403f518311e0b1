export { PromptScreeningPipeline } from './prompt-screening-pipeline.js';
export type { PromptScreeningPipelineOptions, PromptScreeningResult, PIIFilteredCallback } from './prompt-screening-pipeline.js';
