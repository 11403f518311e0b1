import logger from "../logger/logger.js";
import { ScreenerException, SourceFormatError } from "../exception/index.js";
import { containsPII } from "../pii-detection/index.js";
import {
  CategoryResolver,
  FALLBACK_KEYWORDS,
  OllamaCategoryClassifier,
  toCategorySlots,
} from "../category-classifier/index.js";
import { CsvPromptSink, CsvPromptSource, PromptSink, PromptSource } from "../source/index.js";
import { combinedPromptText, type CategorizedPromptRecord, type CategoryTaxonomy, type PromptRecord } from "../source/prompt-record.js";
import type { ScreenerConfig } from "../config/index.js";
import { createSeededRandom } from "../utils/index.js";

export interface PromptScreeningPipelineOptions {
  source: PromptSource;
  sink: PromptSink;
  resolver: CategoryResolver;
}

export interface PromptScreeningResult {
  status: 'success';
  kept: {
    total: number;
    names: string[];
  };
  filtered: {
    total: number;
    names: string[];
  };
  failed: {
    total: number;
    names: string[];
  };
}

export type PIIFilteredCallback = (prompt: PromptRecord) => void | Promise<void>;

const _log = logger.child({ module: 'prompt-screener.pipeline.prompt-screening-pipeline' });

export class PromptScreeningPipeline {
  protected source: PromptSource;
  protected sink: PromptSink;
  protected resolver: CategoryResolver;
  protected piiFilteredCallback?: PIIFilteredCallback;
  readonly log = _log;

  constructor(options: PromptScreeningPipelineOptions) {
    this.source = options.source;
    this.sink = options.sink;
    this.resolver = options.resolver;
  }

  /**
   * Wire a pipeline reading and writing CSV files and classifying through Ollama.
   */
  static fromConfig(config: ScreenerConfig): PromptScreeningPipeline {
    const classifier = new OllamaCategoryClassifier({
      instanceConfig: config.instanceConfig,
      modelConfig: config.modelConfig,
    });
    return new PromptScreeningPipeline({
      source: new CsvPromptSource({
        promptsFile: config.files.prompts,
        categoriesFile: config.files.categories,
        piiFile: config.files.pii,
      }),
      sink: new CsvPromptSink(config.files.output),
      resolver: new CategoryResolver({
        classifier,
        random: config.seed === undefined ? undefined : createSeededRandom(config.seed),
      }),
    });
  }

  add_pii_filtered_callback(callback: PIIFilteredCallback) {
    this.piiFilteredCallback = callback;
  }

  /**
   * Screen every prompt for PII, categorize the clean ones and write them out.
   * Input problems abort the run before anything is written; a failure on one
   * prompt only drops that prompt.
   * @returns Names of the kept, filtered and failed prompts.
   */
  async run(): Promise<PromptScreeningResult> {
    const runResult: PromptScreeningResult = {
      status: 'success',
      kept: { total: 0, names: [] },
      filtered: { total: 0, names: [] },
      failed: { total: 0, names: [] },
    };

    this.log.info("Loading PII filters...");
    const piiPatterns = await this.source.loadPiiPatterns();

    this.log.info("Loading system prompts...");
    const prompts = await this.source.loadPrompts();

    this.log.info("Loading categories...");
    const taxonomy = await this.source.loadTaxonomy();
    if (taxonomy.length === 0) {
      const msg = "No categories loaded; at least one category is required";
      this.log.error({ msg: msg, status_code: 422 });
      throw new SourceFormatError(422, msg);
    }
    this.warnMissingFallbackLabels(taxonomy);

    this.log.info(`Processing ${prompts.length} system prompts...`);

    const cleanPrompts: CategorizedPromptRecord[] = [];
    for (const prompt of prompts) {
      try {
        if (containsPII(combinedPromptText(prompt), piiPatterns)) {
          this.log.info(`Filtering out prompt '${prompt.name}' due to PII content`);
          runResult.filtered.names.push(prompt.name);
          await this.notifyPiiFiltered(prompt);
          continue;
        }

        this.log.info(`Categorizing prompt: ${prompt.name}`);
        const resolution = await this.resolver.resolve(prompt, taxonomy);
        cleanPrompts.push({ ...prompt, ...toCategorySlots(resolution.categories) });
        runResult.kept.names.push(prompt.name);
      } catch (e: unknown) {
        const msg = `Failed to process prompt: ${prompt.name}`;
        this.log.error({ msg: msg, status_code: e instanceof ScreenerException ? e.statusCode : 500, err: e });
        runResult.failed.names.push(prompt.name);
      }
    }

    runResult.kept.total = runResult.kept.names.length;
    runResult.filtered.total = runResult.filtered.names.length;
    runResult.failed.total = runResult.failed.names.length;

    this.log.info(`Writing ${cleanPrompts.length} clean prompts to ${this.sink.destination}...`);
    this.log.info(`Filtered out ${runResult.filtered.total} prompts: ${runResult.filtered.names.join(', ')}`);
    await this.sink.write(cleanPrompts);

    this.log.info("Done!");
    return runResult;
  }

  private async notifyPiiFiltered(prompt: PromptRecord) {
    if (!this.piiFilteredCallback) {
      return;
    }
    try {
      await this.piiFilteredCallback(prompt);
    } catch (e: unknown) {
      const msg = `PII filtered callback failed for prompt: ${prompt.name}`;
      this.log.error({ msg: msg, status_code: e instanceof ScreenerException ? e.statusCode : 500, err: e });
    }
  }

  private warnMissingFallbackLabels(taxonomy: CategoryTaxonomy) {
    for (const [label] of FALLBACK_KEYWORDS) {
      if (!taxonomy.includes(label)) {
        this.log.warn({ msg: `Fallback category '${label}' is not in the loaded taxonomy`, category: label });
      }
    }
  }
}
