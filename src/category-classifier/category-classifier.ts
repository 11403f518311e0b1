import { PromptTemplate } from "@langchain/core/prompts";
import logger from "../logger/logger.js";
import { LlmBaseModel, type LlmBaseModelOptions } from "../llm-base-model.js";
import { ScreenerException } from "../exception/index.js";
import type { PromptRecord } from "../source/prompt-record.js";
import { CATEGORIZATION_PROMPT_TEMPLATE } from "./category-classifier-config.js";

const _log = logger.child({ module: 'prompt-screener.category-classifier.category-classifier' });

export interface CategoryClassifier {
    /**
     * Ask for up to three category names for `prompt`, comma separated.
     * Resolves to the raw answer, or an empty string when no answer could be had.
     */
    classify(prompt: PromptRecord, categoryNames: readonly string[]): Promise<string>;
}

export class OllamaCategoryClassifier extends LlmBaseModel implements CategoryClassifier {
    private readonly template: PromptTemplate;

    constructor(options: LlmBaseModelOptions) {
        super(options);
        this.template = PromptTemplate.fromTemplate(CATEGORIZATION_PROMPT_TEMPLATE);
    }

    public async classify(prompt: PromptRecord, categoryNames: readonly string[]): Promise<string> {
        try {
            const request = await this.prepareCategorizationPrompt(prompt, categoryNames);
            return await this.generate(request);
        } catch (e: unknown) {
            const statusCode = e instanceof ScreenerException ? e.statusCode : 500;
            const reason = e instanceof Error ? e.message : String(e);
            _log.warn({ msg: `Error querying Ollama for prompt: ${prompt.name}`, status_code: statusCode, err: reason });
            return "";
        }
    }

    public prepareCategorizationPrompt(prompt: PromptRecord, categoryNames: readonly string[]): Promise<string> {
        return this.template.format({
            category_list: categoryNames.join(", "),
            name: prompt.name,
            description: prompt.description,
            system_prompt: prompt.system_prompt,
        });
    }
}
