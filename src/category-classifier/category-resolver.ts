import logger from "../logger/logger.js";
import type { CategorySlots, CategoryTaxonomy, PromptRecord } from "../source/prompt-record.js";
import type { RandomSource } from "../utils/index.js";
import type { CategoryClassifier } from "./category-classifier.js";
import { MAX_CATEGORIES } from "./category-classifier-config.js";
import { fallbackCategorize } from "./fallback-scorer.js";

const _log = logger.child({ module: 'prompt-screener.category-classifier.category-resolver' });

export type CategorySourceKind = 'classifier' | 'fallback';

export interface CategoryResolution {
    categories: string[];
    source: CategorySourceKind;
}

export interface CategoryResolverOptions {
    classifier: CategoryClassifier;
    /** Random source for the fallback's zero-score pick. Defaults to `Math.random`. */
    random?: RandomSource;
}

/**
 * Keep the comma-separated entries of `response` that exactly match a taxonomy
 * entry, in response order, capped at three.
 */
export function parseClassifierResponse(response: string, taxonomy: CategoryTaxonomy): string[] {
    return response
        .split(',')
        .map((segment) => segment.trim())
        .filter((segment) => taxonomy.includes(segment))
        .slice(0, MAX_CATEGORIES);
}

/**
 * Lay a category list out over the fixed three output slots.
 */
export function toCategorySlots(categories: readonly string[]): CategorySlots {
    return {
        category_1: categories[0] ?? "",
        category_2: categories[1] ?? "",
        category_3: categories[2] ?? "",
    };
}

export class CategoryResolver {
    classifier: CategoryClassifier;
    random: RandomSource;
    readonly log = _log;

    constructor(options: CategoryResolverOptions) {
        this.classifier = options.classifier;
        this.random = options.random ?? Math.random;
    }

    /**
     * Categorize one prompt: ask the classifier, keep its valid answers, and
     * fall back to keyword scoring when none survive.
     */
    public async resolve(prompt: PromptRecord, taxonomy: CategoryTaxonomy): Promise<CategoryResolution> {
        const response = await this.classifier.classify(prompt, taxonomy);

        if (!response) {
            this.log.info(`Using fallback categorization for prompt: ${prompt.name}`);
            return this.fallback(prompt, taxonomy);
        }

        const categories = parseClassifierResponse(response, taxonomy);
        if (categories.length === 0) {
            return this.fallback(prompt, taxonomy);
        }

        return { categories, source: 'classifier' };
    }

    private fallback(prompt: PromptRecord, taxonomy: CategoryTaxonomy): CategoryResolution {
        return {
            categories: fallbackCategorize(prompt, taxonomy, this.random),
            source: 'fallback',
        };
    }
}
