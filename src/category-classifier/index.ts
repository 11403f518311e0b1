import { OllamaCategoryClassifier } from './category-classifier.js';
import type { CategoryClassifier } from './category-classifier.js';
import { CategoryResolver, parseClassifierResponse, toCategorySlots } from './category-resolver.js';
import type { CategoryResolution, CategoryResolverOptions, CategorySourceKind } from './category-resolver.js';
import { fallbackCategorize, scoreFallbackCategories } from './fallback-scorer.js';
import type { FallbackScore } from './fallback-scorer.js';
import { CATEGORIZATION_PROMPT_TEMPLATE, FALLBACK_KEYWORDS, MAX_CATEGORIES } from './category-classifier-config.js';

export {
    OllamaCategoryClassifier,
    CategoryResolver,
    parseClassifierResponse,
    toCategorySlots,
    fallbackCategorize,
    scoreFallbackCategories,
    CATEGORIZATION_PROMPT_TEMPLATE,
    FALLBACK_KEYWORDS,
    MAX_CATEGORIES,
};
export type {
    CategoryClassifier,
    CategoryResolution,
    CategoryResolverOptions,
    CategorySourceKind,
    FallbackScore,
};
