import { CategorizationError } from "../exception/index.js";
import { combinedPromptText, type PromptRecord } from "../source/prompt-record.js";
import { pickRandom, type RandomSource } from "../utils/index.js";
import { FALLBACK_KEYWORDS, MAX_CATEGORIES } from "./category-classifier-config.js";

export interface FallbackScore {
    label: string;
    score: number;
}

/**
 * Score every fallback label against the prompt. A keyword counts once no
 * matter how often it occurs. Result is sorted by descending score; equal
 * scores keep table order.
 */
export function scoreFallbackCategories(prompt: PromptRecord): FallbackScore[] {
    const text = combinedPromptText(prompt).toLowerCase();

    const scores = FALLBACK_KEYWORDS.map(([label, keywords]) => ({
        label,
        score: keywords.filter((keyword) => text.includes(keyword.toLowerCase())).length,
    }));

    // Array.prototype.sort is stable
    return scores.sort((a, b) => b.score - a.score);
}

/**
 * Keyword-based categorization used when the classifier gives nothing usable.
 *
 * Returns up to three labels with a non-zero score. When every score is zero,
 * returns a single category drawn uniformly from `categoryNames` using `random`.
 */
export function fallbackCategorize(
    prompt: PromptRecord,
    categoryNames: readonly string[],
    random: RandomSource = Math.random
): string[] {
    const result = scoreFallbackCategories(prompt)
        .filter(({ score }) => score > 0)
        .map(({ label }) => label)
        .slice(0, MAX_CATEGORIES);

    if (result.length > 0) {
        return result;
    }

    const picked = pickRandom(categoryNames, random);
    if (picked === undefined) {
        throw new CategorizationError(500, `No categories available to pick from for prompt: ${prompt.name}`);
    }
    return [picked];
}
