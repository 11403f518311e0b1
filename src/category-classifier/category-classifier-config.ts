export const MAX_CATEGORIES = 3;

/**
 * Keyword table for the offline fallback. Fixed: it does not follow the loaded
 * taxonomy, so these labels can be assigned even when the taxonomy lacks them.
 * Order matters, it breaks ties between equal scores.
 */
export const FALLBACK_KEYWORDS: ReadonlyArray<readonly [label: string, keywords: readonly string[]]> = [
    ["Professional Services", ["medical", "legal", "business", "finance", "consult", "advisor", "technical", "support"]],
    ["Educational Support", ["tutor", "learn", "education", "research", "study", "academic", "knowledge"]],
    ["Personal Assistance", ["assistant", "help", "personal", "fitness", "coach", "cooking", "daily"]],
    ["Creative and Exploratory", ["creative", "write", "travel", "explore", "discover", "environment", "sustainability"]],
];

export const CATEGORIZATION_PROMPT_TEMPLATE = `
I need to categorize the following system prompt into at most 3 categories from this list: {category_list}.
Please analyze the prompt and return only the category names that best match, separated by commas.
If fewer than 3 categories apply, return fewer categories.

System Prompt Name: {name}
System Prompt Description: {description}
System Prompt: {system_prompt}

Categories:
`;
