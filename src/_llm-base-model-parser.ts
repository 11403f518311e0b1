import { z } from "zod";
import type { ModelInvokeReturn } from "./llm-base-model.js";

export const ollamaGenerateResponseSchema = z.object({
    response: z.string().optional(),
});

interface ParsedResult {
    text: string;
}

class LlmBaseModelParser {
    /**
     * Throws a `ZodError` when the body is not a generate reply object.
     * An absent `response` field reads as empty text.
     */
    public parse(response: ModelInvokeReturn): ParsedResult {
        const body = ollamaGenerateResponseSchema.parse(response.raw);
        return {
            text: body.response ?? "",
        };
    }
}

export { LlmBaseModelParser };
export type { ParsedResult };
