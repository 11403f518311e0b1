import { z } from 'zod';
import { ConfigError } from '../exception/index.js';
import { DEFAULT_OLLAMA_API_URL, DEFAULT_OLLAMA_MODEL, OllamaInstanceConfig, OllamaModelConfig } from '../ollama/index.js';

export const DEFAULT_FILES = {
  prompts: 'system_prompts.csv',
  pii: 'pii.txt',
  categories: 'categories.csv',
  output: 'cleaned_prompts.csv',
} as const;

export interface ScreenerFiles {
  prompts: string;
  pii: string;
  categories: string;
  output: string;
}

export interface ScreenerConfig {
  files: ScreenerFiles;
  instanceConfig: OllamaInstanceConfig;
  modelConfig: OllamaModelConfig;
  /** Seed for the fallback's random pick. Unset means `Math.random`. */
  seed?: number;
}

export interface ScreenerConfigOverrides {
  prompts?: string;
  pii?: string;
  categories?: string;
  output?: string;
  ollamaUrl?: string;
  model?: string;
  timeout?: number;
  seed?: number;
}

const envSchema = z.object({
  PROMPT_SCREENER_PROMPTS_FILE: z.string().min(1).default(DEFAULT_FILES.prompts),
  PROMPT_SCREENER_PII_FILE: z.string().min(1).default(DEFAULT_FILES.pii),
  PROMPT_SCREENER_CATEGORIES_FILE: z.string().min(1).default(DEFAULT_FILES.categories),
  PROMPT_SCREENER_OUTPUT_FILE: z.string().min(1).default(DEFAULT_FILES.output),
  OLLAMA_API_URL: z.string().url().default(DEFAULT_OLLAMA_API_URL),
  OLLAMA_MODEL: z.string().min(1).default(DEFAULT_OLLAMA_MODEL),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  PROMPT_SCREENER_SEED: z.coerce.number().int().optional(),
});

const overridesSchema = z.object({
  prompts: z.string().min(1).optional(),
  pii: z.string().min(1).optional(),
  categories: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  ollamaUrl: z.string().url().optional(),
  model: z.string().min(1).optional(),
  timeout: z.number().int().nonnegative().optional(),
  seed: z.number().int().optional(),
});

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(400, `Invalid configuration: ${details}`);
  }
  return parsed.data;
}

/**
 * Build the run configuration from environment variables, with explicit
 * overrides (CLI flags) taking precedence.
 */
export function loadScreenerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ScreenerConfigOverrides = {}
): ScreenerConfig {
  const values = parseOrThrow(envSchema, env);
  const flags = parseOrThrow(overridesSchema, overrides);

  return {
    files: {
      prompts: flags.prompts ?? values.PROMPT_SCREENER_PROMPTS_FILE,
      pii: flags.pii ?? values.PROMPT_SCREENER_PII_FILE,
      categories: flags.categories ?? values.PROMPT_SCREENER_CATEGORIES_FILE,
      output: flags.output ?? values.PROMPT_SCREENER_OUTPUT_FILE,
    },
    instanceConfig: new OllamaInstanceConfig({
      apiUrl: flags.ollamaUrl ?? values.OLLAMA_API_URL,
      timeout: flags.timeout ?? values.OLLAMA_TIMEOUT_MS,
    }),
    modelConfig: new OllamaModelConfig({
      model: flags.model ?? values.OLLAMA_MODEL,
    }),
    seed: flags.seed ?? values.PROMPT_SCREENER_SEED,
  };
}
