import { PromptScreeningPipeline, loadScreenerConfig } from "#prompt-screener";
import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const sampleDir = path.dirname(fileURLToPath(import.meta.url));

dotenv.config({ path: path.resolve(sampleDir, '.env') });

const config = loadScreenerConfig(process.env, {
  prompts: path.resolve(sampleDir, 'data/system_prompts.csv'),
  pii: path.resolve(sampleDir, 'data/pii.txt'),
  categories: path.resolve(sampleDir, 'data/categories.csv'),
  output: path.resolve(sampleDir, 'data/cleaned_prompts.csv'),
});

const pipeline = PromptScreeningPipeline.fromConfig(config);
pipeline.add_pii_filtered_callback((prompt) => {
  console.log({ filtered: prompt.name });
});

const result = await pipeline.run();
console.log(result);
