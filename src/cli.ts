#!/usr/bin/env node
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import logger from './logger/logger.js';
import { loadScreenerConfig } from './config/index.js';
import { PromptScreeningPipeline } from './pipeline/index.js';
import { ScreenerException } from './exception/index.js';

const _log = logger.child({ module: 'prompt-screener.cli' });

const argv = yargs(hideBin(process.argv))
  .scriptName('prompt-screener')
  .option('prompts', {
    type: 'string',
    describe: 'CSV of prompts with name, description and system_prompt columns',
  })
  .option('pii', {
    type: 'string',
    describe: 'PII filter pattern file',
  })
  .option('categories', {
    type: 'string',
    describe: 'CSV of categories with a category column',
  })
  .option('output', {
    type: 'string',
    describe: 'Where to write the cleaned, categorized prompts',
  })
  .option('ollama-url', {
    type: 'string',
    describe: 'Ollama generate endpoint (defaults to env OLLAMA_API_URL or http://localhost:11434/api/generate)',
  })
  .option('model', {
    type: 'string',
    describe: 'Ollama model name (defaults to env OLLAMA_MODEL or llama3.2:latest)',
  })
  .option('seed', {
    type: 'number',
    describe: 'Seed for the random category pick when no fallback keyword matches',
  })
  .help()
  .strict()
  .parseSync();

async function main() {
  const config = loadScreenerConfig(process.env, {
    prompts: argv.prompts,
    pii: argv.pii,
    categories: argv.categories,
    output: argv.output,
    ollamaUrl: argv['ollama-url'],
    model: argv.model,
    seed: argv.seed,
  });

  const pipeline = PromptScreeningPipeline.fromConfig(config);
  const result = await pipeline.run();
  _log.debug({ msg: 'Run summary', result });
}

main().catch((e: unknown) => {
  const statusCode = e instanceof ScreenerException ? e.statusCode : 500;
  _log.fatal({ msg: 'Prompt screening failed', status_code: statusCode, err: e });
  process.exitCode = 1;
});
