export { OllamaInstanceConfig, DEFAULT_OLLAMA_API_URL } from './ollama-instance-config.js';
export { OllamaModelConfig, DEFAULT_OLLAMA_MODEL } from './ollama-model-config.js';
