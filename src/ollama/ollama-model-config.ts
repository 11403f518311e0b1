export const DEFAULT_OLLAMA_MODEL = 'llama3.2:latest';

export class OllamaModelConfig {
    model: string;

    constructor(options?: { model?: string }) {
        this.model = options?.model ?? DEFAULT_OLLAMA_MODEL;
    }
}
