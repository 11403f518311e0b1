export const DEFAULT_OLLAMA_API_URL = 'http://localhost:11434/api/generate';

export class OllamaInstanceConfig {
    apiUrl: string;
    /** Request timeout in milliseconds. 0 leaves the transport default (no timeout). */
    timeout: number;

    constructor(options?: { apiUrl?: string; timeout?: number }) {
        this.apiUrl = options?.apiUrl ?? DEFAULT_OLLAMA_API_URL;
        this.timeout = options?.timeout ?? 0;
    }
}
