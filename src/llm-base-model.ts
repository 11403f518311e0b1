import axios, { type AxiosInstance } from 'axios';
import { OllamaInstanceConfig, OllamaModelConfig } from './ollama/index.js';
import { handleLlmOperation } from './exception/index.js';
import { LlmBaseModelParser } from './_llm-base-model-parser.js';

export interface LlmBaseModelOptions {
    instanceConfig: OllamaInstanceConfig;
    modelConfig: OllamaModelConfig;
}

export interface OllamaGenerateRequest {
    model: string;
    prompt: string;
    stream: false;
}

export interface ModelInvokeReturn {
    raw: unknown;
}

export class LlmBaseModel {
    instanceConfig: OllamaInstanceConfig;
    modelConfig: OllamaModelConfig;
    parser: LlmBaseModelParser;
    http: AxiosInstance;

    constructor(options: LlmBaseModelOptions) {
        const { instanceConfig, modelConfig } = options;

        this.instanceConfig = instanceConfig;
        this.modelConfig = modelConfig;
        this.parser = new LlmBaseModelParser();
        this.http = axios.create({
            timeout: instanceConfig.timeout,
            headers: { 'Content-Type': 'application/json' }
        });
    }

    /**
     * Send one non-streaming generate request.
     * Rejects with an `LlmError` subclass when the endpoint is unreachable or answers with a non-2xx status.
     */
    public async modelInvoke(prompt: string): Promise<ModelInvokeReturn> {
        const body: OllamaGenerateRequest = {
            model: this.modelConfig.model,
            prompt: prompt,
            stream: false
        };

        const response = await handleLlmOperation(
            (payload: OllamaGenerateRequest) => this.http.post<unknown>(this.instanceConfig.apiUrl, payload)
        )(body);

        return {
            raw: response.data
        };
    }

    /**
     * Invoke the model and return the generated text, validating the reply body.
     */
    public async generate(prompt: string): Promise<string> {
        const response = await this.modelInvoke(prompt);
        const parsed = await handleLlmOperation(
            async (r: ModelInvokeReturn) => this.parser.parse(r)
        )(response);
        return parsed.text;
    }
}
