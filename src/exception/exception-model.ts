import { isAxiosError } from 'axios';
import { ZodError } from 'zod';
import { ScreenerException } from './exception-util.js';
import logger from "../logger/logger.js";

const _log = logger.child({ module: 'prompt-screener.exception.exception-model' });

// Base class for errors raised while talking to the Ollama generate endpoint
export class LlmError extends ScreenerException {
    /** Base exception for LLM-related errors. */
}

export class LlmTransportError extends LlmError {
    /** Raised when the endpoint could not be reached or sent no reply. */
}

export class LlmAPIError extends LlmError {
    /** Raised when the endpoint replied with a non-2xx status. */
}

export class LlmResponseError extends LlmError {
    /** Raised when the response body failed validation. */
}

// Raised by the keyword fallback when it has nothing to pick from
export class CategorizationError extends ScreenerException {}


export function handleLlmOperation<A extends unknown[], R>(operation: (...args: A) => PromiseLike<R>) {
    return async (...args: A): Promise<R> => {
        try {
            return await operation(...args)
        } catch (e: unknown) {
            if (isAxiosError(e)) {
                if (e.response) {
                    const msg = 'Ollama API returned an error status';
                    _log.error({ msg: msg, status_code: e.response.status, err: e.message })
                    throw new LlmAPIError(e.response.status, msg)
                }
                const msg = 'An error occurred while reaching the Ollama API';
                _log.error({ msg: msg, status_code: 503, err: e.message })
                throw new LlmTransportError(503, msg)
            } else if (e instanceof ZodError) {
                const msg = 'Malformed response body from the Ollama API';
                _log.error({ msg: msg, status_code: 502, err: e.issues })
                throw new LlmResponseError(502, msg)
            } else {
                const msg = 'An unexpected LLM error occurred';
                if (e instanceof Error) {
                    _log.error({ msg: msg, status_code: 500, err: e })
                } else {
                    _log.error({ msg: msg, status_code: 500 })
                }
                throw new LlmError(500, msg);
            }
        }
    }
}
