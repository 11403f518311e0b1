import { CsvError } from 'csv-parse';
import { ZodError } from 'zod';
import { ScreenerException } from './exception-util.js';
import logger from "../logger/logger.js";

const _log = logger.child({ module: 'prompt-screener.exception.exception-source' });

// Base class for errors reading or writing the prompt tables
export class SourceError extends ScreenerException {}

export class SourceNotFoundError extends SourceError {
    /** Raised when an input file does not exist. */
}

export class SourceFormatError extends SourceError {
    /** Raised when an input file is not the expected table, e.g. a missing header column. */
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return e instanceof Error && 'code' in e;
}

export function handleSourceOperation<A extends unknown[], R>(filePath: string, operation: (...args: A) => PromiseLike<R>) {
    return async (...args: A): Promise<R> => {
        try {
            return await operation(...args)
        } catch (e: unknown) {
            if (e instanceof SourceError) {
                _log.error({ msg: e.message, status_code: e.statusCode, file: filePath })
                throw e;
            } else if (isErrnoException(e) && e.code === 'ENOENT') {
                const msg = `File not found: ${filePath}`;
                _log.error({ msg: msg, status_code: 404 })
                throw new SourceNotFoundError(404, msg);
            } else if (e instanceof CsvError || e instanceof ZodError) {
                const msg = `Malformed table in ${filePath}`;
                _log.error({ msg: msg, status_code: 422, err: e.message })
                throw new SourceFormatError(422, msg);
            } else {
                const msg = `An unexpected error occurred while accessing ${filePath}`;
                if (e instanceof Error) {
                    _log.error({ msg: msg, status_code: 500, err: e })
                } else {
                    _log.error({ msg: msg, status_code: 500 })
                }
                throw new SourceError(500, msg);
            }
        }
    }
}
