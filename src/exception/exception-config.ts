import { ScreenerException } from './exception-util.js';

export class ConfigError extends ScreenerException {
    /** Raised when the run configuration cannot be built from the environment or flags. */
}
