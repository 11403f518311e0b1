export { 
    ScreenerException,
} from './exception-util.js';

export { 
    LlmError,
    LlmTransportError,
    LlmAPIError,
    LlmResponseError,
    CategorizationError,
    handleLlmOperation
} from './exception-model.js';

export {
    SourceError,
    SourceNotFoundError,
    SourceFormatError,
    handleSourceOperation
} from './exception-source.js';

export {
    ConfigError
} from './exception-config.js';
