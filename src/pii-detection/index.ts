import { HIGH_RISK_PATTERNS } from './pii-detection-config.js';
import type { PIIPattern } from './pii-detection-config.js';
import { containsPII, findPII } from './pii-screener.js';

export {
    containsPII,
    findPII,
    HIGH_RISK_PATTERNS,
};
export type { PIIPattern };
