import logger from "../logger/logger.js";
import { HIGH_RISK_PATTERNS, PIIPattern } from "./pii-detection-config.js";

const _log = logger.child({ module: 'prompt-screener.pii-detection.pii-screener' });

/**
 * Return the first high-risk pattern found in `text`, or null.
 */
export function findPII(text: string): PIIPattern | null {
    for (const entry of HIGH_RISK_PATTERNS) {
        if (entry.pattern.test(text)) {
            return entry;
        }
    }
    return null;
}

/**
 * Check whether `text` contains any of the high-risk PII markers.
 *
 * `patterns` is the list read from the PII filter file. It is accepted so callers
 * can hand it over, but matching only uses `HIGH_RISK_PATTERNS`.
 */
export function containsPII(text: string, patterns: readonly string[]): boolean {
    const match = findPII(text);
    if (match) {
        _log.debug({ msg: 'PII marker matched', pattern: match.name, loaded_patterns: patterns.length });
        return true;
    }
    return false;
}
