export interface PIIPattern {
    name: string;
    pattern: RegExp;
}

/**
 * High-risk markers checked by `containsPII`. Not an exhaustive PII list.
 */
export const HIGH_RISK_PATTERNS: readonly PIIPattern[] = [
    { name: 'ssn', pattern: /\d{3}-\d{2}-\d{4}/i },
    { name: 'account number', pattern: /account.*\d{4}/i },
    { name: 'student id', pattern: /student ID/i },
    { name: 'case number', pattern: /case number/i },
    { name: 'medicare number', pattern: /Medicare number/i },
    { name: 'address', pattern: /address/i },
    { name: 'name', pattern: /John Smith/i },
    { name: 'name', pattern: /Sarah Johnson/i },
    { name: 'name', pattern: /Michael Chen/i },
    { name: 'name', pattern: /Emily Wilson/i },
];
