export type AuditDecision = 'APPROVED' | 'BLOCKED';

export type AuditRule = 'CRISIS_LANGUAGE_DETECTED' | 'STIGMATIZING_LANGUAGE' | 'PII_PHI_REDACTED';

export type AuditResult = {
  decision: AuditDecision;
  rules: AuditRule[];
  /** Replacement markers applied, in pattern order. */
  redactions: string[];
  escalation_required: boolean;
  /** The text with personal data replaced; empty when blocked. */
  sanitized: string;
};

export type ReflectionAuditor = {
  audit: (text: string) => AuditResult;
};

const CRISIS_PATTERNS = [
  /\b(kill|harm|hurt)\s+(myself|yourself)\b/i,
  /\bsuicid(e|al)\b/i,
  /\bend\s+(my|your)\s+life\b/i,
  /\bwant\s+to\s+die\b/i,
  /\bbetter\s+off\s+dead\b/i,
  /\bno\s+reason\s+to\s+live\b/i,
];

const STIGMA_PATTERNS = [
  /\baddicts?\b/i,
  /\bjunkies?\b/i,
  /\bcrackheads?\b/i,
  /\bdrug\s+abuse\b/i,
  /\bclean\b/i,
  /\bdirty\b/i,
  /\brelapse\b.*\bfail/i,
];

const CLINICAL_CONTEXT = [/\bcraving\s+(assessment|scale)\b/i, /\bsubstance\s+use\s+disorder\b/i, /\brecovery\s+plan\b/i];

const SAFETY_RESOURCES = [
  /\bcrisis\s+(line|hotline)\b/i,
  /\b988\b/,
  /\b1-800-273-8255\b/,
  /\bemergency\s+(services|number)\b/i,
  /\bif\s+you\s+are\s+in\s+(danger|crisis)\b/i,
];

const PII_PATTERNS: readonly { pattern: RegExp; replacement: string }[] = [
  { pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '[SSN_REDACTED]' },
  { pattern: /\b\d{3}-\d{3}-\d{4}\b/g, replacement: '[PHONE_REDACTED]' },
  { pattern: /\b[\w.%+-]+@[\w.-]+\.[A-Za-z]{2,}\b/g, replacement: '[EMAIL_REDACTED]' },
  {
    pattern: /\b\d{1,5}\s+(?:\w+\s+)+(?:street|st|avenue|ave|road|rd|boulevard|blvd)\b/gi,
    replacement: '[ADDRESS_REDACTED]',
  },
];

const matchesAny = (patterns: readonly RegExp[], text: string): boolean =>
  patterns.some((pattern) => pattern.test(text));

/**
 * Screens text shown to a member. Crisis language blocks unless the text
 * itself points to a safety resource; stigmatizing terms block outside a
 * clinical context. Approved text has personal data redacted.
 */
export class SafetyAuditor implements ReflectionAuditor {
  audit(text: string): AuditResult {
    const rules: AuditRule[] = [];
    const crisis = matchesAny(CRISIS_PATTERNS, text);

    if (crisis) {
      rules.push('CRISIS_LANGUAGE_DETECTED');
      if (!matchesAny(SAFETY_RESOURCES, text)) {
        return blocked(rules, true);
      }
    }

    if (matchesAny(STIGMA_PATTERNS, text) && !matchesAny(CLINICAL_CONTEXT, text)) {
      rules.push('STIGMATIZING_LANGUAGE');
      return blocked(rules, crisis);
    }

    const redactions: string[] = [];
    let sanitized = text;
    for (const { pattern, replacement } of PII_PATTERNS) {
      const next = sanitized.replace(pattern, replacement);
      if (next !== sanitized) redactions.push(replacement);
      sanitized = next;
    }
    if (redactions.length > 0) rules.push('PII_PHI_REDACTED');

    return { decision: 'APPROVED', rules, redactions, escalation_required: crisis, sanitized };
  }
}

function blocked(rules: AuditRule[], escalation: boolean): AuditResult {
  return { decision: 'BLOCKED', rules, redactions: [], escalation_required: escalation, sanitized: '' };
}
