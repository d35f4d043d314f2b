export interface BlockedPattern {
  name: string;
  pattern: RegExp;
}

/** Checked in order; the first match rejects the input. */
export const BLOCKED_PATTERNS: readonly BlockedPattern[] = [
  { name: "command-substitution", pattern: /\$\(/i },
  { name: "backtick-execution", pattern: /`[^`]+`/i },
  { name: "command-chaining", pattern: /&&|\|\|/i },
  { name: "chained-removal", pattern: /;.*rm/i },
  { name: "recursive-removal", pattern: /\brm\s+-[a-z]*[rf]/i },
  { name: "external-fetch", pattern: /curl|wget/i },
  { name: "code-execution", pattern: /eval|exec/i },
  { name: "os-import", pattern: /import\s+os/i },
  { name: "url-scheme", pattern: /\b[a-z][a-z0-9+.-]*:\/\//i },
  { name: "privilege-escalation", pattern: /\bsudo\b|\bsu\s+-|\bchmod\s+[0-7]*s/i },
  { name: "sensitive-path", pattern: /\/etc\/(passwd|shadow|sudoers)|\/root\/|\.ssh\//i }
];

export type SanitizeOutcome =
  | { valid: true; cleaned: string }
  | { valid: false; reason: string; pattern?: string };

/**
 * `pattern` on a rejection names the matching rule. It is meant for the audit
 * log only and must not be shown to the requester.
 */
export function sanitizeInput(input: string, patterns: readonly BlockedPattern[] = BLOCKED_PATTERNS): SanitizeOutcome {
  if (!input || !input.trim()) {
    return { valid: false, reason: "Empty input" };
  }

  for (const rule of patterns) {
    if (rule.pattern.test(input)) {
      return { valid: false, reason: "Invalid input detected", pattern: rule.name };
    }
  }

  return { valid: true, cleaned: input.trim() };
}
