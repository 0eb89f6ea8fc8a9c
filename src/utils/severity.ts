import type { CommentSeverity } from '../types';

// Checked in order; the first level with a matching pattern wins.
const SEVERITY_PATTERNS: ReadonlyArray<[CommentSeverity, RegExp]> = [
  ['critical', /\b(security|vulnerab\w*|injection|xss|leak\w*|crash\w*|race condition|deadlock|unsafe|password|secret|data loss)\b/],
  ['major', /\b(bugs?|wrong|incorrect|broken|fails?|errors?|exceptions?|inefficient|performance|slow|o\(n\w*|memory|edge cases?|null|undefined)\b/],
  ['nit', /\b(nit\w*|typos?|whitespace|indent\w*|spacing|formatting|trailing|semicolons?|pep ?8|style)\b/],
];

const TONE_DIRECTIVES: Record<CommentSeverity, string> = {
  critical: 'This looks like a correctness or security concern. Be clear about the risk and its urgency while staying supportive and blame-free.',
  major: 'This affects behaviour or performance. Explain the impact plainly, with encouraging but confident language.',
  minor: 'This is a readability or maintainability improvement. Keep the tone warm and collaborative.',
  nit: 'This is a small stylistic nit. Keep the tone light and brief; make it clear it is a minor polish, not a problem.',
};

/**
 * Keyword-based severity estimate for a review comment.
 * Falls back to 'minor' when nothing matches.
 */
export function inferSeverity(comment: string): CommentSeverity {
  const lower = comment.toLowerCase();

  for (const [severity, pattern] of SEVERITY_PATTERNS) {
    if (pattern.test(lower)) {
      return severity;
    }
  }

  return 'minor';
}

export function toneDirective(severity: CommentSeverity): string {
  return TONE_DIRECTIVES[severity];
}
