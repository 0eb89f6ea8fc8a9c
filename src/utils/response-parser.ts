import type { SectionKey } from '../prompts';
import type { CommentAnalysis } from '../types';
import { ParseError } from '../types';
import { appLogger } from './logging';
import { inferSeverity } from './severity';

const LABEL_PATTERNS: ReadonlyArray<[SectionKey, RegExp]> = [
  ['rephrasing', /^(positive |empathetic |gentle |supportive )?(re ?phras|rewrite|rewritten)/],
  ['why', /^(the )?(why|underlying principle|principle|explanation|rationale)\b/],
  ['suggestion', /^(suggest|improvement|improved code|corrected code|code suggestion|fix\b)/],
  ['resource', /^(further learning|further reading|learn more|resources?\b|links?\b|references?\b|documentation)/],
];

const MAX_LABEL_WORDS = 6;

const HEADING_LINE = /^\s{0,3}#{1,6}\s+(.+?)\s*#*\s*$/;
const BOLD_LABEL_LINE = /^\s*(?:[-*+]\s+)?(?:\*\*|__)(.+?)(?:\*\*|__)\s*:?\s*(.*)$/;
const PLAIN_LABEL_LINE = /^\s*(?:[-*+]\s+)?([A-Za-z][A-Za-z' ]{0,40}):\s*(.*)$/;
const FENCE_LINE = /^\s{0,3}(`{3,}|~{3,})/;
const RULE_LINE = /^\s*(-{3,}|\*{3,}|_{3,})\s*$/;
const ECHO_HEADING_LINE = /^\s{0,3}#{1,6}\s+analysis of comment\b/i;

interface LabelMatch {
  key: SectionKey;
  rest: string;
}

export type ParsedSections = Record<SectionKey, string> & {
  // text before the first label, minus rules and an echoed report heading
  preamble: string;
};

function classifyLabel(label: string): SectionKey | null {
  const normalized = label
    .toLowerCase()
    .replace(/[*_`'"‘’“”]/g, '')
    .replace(/:\s*$/, '')
    .replace(/\s+/g, ' ')
    .trim();

  if (!normalized || normalized.split(' ').length > MAX_LABEL_WORDS) {
    return null;
  }

  for (const [key, pattern] of LABEL_PATTERNS) {
    if (pattern.test(normalized)) {
      return key;
    }
  }

  return null;
}

function matchLabel(line: string): LabelMatch | null {
  const heading = HEADING_LINE.exec(line);
  if (heading) {
    const key = classifyLabel(heading[1]);
    return key ? { key, rest: '' } : null;
  }

  const bold = BOLD_LABEL_LINE.exec(line);
  if (bold) {
    const key = classifyLabel(bold[1]);
    return key ? { key, rest: bold[2] } : null;
  }

  const plain = PLAIN_LABEL_LINE.exec(line);
  if (plain) {
    const key = classifyLabel(plain[1]);
    return key ? { key, rest: plain[2] } : null;
  }

  return null;
}

function cleanSection(lines: string[]): string {
  const trimmed = [...lines];
  while (trimmed.length > 0 && (trimmed[trimmed.length - 1].trim() === '' || RULE_LINE.test(trimmed[trimmed.length - 1]))) {
    trimmed.pop();
  }
  return trimmed.join('\n').trim();
}

/**
 * Split model text into the four labeled sections. Returns null when no
 * label is recognized at all. Each label is taken at its first occurrence;
 * a repeated label, or anything inside a fenced code block, is content.
 */
export function splitSections(rawText: string): ParsedSections | null {
  const lines = rawText.replace(/\r\n?/g, '\n').split('\n');
  const collected = new Map<SectionKey, string[]>();
  const preamble: string[] = [];
  let current: SectionKey | null = null;
  let openFence: string | null = null;

  for (const line of lines) {
    const fence = FENCE_LINE.exec(line);
    if (fence) {
      const marker = fence[1];
      if (openFence === null) {
        openFence = marker;
      } else if (marker[0] === openFence[0] && marker.length >= openFence.length) {
        openFence = null;
      }
    } else if (openFence === null) {
      const label = matchLabel(line);
      if (label && !collected.has(label.key)) {
        current = label.key;
        collected.set(current, label.rest ? [label.rest] : []);
        continue;
      }
    }

    if (current) {
      collected.get(current)?.push(line);
    } else if (!RULE_LINE.test(line) && !ECHO_HEADING_LINE.test(line)) {
      preamble.push(line);
    }
  }

  if (collected.size === 0) {
    return null;
  }

  return {
    rephrasing: cleanSection(collected.get('rephrasing') ?? []),
    why: cleanSection(collected.get('why') ?? []),
    suggestion: cleanSection(collected.get('suggestion') ?? []),
    resource: cleanSection(collected.get('resource') ?? []),
    preamble: cleanSection(preamble),
  };
}

/**
 * Build a CommentAnalysis from raw model text. Text without any
 * recognizable label lands in `explanation` in full; text before the
 * first label is kept ahead of the "why" section.
 */
export function parseAnalysis(rawText: string, originalComment: string): CommentAnalysis {
  const severity = inferSeverity(originalComment);
  const sections = splitSections(rawText);

  if (!sections) {
    const error = new ParseError('No recognizable section labels in model response', rawText);
    appLogger.warn('Model response fell back to explanation-only', {
      comment: originalComment,
      error: error.message,
      responseLength: rawText.length
    });

    return Object.freeze({
      originalComment,
      positiveRephrasing: '',
      explanation: rawText,
      suggestedCode: '',
      resourceLink: '',
      severity,
      degraded: false
    });
  }

  return Object.freeze({
    originalComment,
    positiveRephrasing: sections.rephrasing,
    explanation: [sections.preamble, sections.why].filter(Boolean).join('\n\n'),
    suggestedCode: sections.suggestion,
    resourceLink: sections.resource,
    severity,
    degraded: false
  });
}

/**
 * Placeholder analysis for a comment whose model call failed.
 */
export function createDegradedAnalysis(originalComment: string, error: unknown): CommentAnalysis {
  const reason = error instanceof Error ? error.message : String(error);

  return Object.freeze({
    originalComment,
    positiveRephrasing: '',
    explanation: `Could not generate feedback due to an API error: ${reason}`,
    suggestedCode: '',
    resourceLink: '',
    severity: inferSeverity(originalComment),
    degraded: true
  });
}
