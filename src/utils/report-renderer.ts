import { SECTION_HEADINGS } from '../prompts';
import type { CommentAnalysis, Report } from '../types';

export const REPORT_TITLE = 'Empathetic Code Review Report';
export const NOT_PROVIDED = '_Not provided._';

const REPORT_INTRO = 'Here is a constructive analysis of the provided code snippet. The goal is to provide clear, educational, and encouraging feedback to help you grow as a developer.';
const DEGRADED_NOTE = '> _Detailed feedback for this comment could not be generated. The original comment is kept above so nothing is lost._';

/**
 * Wrap code in a fence longer than any backtick run it contains.
 */
export function fenceCode(code: string, language: string = ''): string {
  const longestRun = (code.match(/`+/g) ?? []).reduce((max, run) => Math.max(max, run.length), 0);
  const fence = '`'.repeat(Math.max(3, longestRun + 1));
  return `${fence}${language}\n${code.replace(/\n+$/, '')}\n${fence}`;
}

function hasOwnFence(text: string): boolean {
  return /^\s{0,3}(`{3,}|~{3,})/m.test(text);
}

function orPlaceholder(text: string): string {
  return text.trim() ? text.trim() : NOT_PROVIDED;
}

function renderSuggestion(suggestedCode: string, language: string): string {
  if (!suggestedCode.trim()) {
    return NOT_PROVIDED;
  }
  // model output usually carries its own fence (and sometimes prose around it)
  return hasOwnFence(suggestedCode) ? suggestedCode.trim() : fenceCode(suggestedCode.trim(), language);
}

function quoteComment(comment: string): string {
  return comment.replace(/\s+/g, ' ').replace(/"/g, '\\"');
}

function renderAnalysis(analysis: CommentAnalysis, language: string): string {
  const parts = [`### Analysis of Comment: "${quoteComment(analysis.originalComment)}"`];

  if (analysis.degraded) {
    parts.push(DEGRADED_NOTE, `*${analysis.explanation}*`);
    return parts.join('\n\n');
  }

  parts.push(
    `**${SECTION_HEADINGS.rephrasing}:**\n\n${orPlaceholder(analysis.positiveRephrasing)}`,
    `**${SECTION_HEADINGS.why}:**\n\n${orPlaceholder(analysis.explanation)}`,
    `**${SECTION_HEADINGS.suggestion}:**\n\n${renderSuggestion(analysis.suggestedCode, language)}`,
    `**${SECTION_HEADINGS.resource}:**\n\n${orPlaceholder(analysis.resourceLink)}`
  );

  return parts.join('\n\n');
}

/**
 * Render the whole report as Markdown. Pure: the same Report always
 * produces the same string.
 */
export function renderReport(report: Report): string {
  const sections = [
    `# ${REPORT_TITLE}`,
    REPORT_INTRO,
    `## Original Code Snippet\n\n${fenceCode(report.snippet, report.language)}`,
    '## Detailed Feedback',
    ...report.analyses.map((analysis) => `${renderAnalysis(analysis, report.language)}\n\n---`),
    `## Overall Summary\n\n${report.summaryDegraded ? `*${report.summary}*` : orPlaceholder(report.summary)}`,
  ];

  return `${sections.join('\n\n')}\n`;
}
