import type { CommentAnalysis, CommentSeverity } from '../types';

/**
 * Headings the model is asked to use. The response parser and report
 * renderer rely on the same wording.
 */
export const SECTION_HEADINGS = {
  rephrasing: 'Positive Rephrasing',
  why: "The 'Why'",
  suggestion: 'Suggested Improvement',
  resource: 'Further Learning',
} as const;

export type SectionKey = keyof typeof SECTION_HEADINGS;

export interface AnalysisPromptOptions {
  language: string;
  severity: CommentSeverity;
  toneDirective: string;
}

export interface SummaryPromptOptions {
  language: string;
}

const MENTOR_PERSONA = 'You are an expert senior software engineer and a patient, empathetic mentor.';

export class EmpatheticReviewPrompts {

  static createAnalysisPrompt(snippet: string, comment: string, options: AnalysisPromptOptions): string {
    const { language, severity, toneDirective } = options;

    return `${MENTOR_PERSONA}
Your mission is to transform a direct, critical code review comment into constructive, educational and encouraging feedback.

You will be given a snippet of ${language} code and a single review comment.

REVIEW COMMENT:
"${comment}"

ESTIMATED SEVERITY: ${severity}
TONE: ${toneDirective}

Respond in Markdown using EXACTLY these four headings, in this order, each on its own line:

### ${SECTION_HEADINGS.rephrasing}
Rewrite the feedback in a gentle, supportive tone. Start by acknowledging the developer's effort or something positive about the original attempt.

### ${SECTION_HEADINGS.why}
Clearly and concisely explain the underlying software engineering principle (e.g. performance, readability, style conventions, security).

### ${SECTION_HEADINGS.suggestion}
Provide a concrete, corrected code snippet that implements the suggestion, inside a fenced \`\`\`${language} code block.

### ${SECTION_HEADINGS.resource}
Provide one high-quality URL to authoritative documentation or a well-regarded article that explains the concept in more detail.

RULES:
- Do not add any other headings or a preamble before the first heading
- Adjust your tone to the severity: a style nit is treated lightly, a potential bug gets clear but supportive urgency
- Keep each section focused on this single comment

CODE SNIPPET TO ANALYZE:
\`\`\`${language}
${snippet}
\`\`\`
`;
  }

  static createSummaryPrompt(snippet: string, analyses: readonly CommentAnalysis[], options: SummaryPromptOptions): string {
    const { language } = options;
    const feedback = analyses
      .filter((analysis) => !analysis.degraded)
      .map((analysis, index) => `${index + 1}. Comment: "${analysis.originalComment}" (severity: ${analysis.severity})
   ${SECTION_HEADINGS.rephrasing}: ${analysis.positiveRephrasing || 'n/a'}
   ${SECTION_HEADINGS.why}: ${analysis.explanation || 'n/a'}`)
      .join('\n\n');

    return `${MENTOR_PERSONA}
You have just provided detailed feedback on a code snippet.

Now write ONE brief, holistic paragraph summarizing all of the feedback. The goal is to leave the developer feeling motivated and positive about their growth.

Name the categories of feedback that were given (for example efficiency, naming, conventions, correctness) in an encouraging way, and end on a positive, forward-looking note about their work and potential.
Respond with the paragraph only: no headings, no lists, no code blocks.

ORIGINAL CODE:
\`\`\`${language}
${snippet}
\`\`\`

FEEDBACK GIVEN:
${feedback || 'No detailed feedback could be generated for this snippet.'}
`;
  }
}
