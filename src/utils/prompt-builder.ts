import { EmpatheticReviewPrompts } from '../prompts';
import type { CommentAnalysis } from '../types';
import { inferSeverity, toneDirective } from './severity';

export class PromptBuilder {

  static buildAnalysisPrompt(snippet: string, comment: string, language: string): string {
    const severity = inferSeverity(comment);
    return EmpatheticReviewPrompts.createAnalysisPrompt(snippet, comment, {
      language,
      severity,
      toneDirective: toneDirective(severity)
    });
  }

  static buildSummaryPrompt(snippet: string, analyses: readonly CommentAnalysis[], language: string): string {
    return EmpatheticReviewPrompts.createSummaryPrompt(snippet, analyses, { language });
  }

}

