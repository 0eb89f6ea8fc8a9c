/**
 * Review-related types and interfaces
 */

export type CommentSeverity = 'nit' | 'minor' | 'major' | 'critical';

export interface ReviewInput {
  readonly codeSnippet: string;
  readonly comments: readonly string[];
  readonly language?: string;
}

export interface CommentAnalysis {
  readonly originalComment: string;
  readonly positiveRephrasing: string;
  readonly explanation: string;
  readonly suggestedCode: string;
  readonly resourceLink: string;
  readonly severity: CommentSeverity;
  readonly degraded: boolean;
}

export interface Report {
  readonly snippet: string;
  readonly language: string;
  readonly analyses: readonly CommentAnalysis[];
  readonly summary: string;
  readonly summaryDegraded: boolean;
}

export interface PipelineStats {
  totalComments: number;
  degradedAnalyses: number;
  summaryDegraded: boolean;
  durationMs: number;
}

export interface PipelineResult {
  report: Report;
  stats: PipelineStats;
}
