import type { CommentAnalysis, ModelClient, PipelineResult, Report, ReviewInput } from '../types';
import { PipelineAbortedError } from '../types';
import { appLogger } from './logging';
import { PromptBuilder } from './prompt-builder';
import { createDegradedAnalysis, parseAnalysis } from './response-parser';

export interface PipelineOptions {
  language: string;
  concurrency?: number;
  signal?: AbortSignal;
}

export function degradedSummary(error: unknown): string {
  const reason = error instanceof Error ? error.message : String(error);
  return `Could not generate a final summary due to an API error: ${reason}`;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PipelineAbortedError();
  }
}

/**
 * Run `worker` over every item with at most `limit` in flight.
 * Results are stored by input index, so order never depends on timing.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const runWorker = async (): Promise<void> => {
    while (next < items.length) {
      throwIfAborted(signal);
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => runWorker());
  await Promise.all(workers);
  throwIfAborted(signal);

  return results;
}

export class ReviewPipeline {

  /**
   * Analyze one comment. Never throws for service or parse failures:
   * those yield a degraded analysis instead. An abort propagates.
   */
  static async analyzeComment(
    client: ModelClient,
    snippet: string,
    comment: string,
    language: string,
    position: { index: number; total: number },
    signal?: AbortSignal
  ): Promise<CommentAnalysis> {
    const startTime = Date.now();
    const prompt = PromptBuilder.buildAnalysisPrompt(snippet, comment, language);

    try {
      const raw = await client.complete(prompt, { signal });
      const analysis = parseAnalysis(raw, comment);

      appLogger.analysis({
        ...position,
        comment,
        success: true,
        duration: Date.now() - startTime,
        severity: analysis.severity
      });

      return analysis;
    } catch (error) {
      if (error instanceof PipelineAbortedError) {
        throw error;
      }
      appLogger.analysis({
        ...position,
        comment,
        success: false,
        duration: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error)
      });

      return createDegradedAnalysis(comment, error);
    }
  }

  static async generateSummary(
    client: ModelClient,
    snippet: string,
    analyses: readonly CommentAnalysis[],
    language: string,
    signal?: AbortSignal
  ): Promise<{ summary: string; degraded: boolean }> {
    const startTime = Date.now();

    try {
      const summary = await client.complete(PromptBuilder.buildSummaryPrompt(snippet, analyses, language), { signal });
      appLogger.summary({ success: true, duration: Date.now() - startTime });
      return { summary: summary.trim(), degraded: false };
    } catch (error) {
      if (error instanceof PipelineAbortedError) {
        throw error;
      }
      appLogger.summary({
        success: false,
        duration: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error)
      });
      return { summary: degradedSummary(error), degraded: true };
    }
  }

  /**
   * Analyze every comment, then summarize. Every input comment yields
   * exactly one analysis, in input order.
   */
  static async generateReport(input: ReviewInput, client: ModelClient, options: PipelineOptions): Promise<PipelineResult> {
    const startTime = Date.now();
    const language = input.language ?? options.language;
    const total = input.comments.length;

    appLogger.info('Starting feedback generation', {
      comments: total,
      concurrency: options.concurrency ?? 1,
      language
    });

    const analyses = await mapWithConcurrency(
      input.comments,
      options.concurrency ?? 1,
      (comment, index) => this.analyzeComment(client, input.codeSnippet, comment, language, { index, total }, options.signal),
      options.signal
    );

    throwIfAborted(options.signal);
    appLogger.info('Generating holistic summary');
    const { summary, degraded } = await this.generateSummary(client, input.codeSnippet, analyses, language, options.signal);
    throwIfAborted(options.signal);

    const report: Report = Object.freeze({
      snippet: input.codeSnippet,
      language,
      analyses: Object.freeze(analyses),
      summary,
      summaryDegraded: degraded
    });

    const stats = {
      totalComments: total,
      degradedAnalyses: analyses.filter((analysis) => analysis.degraded).length,
      summaryDegraded: degraded,
      durationMs: Date.now() - startTime
    };

    appLogger.performance('generate_report', stats.durationMs, { ...stats });

    return { report, stats };
  }
}
