/**
 * AI-related types and interfaces
 */

/**
 * Opaque text-completion capability. The pipeline only ever talks to this,
 * so tests can swap in a deterministic fake.
 */
export interface ModelClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface CompletionOptions {
  /** Cancels the in-flight request; the call then rejects with PipelineAbortedError. */
  signal?: AbortSignal;
}

export type BackoffStrategy = 'fixed' | 'exponential';

export interface RetryPolicy {
  retries: number;
  backoff: BackoffStrategy;
  baseDelayMs: number;
}

export interface ModelSettings {
  apiKey: string;
  model: string;
  baseURL: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  retry: RetryPolicy;
}
