import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { CompletionOptions, ModelClient, ModelSettings } from '../types';
import { PipelineAbortedError, ServiceError } from '../types';
import { appLogger, withRetry, withTimeout } from './logging';

/**
 * Gemini text completion through the OpenAI-compatible endpoint
 */

const SYSTEM_PROMPT = 'You are a patient, empathetic senior engineer mentoring a colleague through code review. Follow the requested output format exactly.';

/**
 * The slice of the chat completions API this client needs.
 */
export interface ChatCompletionTransport {
  create(params: ChatCompletionCreateParamsNonStreaming, options: { timeout: number; signal: AbortSignal }): Promise<{
    choices: Array<{ message?: { content?: string | null } | null }>;
  }>;
}

function createOpenAITransport(settings: ModelSettings): ChatCompletionTransport {
  const client = new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseURL,
    timeout: settings.timeoutMs,
    // retries are handled by withRetry
    maxRetries: 0,
  });

  return {
    create: (params, options) => client.chat.completions.create(params, options),
  };
}

function toServiceError(err: unknown, operation: string): ServiceError {
  if (err instanceof ServiceError) {
    return err;
  }

  if (err instanceof OpenAI.APIError) {
    return new ServiceError(`API Error ${err.status ?? 'unknown'}: ${err.message}`, operation, err, err.status);
  }

  if (err instanceof Error) {
    return new ServiceError(err.message, operation, err);
  }

  return new ServiceError('Unknown error', operation);
}

export class GeminiModelClient implements ModelClient {
  private readonly transport: ChatCompletionTransport;

  constructor(private readonly settings: ModelSettings, transport?: ChatCompletionTransport) {
    this.transport = transport ?? createOpenAITransport(settings);
  }

  /**
   * Send one prompt and return the model's text.
   * Throws ServiceError on API failure, timeout or an empty reply, and
   * PipelineAbortedError when `options.signal` aborts.
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const { retry, timeoutMs } = this.settings;
    const startTime = Date.now();

    try {
      const text = await withRetry(
        () => this.completeOnce(prompt, timeoutMs, options.signal),
        retry.retries,
        retry.baseDelayMs,
        'gemini_complete',
        retry.backoff
      );

      appLogger.performance('gemini_complete', Date.now() - startTime, {
        model: this.settings.model,
        promptLength: prompt.length,
        responseLength: text.length
      });

      return text;
    } catch (err) {
      if (err instanceof PipelineAbortedError) {
        throw err;
      }
      throw toServiceError(err, 'gemini_complete');
    }
  }

  /**
   * One request. The request is cancelled when the timeout passes or the
   * caller's signal aborts.
   */
  private async completeOnce(prompt: string, timeoutMs: number, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new PipelineAbortedError();
    }

    const controller = new AbortController();
    let onAbort = (): void => undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => {
        reject(new PipelineAbortedError());
        controller.abort();
      };
    });
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const request = this.transport.create({
        model: this.settings.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt }
        ],
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
      }, { timeout: timeoutMs, signal: controller.signal });

      const response = await withTimeout(
        Promise.race([request, aborted]),
        timeoutMs,
        'gemini_complete',
        () => controller.abort()
      );

      const content = response.choices[0]?.message?.content?.trim() ?? '';
      if (!content) {
        throw new ServiceError('No response received from Gemini model', 'gemini_complete');
      }

      return content;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
