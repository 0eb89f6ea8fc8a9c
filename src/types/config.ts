/**
 * Configuration-related types and interfaces
 */

import type { ModelSettings } from './ai';

export interface AppConfig {
  model: ModelSettings;
  language: string;
  concurrency: number;
  logLevel: string;
}

export interface ConfigOverrides {
  model?: string;
  language?: string;
  concurrency?: number;
  retries?: number;
  backoff?: string;
  timeoutMs?: number;
}
