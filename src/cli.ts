import { promises as fs } from 'fs';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig } from './config/env';
import type { AppConfig, ConfigOverrides, ModelClient } from './types';
import { ConfigError, InputError, PipelineAbortedError } from './types';
import { GeminiModelClient } from './utils/gemini-llm';
import { loadReviewInput } from './utils/input-loader';
import { appLogger, setLogLevel } from './utils/logging';
import { renderReport } from './utils/report-renderer';
import { ReviewPipeline } from './utils/review-pipeline';

export const DEFAULT_OUTPUT_FILE = 'report.md';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createClient?: (config: AppConfig) => ModelClient;
  signal?: AbortSignal;
  print?: (line: string) => void;
}

interface CliOptions {
  output: string;
  model?: string;
  language?: string;
  concurrency?: number;
  retries?: number;
  backoff?: string;
  timeout?: number;
}

function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

function buildProgram(): Command {
  return new Command()
    .name('empathetic-review')
    .description('Turn terse code review comments into an empathetic, educational Markdown report')
    .argument('<input>', 'path to the input JSON file')
    .option('-o, --output <file>', 'path for the output Markdown file', DEFAULT_OUTPUT_FILE)
    .option('-m, --model <name>', 'Gemini model to use')
    .option('-l, --language <lang>', 'language of the code snippet, used for code fences')
    .option('-c, --concurrency <n>', 'number of comments analyzed in parallel', parseInteger(1))
    .option('-r, --retries <n>', 'retries per model call', parseInteger(0))
    .option('--backoff <strategy>', 'retry backoff: fixed or exponential')
    .option('-t, --timeout <ms>', 'timeout per model call in milliseconds', parseInteger(1))
    .exitOverride();
}

async function review(inputPath: string, options: CliOptions, deps: CliDependencies): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));

  const overrides: ConfigOverrides = {
    model: options.model,
    language: options.language,
    concurrency: options.concurrency,
    retries: options.retries,
    backoff: options.backoff,
    timeoutMs: options.timeout,
  };

  const config = loadConfig(deps.env ?? process.env, overrides);
  setLogLevel(config.logLevel);

  appLogger.info(`Loading data from '${inputPath}'`);
  const input = await loadReviewInput(inputPath);

  const client = deps.createClient ? deps.createClient(config) : new GeminiModelClient(config.model);
  const { report, stats } = await ReviewPipeline.generateReport(input, client, {
    language: config.language,
    concurrency: config.concurrency,
    signal: deps.signal,
  });

  appLogger.info('Assembling the final report');
  await fs.writeFile(options.output, renderReport(report), 'utf-8');

  const degradedCount = stats.degradedAnalyses + (stats.summaryDegraded ? 1 : 0);
  if (degradedCount > 0) {
    print(`Warning: ${degradedCount} item(s) could not be generated and were replaced with placeholders.`);
  }
  print(`Success! Your empathetic code review has been saved to '${options.output}'`);

  return EXIT_SUCCESS;
}

/**
 * Parse `argv` (user arguments only, without node and script path)
 * and run the review. Resolves to the process exit code.
 */
export async function run(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const program = buildProgram();
  let exitCode = EXIT_SUCCESS;

  program.action(async (inputPath: string, options: CliOptions) => {
    exitCode = await review(inputPath, options, deps);
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    if (error instanceof ConfigError) {
      appLogger.error('config', error, { issues: error.issues });
      console.error(`A configuration error occurred: ${error.message}`);
      return EXIT_FAILURE;
    }

    if (error instanceof InputError) {
      appLogger.error('input', error, { file: error.filePath });
      console.error(`An input error occurred: ${error.message}`);
      return EXIT_FAILURE;
    }

    if (error instanceof PipelineAbortedError) {
      console.error('Interrupted. No report was written.');
      return EXIT_INTERRUPTED;
    }

    appLogger.error('cli', error);
    console.error(`An unexpected error occurred: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }
}
