import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { EXIT_FAILURE, EXIT_SUCCESS, run } from '../src/cli';
import type { AppConfig } from '../src/types';
import { FakeModelClient, FOUR_SECTION_RESPONSE, isSummaryPrompt, SUMMARY_TEXT, waitForAbort } from './helpers/fake-model-client';

const env = { GEMINI_API_KEY: 'test-secret' };

describe('run', () => {
  let dir: string;
  let inputPath: string;
  let outputPath: string;
  let printed: string[];
  let client: FakeModelClient;

  const writeInput = (data: unknown) => fs.writeFileSync(inputPath, JSON.stringify(data), 'utf-8');

  const deps = () => ({
    env,
    createClient: () => client,
    print: (line: string) => {
      printed.push(line);
    }
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'empathetic-cli-'));
    inputPath = path.join(dir, 'input.json');
    outputPath = path.join(dir, 'report.md');
    printed = [];
    client = new FakeModelClient((prompt) => (isSummaryPrompt(prompt) ? SUMMARY_TEXT : FOUR_SECTION_RESPONSE));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the report and exits with 0', async () => {
    writeInput({ code_snippet: 'x=1', review_comments: ['rename x', 'add a docstring'] });

    const code = await run([inputPath, '-o', outputPath], deps());

    expect(code).toBe(EXIT_SUCCESS);
    const markdown = fs.readFileSync(outputPath, 'utf-8');
    expect(markdown.match(/^### Analysis of Comment: /gm)).toHaveLength(2);
    expect(markdown).toContain('```python\nx=1\n```');
    expect(printed).toEqual([`Success! Your empathetic code review has been saved to '${outputPath}'`]);
  });

  it('overwrites an existing report', async () => {
    writeInput({ code_snippet: 'x=1', review_comments: ['rename x'] });
    fs.writeFileSync(outputPath, 'stale content', 'utf-8');

    await run([inputPath, '--output', outputPath], deps());

    expect(fs.readFileSync(outputPath, 'utf-8')).not.toContain('stale content');
  });

  it('passes command-line options into the client configuration', async () => {
    writeInput({ code_snippet: 'x=1', review_comments: ['rename x'] });
    let seen: AppConfig | undefined;

    await run([inputPath, '-o', outputPath, '--model', 'gemini-1.5-pro', '--retries', '2', '--concurrency', '3'], {
      ...deps(),
      createClient: (config: AppConfig) => {
        seen = config;
        return client;
      }
    });

    expect(seen?.model.model).toBe('gemini-1.5-pro');
    expect(seen?.model.retry.retries).toBe(2);
    expect(seen?.concurrency).toBe(3);
  });

  it('reports degraded items but still succeeds', async () => {
    writeInput({ code_snippet: 'x=1', review_comments: ['rename x'] });
    client = new FakeModelClient(() => {
      throw new Error('service unavailable');
    });

    const code = await run([inputPath, '-o', outputPath], deps());

    expect(code).toBe(EXIT_SUCCESS);
    expect(printed[0]).toBe('Warning: 2 item(s) could not be generated and were replaced with placeholders.');
    expect(fs.existsSync(outputPath)).toBe(true);
  });

  it('exits non-zero and writes nothing when review_comments is missing', async () => {
    writeInput({ code_snippet: 'x=1' });

    const code = await run([inputPath, '-o', outputPath], deps());

    expect(code).toBe(EXIT_FAILURE);
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(client.prompts).toHaveLength(0);
  });

  it('exits non-zero on an empty review_comments list', async () => {
    writeInput({ code_snippet: 'x=1', review_comments: [] });

    const code = await run([inputPath, '-o', outputPath], deps());

    expect(code).toBe(EXIT_FAILURE);
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it('exits non-zero before any call when the API key is missing', async () => {
    writeInput({ code_snippet: 'x=1', review_comments: ['rename x'] });

    const code = await run([inputPath, '-o', outputPath], { ...deps(), env: {} });

    expect(code).toBe(EXIT_FAILURE);
    expect(client.prompts).toHaveLength(0);
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it('rejects invalid numeric options', async () => {
    writeInput({ code_snippet: 'x=1', review_comments: ['rename x'] });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const code = await run([inputPath, '--concurrency', '0'], deps());

    expect(code).toBe(EXIT_FAILURE);
  });

  it('writes no report when interrupted', async () => {
    writeInput({ code_snippet: 'x=1', review_comments: ['rename x'] });
    const controller = new AbortController();
    controller.abort();

    const code = await run([inputPath, '-o', outputPath], { ...deps(), signal: controller.signal });

    expect(code).toBe(130);
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it('exits with 130 and writes no report when interrupted during a model call', async () => {
    writeInput({ code_snippet: 'x=1', review_comments: ['rename x'] });
    const controller = new AbortController();
    client = new FakeModelClient((prompt, callIndex, signal) => {
      setTimeout(() => controller.abort(), 0);
      return waitForAbort(prompt, callIndex, signal);
    });

    const code = await run([inputPath, '-o', outputPath], { ...deps(), signal: controller.signal });

    expect(code).toBe(130);
    expect(client.prompts).toHaveLength(1);
    expect(fs.existsSync(outputPath)).toBe(false);
  });
});
