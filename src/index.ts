#!/usr/bin/env node
import 'dotenv/config';
import { run } from './cli';
import { appLogger } from './utils/logging';

const controller = new AbortController();

process.once('SIGINT', () => {
  appLogger.warn('Received SIGINT, stopping before the report is written');
  controller.abort();
});

run(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    appLogger.error('fatal', error);
    process.exitCode = 1;
  });
