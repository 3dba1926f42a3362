#!/usr/bin/env node
/**
 * Batch CLI entry point
 *
 * Usage:
 *   directory-summarizer-batch ./papers
 *   directory-summarizer-batch ./papers --remote "node dist/index.js"
 *
 * @module bin-batch
 */

import { runBatchCli } from './cli/batch.js';
import { loadEnvFile } from './utils/env.js';

loadEnvFile();

const controller = new AbortController();
process.on('SIGINT', () => {
  console.error('[batch] Interrupted, stopping after the current step...');
  controller.abort();
});

runBatchCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[batch] Fatal error:', error);
    process.exitCode = 1;
  });
