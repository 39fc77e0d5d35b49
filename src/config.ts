import path from 'path';
import { fileURLToPath } from 'url';

import { readEnvFile } from './env.js';

// Values come from process.env first, then .env, then the defaults below.
const envConfig = readEnvFile([
  'CONTENT_FETCH_TIMEOUT',
  'DEFAULT_TEMPLATE_PATH',
  'PROMPTS_OUTPUT_FILE',
]);

function setting(key: string): string | undefined {
  return process.env[key] || envConfig[key];
}

const PROJECT_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
);

// Content fetch timeout (milliseconds)
export const CONTENT_FETCH_TIMEOUT = Math.max(
  1,
  parseInt(setting('CONTENT_FETCH_TIMEOUT') || '10000', 10) || 10000,
);

export const DEFAULT_TEMPLATE_PATH = path.resolve(
  setting('DEFAULT_TEMPLATE_PATH') ||
    path.join(PROJECT_ROOT, 'templates', 'default-prompt.md'),
);

// Batch export file name, relative to the working directory
export const PROMPTS_OUTPUT_FILE =
  setting('PROMPTS_OUTPUT_FILE') || 'generated_prompts.csv';
