#!/usr/bin/env node
/**
 * prompt-filler CLI
 *
 * Runs one session end to end:
 * - Loads the template (or the built-in default)
 * - Optionally fetches activity content to fill the content variables
 * - Applies manual `--var name=value` edits
 * - Fills the template for a single answer (printed to stdout) or for
 *   every row of an answers CSV (written as CSV)
 */
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

import { formatPromptsCsv } from './answers.js';
import { DEFAULT_TEMPLATE_PATH, PROMPTS_OUTPUT_FILE } from './config.js';
import { logger } from './logger.js';
import {
  Notice,
  SessionState,
  createSession,
  describeSession,
  fetchContent,
  generatePrompts,
  loadBatchAnswers,
  setContentValue,
  setSingleAnswer,
  setTemplate,
} from './session.js';
import { TEMPLATE_VARIABLES } from './variables.js';

export interface CliOptions {
  template?: string;
  url?: string;
  vars: Array<[string, string]>;
  answer?: string;
  answers?: string;
  out: string;
  listVariables: boolean;
}

interface RawCliOptions {
  template?: string;
  url?: string;
  var: Array<[string, string]>;
  answer?: string;
  answers?: string;
  out: string;
  listVariables?: boolean;
}

function collectVar(
  entry: string,
  previous: Array<[string, string]>,
): Array<[string, string]> {
  const eqIdx = entry.indexOf('=');
  if (eqIdx <= 0) {
    throw new InvalidArgumentError(`Invalid --var "${entry}", expected NAME=VALUE`);
  }
  return [...previous, [entry.slice(0, eqIdx), entry.slice(eqIdx + 1)]];
}

export function createProgram(): Command {
  return new Command()
    .name('prompt-filler')
    .description(
      'Fill a prompt template from activity content and one or more student answers',
    )
    .version('0.1.0')
    .option('--template <file>', 'prompt template (default: built-in template)')
    .option('--url <url>', 'fetch activity content JSON to fill the content variables')
    .option(
      '--var <name=value>',
      'set a content variable by hand (repeatable, applied after --url)',
      collectVar,
      [],
    )
    .addOption(
      new Option('--answer <text>', 'fill the template for a single answer').conflicts(
        'answers',
      ),
    )
    .option(
      '--answers <file>',
      "fill the template for every row of a CSV with an 'Answers' column",
    )
    .option('--out <file>', 'where to write batch output', PROMPTS_OUTPUT_FILE)
    .option('--list-variables', 'print the template variables and exit')
    .exitOverride();
}

/**
 * Parse argv (without the node/script prefix) into CLI options.
 *
 * @throws CommanderError on unknown flags, a malformed --var, both
 *   --answer and --answers, or after printing --help / --version
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const program = createProgram();
  program.parse(argv, { from: 'user' });
  const opts = program.opts<RawCliOptions>();

  return {
    template: opts.template,
    url: opts.url,
    vars: opts.var,
    answer: opts.answer,
    answers: opts.answers,
    out: opts.out,
    listVariables: opts.listVariables ?? false,
  };
}

/** True when `entry` (argv[1], possibly an npm bin symlink) is this module. */
export function isDirectRun(moduleUrl: string, entry: string | undefined): boolean {
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

function report(notices: Notice[]): void {
  for (const { level, message } of notices) {
    if (level === 'error') logger.error(message);
    else if (level === 'warning') logger.warn(message);
    else logger.info(message);
  }
}

async function main(): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    // commander has already printed help, the version, or the usage error
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  if (opts.listVariables) {
    console.log(TEMPLATE_VARIABLES.map((name) => `{{${name}}}`).join('\n'));
    return 0;
  }

  const templatePath = path.resolve(opts.template ?? DEFAULT_TEMPLATE_PATH);
  let state: SessionState = setTemplate(
    createSession(),
    fs.readFileSync(templatePath, 'utf-8'),
  );
  logger.debug({ templatePath }, 'Template loaded');

  if (opts.url !== undefined) {
    const fetched = await fetchContent(state, opts.url);
    report(fetched.notices);
    state = fetched.state;
  }

  for (const [name, value] of opts.vars) {
    state = setContentValue(state, name, value);
  }

  if (opts.answers !== undefined) {
    const csvPath = path.resolve(opts.answers);
    const loaded = loadBatchAnswers(
      state,
      path.basename(csvPath),
      fs.readFileSync(csvPath, 'utf-8'),
    );
    report(loaded.notices);
    state = loaded.state;
  } else {
    state = setSingleAnswer(state, opts.answer ?? '');
  }

  const summary = describeSession(state);
  logger.info(
    {
      contentUrl: summary.contentUrl,
      answerMode: summary.answerMode,
      answers: summary.answers,
    },
    'Generating prompts',
  );
  for (const { variable, value } of summary.values) {
    logger.debug({ variable, value }, 'Content variable');
  }

  const result = generatePrompts(state);
  report(result.notices);
  if (result.prompts.length === 0) return 1;

  if (state.answerMode === 'single') {
    process.stdout.write(`${result.prompts[0]}\n`);
  } else {
    const outPath = path.resolve(opts.out);
    fs.writeFileSync(outPath, formatPromptsCsv(result.prompts), 'utf-8');
    logger.info(
      { outPath, count: result.prompts.length },
      'Generated prompts written',
    );
  }
  return 0;
}

// Guard: only run when executed directly, not when imported by tests
if (isDirectRun(import.meta.url, process.argv[1])) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      logger.error({ err }, 'prompt-filler failed');
      process.exit(1);
    });
}
