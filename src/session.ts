/**
 * Interactive session state and the handlers that act on it.
 *
 * State is an immutable value: each handler takes the current state and
 * returns the next one along with the notices to show the user. Nothing
 * is held between calls except what the caller passes back in.
 */
import { MissingAnswersColumnError, parseAnswersCsv } from './answers.js';
import {
  ContentFetchError,
  FetchContentOptions,
  fetchContentValues,
} from './content-fetcher.js';
import { logger } from './logger.js';
import {
  findTemplateTokens,
  findUnknownTokens,
  fillTemplate,
  fillTemplateBatch,
} from './template.js';
import {
  ANSWER_VARIABLE,
  CONTENT_VARIABLES,
  ContentValues,
  ContentVariable,
  UnknownVariableError,
  emptyContentValues,
  isContentVariable,
} from './variables.js';

export type AnswerMode = 'single' | 'batch';

export type NoticeLevel = 'info' | 'success' | 'warning' | 'error';

export interface Notice {
  level: NoticeLevel;
  message: string;
}

export interface SessionState {
  readonly template: string;
  readonly contentUrl: string;
  readonly values: Readonly<ContentValues>;
  readonly answerMode: AnswerMode;
  readonly singleAnswer: string;
  /** Answers from the last loaded CSV; null when none is loaded. */
  readonly batchAnswers: readonly string[] | null;
  readonly batchFileName: string | null;
}

export interface HandlerResult {
  state: SessionState;
  notices: Notice[];
}

export interface GenerateResult extends HandlerResult {
  /** One prompt per answer, in answer order. */
  prompts: string[];
}

export interface SessionSummary {
  contentUrl: string;
  values: Array<{ variable: ContentVariable; value: string }>;
  answerMode: AnswerMode;
  answers: string;
}

const notice = (level: NoticeLevel, message: string): Notice => ({
  level,
  message,
});

export function createSession(template = ''): SessionState {
  return {
    template,
    contentUrl: '',
    values: emptyContentValues(),
    answerMode: 'single',
    singleAnswer: '',
    batchAnswers: null,
    batchFileName: null,
  };
}

export function setTemplate(state: SessionState, template: string): SessionState {
  return { ...state, template };
}

/**
 * Edit one content variable by hand.
 *
 * @throws UnknownVariableError for names outside the content variables,
 *   including the answer variable
 */
export function setContentValue(
  state: SessionState,
  name: string,
  value: string,
): SessionState {
  if (!isContentVariable(name)) throw new UnknownVariableError(name);
  return { ...state, values: { ...state.values, [name]: value } };
}

/**
 * Fetch activity content and replace all content variables with what it
 * yields. Values are reset to empty first, so a failed fetch leaves every
 * content variable empty.
 */
export async function fetchContent(
  state: SessionState,
  url: string,
  opts?: FetchContentOptions,
): Promise<HandlerResult> {
  const contentUrl = url.trim();
  const reset: SessionState = {
    ...state,
    contentUrl,
    values: emptyContentValues(),
  };

  if (!contentUrl) {
    return {
      state: reset,
      notices: [notice('warning', 'Please enter a Content URL to fetch variables.')],
    };
  }

  try {
    const { values, warnings } = await fetchContentValues(contentUrl, opts);
    return {
      state: { ...reset, values },
      notices: [
        ...warnings.map((w) => notice('warning', w)),
        notice('success', 'Successfully fetched and processed data from URL.'),
      ],
    };
  } catch (err) {
    if (!(err instanceof ContentFetchError)) throw err;
    logger.warn({ url: contentUrl, kind: err.kind, status: err.status }, 'Content fetch failed');
    return { state: reset, notices: [notice('error', err.message)] };
  }
}

/** Switch to single-answer mode with `answer`; any loaded batch is dropped. */
export function setSingleAnswer(state: SessionState, answer: string): SessionState {
  return {
    ...state,
    answerMode: 'single',
    singleAnswer: answer,
    batchAnswers: null,
    batchFileName: null,
  };
}

/**
 * Switch to batch mode and load answers from CSV text. On any failure the
 * previously loaded answers are cleared, not kept.
 */
export function loadBatchAnswers(
  state: SessionState,
  fileName: string,
  csv: string,
): HandlerResult {
  const base: SessionState = { ...state, answerMode: 'batch', singleAnswer: '' };

  let answers: string[];
  try {
    answers = parseAnswersCsv(csv);
  } catch (err) {
    const message =
      err instanceof MissingAnswersColumnError
        ? `${err.message}. Please check the header.`
        : `Error processing CSV file: ${err instanceof Error ? err.message : String(err)}`;
    logger.warn({ fileName, err }, 'Batch answers rejected');
    return {
      state: clearBatchAnswers(base),
      notices: [notice('error', message)],
    };
  }

  return {
    state: { ...base, batchAnswers: answers, batchFileName: fileName },
    notices: [
      notice(
        'success',
        `Successfully read ${answers.length} answers from '${fileName}'.`,
      ),
    ],
  };
}

export function clearBatchAnswers(state: SessionState): SessionState {
  return { ...state, batchAnswers: null, batchFileName: null };
}

/**
 * Fill the template for the active answer mode.
 *
 * Unknown tokens are reported and left in the output; generation always
 * goes ahead with whatever values are present.
 */
export function generatePrompts(state: SessionState): GenerateResult {
  const notices: Notice[] = [];

  const unknown = findUnknownTokens(state.template);
  if (unknown.length > 0) {
    notices.push(
      notice(
        'warning',
        `Warning: The template uses variables not in the predefined list: ${unknown.join(', ')}`,
      ),
    );
  }

  let prompts: string[] = [];
  if (state.answerMode === 'single') {
    if (!state.singleAnswer && findTemplateTokens(state.template).includes(ANSWER_VARIABLE)) {
      notices.push(
        notice(
          'info',
          `Note: '${ANSWER_VARIABLE}' is in the template, but no answer was provided.`,
        ),
      );
    }
    prompts = [fillTemplate(state.template, state.values, state.singleAnswer)];
  } else if (state.batchAnswers && state.batchAnswers.length > 0) {
    prompts = fillTemplateBatch(state.template, state.values, state.batchAnswers);
  } else {
    notices.push(
      notice(
        'warning',
        `Batch mode selected, but no answers were loaded for {{${ANSWER_VARIABLE}}}.`,
      ),
    );
  }

  if (prompts.length === 0) {
    notices.push(notice('info', 'No prompts were generated. Check inputs and template.'));
  }
  notices.push(notice('success', 'Prompt processing complete.'));

  logger.debug(
    { mode: state.answerMode, prompts: prompts.length, unknownTokens: unknown },
    'Prompts generated',
  );
  return { state, notices, prompts };
}

/** What will be used for generation, for display before running it. */
export function describeSession(state: SessionState): SessionSummary {
  let answers: string;
  if (state.answerMode === 'single') {
    answers = state.singleAnswer || '(empty)';
  } else if (state.batchAnswers) {
    answers = `${state.batchAnswers.length} answers loaded`;
  } else {
    answers = '(none loaded)';
  }

  return {
    contentUrl: state.contentUrl || 'Not provided',
    values: CONTENT_VARIABLES.map((variable) => ({
      variable,
      value: state.values[variable],
    })),
    answerMode: state.answerMode,
    answers,
  };
}
