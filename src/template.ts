/**
 * Template variable substitution.
 *
 * Replaces `{{variable}}` tokens for the fixed set of template variables.
 * Anything else written as `{{...}}` is reported as unknown and left in
 * place verbatim.
 */
import {
  ANSWER_VARIABLE,
  ContentValues,
  TEMPLATE_VARIABLES,
  TemplateValues,
  isTemplateVariable,
} from './variables.js';

/** Any `{{...}}` token; the inner text is captured verbatim, untrimmed. */
const TOKEN_PATTERN = /\{\{(.*?)\}\}/g;

/** Only whitelisted tokens, matched literally and case-sensitively. */
const KNOWN_TOKEN_PATTERN = new RegExp(
  `\\{\\{(${TEMPLATE_VARIABLES.join('|')})\\}\\}`,
  'g',
);

/**
 * Distinct token names used in `template`, in order of first appearance.
 */
export function findTemplateTokens(template: string): string[] {
  const seen = new Set<string>();
  for (const match of template.matchAll(TOKEN_PATTERN)) {
    seen.add(match[1]);
  }
  return [...seen];
}

/**
 * Token names in `template` that are not template variables. These are
 * left unsubstituted by {@link fillTemplate}.
 */
export function findUnknownTokens(template: string): string[] {
  return findTemplateTokens(template).filter((name) => !isTemplateVariable(name));
}

/**
 * Fill `template` for one answer.
 *
 * - Every whitelisted token is replaced, every occurrence, whether or not
 *   the template uses it; missing values read as empty.
 * - Replacement is a single pass: a substituted value is never re-scanned,
 *   so a value containing `{{task_instruction}}` stays literal.
 * - Unknown tokens are left unchanged.
 *
 * @param values - Content variable values (the answer variable, if
 *   present, is overridden by `answer`)
 */
export function fillTemplate(
  template: string,
  values: Partial<ContentValues>,
  answer: string,
): string {
  const vars: Partial<TemplateValues> = { ...values, [ANSWER_VARIABLE]: answer };
  return template.replace(KNOWN_TOKEN_PATTERN, (_match, key: string) => {
    return isTemplateVariable(key) ? (vars[key] ?? '') : _match;
  });
}

/**
 * Fill `template` once per answer, preserving order. Content values are
 * shared by every row; only the answer differs.
 */
export function fillTemplateBatch(
  template: string,
  values: Partial<ContentValues>,
  answers: readonly string[],
): string[] {
  return answers.map((answer) => fillTemplate(template, values, answer));
}
