/**
 * The closed set of template variables.
 *
 * Six content variables are filled from activity content (or edited by
 * hand); `student_answer` is reserved for the answer being processed and
 * is never extracted.
 */

export const CONTENT_VARIABLES = [
  'task_instruction',
  'vocabulary_list',
  'grammar_reference',
  'communication_reference',
  'guiding_questions',
  'can_do_statements',
] as const;

export const ANSWER_VARIABLE = 'student_answer';

export const TEMPLATE_VARIABLES = [...CONTENT_VARIABLES, ANSWER_VARIABLE] as const;

export type ContentVariable = (typeof CONTENT_VARIABLES)[number];
export type TemplateVariable = (typeof TEMPLATE_VARIABLES)[number];

/** Total mapping from every content variable to its current value. */
export type ContentValues = Record<ContentVariable, string>;

/** Total mapping used for one substitution, answer included. */
export type TemplateValues = Record<TemplateVariable, string>;

export class UnknownVariableError extends Error {
  constructor(readonly variable: string) {
    super(
      `Unknown content variable "${variable}". Expected one of: ${CONTENT_VARIABLES.join(', ')}`,
    );
    this.name = 'UnknownVariableError';
  }
}

export function emptyContentValues(): ContentValues {
  return {
    task_instruction: '',
    vocabulary_list: '',
    grammar_reference: '',
    communication_reference: '',
    guiding_questions: '',
    can_do_statements: '',
  };
}

export function isContentVariable(name: string): name is ContentVariable {
  return CONTENT_VARIABLES.some((v) => v === name);
}

export function isTemplateVariable(name: string): name is TemplateVariable {
  return TEMPLATE_VARIABLES.some((v) => v === name);
}
