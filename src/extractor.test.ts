import { describe, it, expect } from 'vitest';

import { extractContentValues } from './extractor.js';
import { emptyContentValues } from './variables.js';

const activity = {
  interactions: [
    {
      instruction: 'Write about your weekend.',
      canDoStatement: [
        { statement: 'I can describe past events.' },
        { statement: '' },
        'not an object',
        { statement: 'I can use time words.' },
      ],
    },
    { instruction: 'ignored second interaction' },
  ],
  referenceScreens: [
    { category: 'vocabulary', contents: { vocabularyList: ['park', '', null, 'beach', 3] } },
    { category: 'grammar', contents: { reference: 'Past simple: regular verbs' } },
    { category: 'communication', contents: { reference: 'Talking about the past' } },
    { category: 'vocabulary', contents: { vocabularyList: ['cinema'] } },
  ],
  secondaryScreens: [
    { contents: [{ secondaryContent: 'Where did you go?' }, { secondaryContent: '' }] },
    { contents: [{ secondaryContent: 'Who was with you?' }] },
    { contents: 'not a list' },
  ],
};

describe('extractContentValues', () => {
  it('extracts every content variable from a complete document', () => {
    const { values, warnings } = extractContentValues(activity);

    expect(values).toEqual({
      task_instruction: 'Write about your weekend.',
      can_do_statements:
        '- I can describe past events.\n- I can use time words.',
      vocabulary_list: 'park, beach, 3, cinema',
      grammar_reference: 'Past simple: regular verbs',
      communication_reference: 'Talking about the past',
      guiding_questions: '- Where did you go?\n- Who was with you?',
    });
    expect(warnings).toEqual([]);
  });

  it('joins a vocabulary list with commas', () => {
    const { values } = extractContentValues({
      referenceScreens: [
        { category: 'vocabulary', contents: { vocabularyList: ['cat', 'dog'] } },
      ],
    });
    expect(values.vocabulary_list).toBe('cat, dog');
  });

  it('gives the same result when run twice', () => {
    expect(extractContentValues(activity)).toEqual(extractContentValues(activity));
  });

  // --- Per-branch isolation ---

  it('leaves interaction variables empty when interactions is missing', () => {
    const { values, warnings } = extractContentValues({
      referenceScreens: [
        { category: 'grammar', contents: { reference: 'Articles' } },
      ],
    });

    expect(values.task_instruction).toBe('');
    expect(values.can_do_statements).toBe('');
    expect(values.grammar_reference).toBe('Articles');
    expect(warnings).toEqual([
      "Could not find 'interactions' array or it's empty/invalid in the JSON response.",
    ]);
  });

  it('warns on an empty interactions list', () => {
    const { warnings } = extractContentValues({ interactions: [] });
    expect(warnings).toHaveLength(1);
  });

  it('skips a first interaction that is not an object', () => {
    const { values, warnings } = extractContentValues({
      interactions: ['text', { instruction: 'second' }],
    });
    expect(values.task_instruction).toBe('');
    expect(warnings).toEqual([]);
  });

  it('keeps the instruction when canDoStatement has the wrong shape', () => {
    const { values } = extractContentValues({
      interactions: [{ instruction: 'Do it', canDoStatement: { statement: 'x' } }],
    });
    expect(values.task_instruction).toBe('Do it');
    expect(values.can_do_statements).toBe('');
  });

  it('reads a non-string instruction as text and null as empty', () => {
    expect(
      extractContentValues({ interactions: [{ instruction: 42 }] }).values
        .task_instruction,
    ).toBe('42');
    expect(
      extractContentValues({ interactions: [{ instruction: null }] }).values
        .task_instruction,
    ).toBe('');
  });

  it('writes booleans and numbers in their JavaScript form', () => {
    const { values } = extractContentValues({
      interactions: [{ instruction: true }],
      referenceScreens: [
        { category: 'vocabulary', contents: { vocabularyList: [1.0, 2.5] } },
      ],
    });
    expect(values.task_instruction).toBe('true');
    expect(values.vocabulary_list).toBe('1, 2.5');
  });

  it('warns when referenceScreens is present but not a list', () => {
    const { values, warnings } = extractContentValues({
      referenceScreens: { category: 'grammar' },
      secondaryScreens: [{ contents: [{ secondaryContent: 'Why?' }] }],
    });
    expect(values.grammar_reference).toBe('');
    expect(values.guiding_questions).toBe('- Why?');
    expect(warnings).toContain(
      "Could not find 'referenceScreens' array in the JSON response or it's not a list.",
    );
  });

  it('warns when secondaryScreens is present but not a list', () => {
    const { warnings } = extractContentValues({
      interactions: [{}],
      secondaryScreens: null,
    });
    expect(warnings).toEqual([
      "Could not find 'secondaryScreens' array in the JSON response or it's not a list.",
    ]);
  });

  it('skips reference screens whose contents is not an object', () => {
    const { values } = extractContentValues({
      referenceScreens: [
        { category: 'grammar', contents: { reference: 'Kept' } },
        { category: 'grammar', contents: ['not', 'an', 'object'] },
        { category: 'grammar' },
      ],
    });
    expect(values.grammar_reference).toBe('Kept');
  });

  it('keeps the last grammar and communication reference', () => {
    const { values } = extractContentValues({
      referenceScreens: [
        { category: 'grammar', contents: { reference: 'first' } },
        { category: 'communication', contents: { reference: 'hello' } },
        { category: 'grammar', contents: { reference: 'second' } },
        { category: 'communication', contents: {} },
      ],
    });
    expect(values.grammar_reference).toBe('second');
    expect(values.communication_reference).toBe('');
  });

  it('ignores unknown categories', () => {
    const { values } = extractContentValues({
      referenceScreens: [
        { category: 'Grammar', contents: { reference: 'wrong case' } },
        { category: 'reading', contents: { reference: 'other' } },
      ],
    });
    expect(values).toEqual(emptyContentValues());
  });

  // --- Non-object documents ---

  it('returns empty values for a document that is not an object', () => {
    for (const document of [null, [activity], 'text', 7]) {
      const { values, warnings } = extractContentValues(document);
      expect(values).toEqual(emptyContentValues());
      expect(warnings).toEqual(['Activity content is not a JSON object.']);
    }
  });

  it('never produces keys outside the content variables', () => {
    const { values } = extractContentValues({
      ...activity,
      student_answer: 'injected',
      extra: 'field',
    });
    expect(Object.keys(values).sort()).toEqual(
      Object.keys(emptyContentValues()).sort(),
    );
  });
});
