/**
 * Activity content extraction.
 *
 * Pulls the six content variables out of an activity JSON document. Each
 * variable comes from its own lookup over loosely-typed data: a branch
 * whose structure is missing or has the wrong shape yields an empty
 * string for its variable and never affects the others.
 *
 * Document shape (every field optional):
 *   - `interactions[0].instruction`                    -> task_instruction
 *   - `interactions[0].canDoStatement[].statement`     -> can_do_statements
 *   - `referenceScreens[]` with category "vocabulary"  -> vocabulary_list
 *   - `referenceScreens[]` with category "grammar"     -> grammar_reference
 *   - `referenceScreens[]` with category "communication" -> communication_reference
 *   - `secondaryScreens[].contents[].secondaryContent` -> guiding_questions
 */
import { z } from 'zod';

import { ContentValues, emptyContentValues } from './variables.js';

const ObjectSchema = z.record(z.unknown());
const ListSchema = z.array(z.unknown());
const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

type JsonObject = z.infer<typeof ObjectSchema>;

export interface ExtractionResult {
  values: ContentValues;
  /** Informational notes about missing or malformed top-level sections. */
  warnings: string[];
}

function asObject(value: unknown): JsonObject | undefined {
  const parsed = ObjectSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function asList(value: unknown): unknown[] | undefined {
  const parsed = ListSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * String form of a scalar field. Absent values, null, objects and arrays
 * read as empty.
 */
function text(value: unknown): string {
  const parsed = ScalarSchema.safeParse(value);
  return parsed.success ? String(parsed.data) : '';
}

/** Scalars that count as present: non-empty strings, non-zero numbers, true. */
function presentText(value: unknown): string | undefined {
  const parsed = ScalarSchema.safeParse(value);
  if (!parsed.success || !parsed.data) return undefined;
  return String(parsed.data);
}

function bulleted(lines: string[]): string {
  return lines.map((line) => `- ${line}`).join('\n');
}

function extractInteraction(
  document: JsonObject,
  values: ContentValues,
  warnings: string[],
): void {
  const interactions = asList(document.interactions);
  if (!interactions || interactions.length === 0) {
    warnings.push(
      "Could not find 'interactions' array or it's empty/invalid in the JSON response.",
    );
    return;
  }

  const interaction = asObject(interactions[0]);
  if (!interaction) return;

  values.task_instruction = text(interaction.instruction);

  const statements = asList(interaction.canDoStatement);
  if (!statements) return;
  const lines: string[] = [];
  for (const entry of statements) {
    const statement = presentText(asObject(entry)?.statement);
    if (statement !== undefined) lines.push(statement);
  }
  values.can_do_statements = bulleted(lines);
}

function extractReferences(
  document: JsonObject,
  values: ContentValues,
  warnings: string[],
): void {
  if (document.referenceScreens === undefined) return;
  const screens = asList(document.referenceScreens);
  if (!screens) {
    warnings.push(
      "Could not find 'referenceScreens' array in the JSON response or it's not a list.",
    );
    return;
  }

  const vocabulary: string[] = [];
  for (const entry of screens) {
    const screen = asObject(entry);
    const contents = asObject(screen?.contents);
    if (!screen || !contents) continue;

    // Repeated grammar/communication screens: the last one wins
    switch (screen.category) {
      case 'vocabulary':
        for (const item of asList(contents.vocabularyList) ?? []) {
          const word = presentText(item);
          if (word !== undefined) vocabulary.push(word);
        }
        break;
      case 'grammar':
        values.grammar_reference = text(contents.reference);
        break;
      case 'communication':
        values.communication_reference = text(contents.reference);
        break;
    }
  }
  values.vocabulary_list = vocabulary.join(', ');
}

function extractGuidingQuestions(
  document: JsonObject,
  values: ContentValues,
  warnings: string[],
): void {
  if (document.secondaryScreens === undefined) return;
  const screens = asList(document.secondaryScreens);
  if (!screens) {
    warnings.push(
      "Could not find 'secondaryScreens' array in the JSON response or it's not a list.",
    );
    return;
  }

  const questions: string[] = [];
  for (const entry of screens) {
    for (const item of asList(asObject(entry)?.contents) ?? []) {
      const question = presentText(asObject(item)?.secondaryContent);
      if (question !== undefined) questions.push(question);
    }
  }
  values.guiding_questions = bulleted(questions);
}

/**
 * Derive the content variables from an activity document.
 *
 * Never throws: anything that is not a JSON object produces all-empty
 * values and a warning.
 */
export function extractContentValues(document: unknown): ExtractionResult {
  const values = emptyContentValues();
  const warnings: string[] = [];

  const root = asObject(document);
  if (!root) {
    warnings.push('Activity content is not a JSON object.');
    return { values, warnings };
  }

  extractInteraction(root, values, warnings);
  extractReferences(root, values, warnings);
  extractGuidingQuestions(root, values, warnings);

  return { values, warnings };
}
