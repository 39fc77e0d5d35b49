/**
 * Batch answers in and generated prompts out, as CSV.
 *
 * Input needs a header row with a column named exactly `Answers`; each
 * following row's cell in that column becomes one answer. Output has a
 * single `generated_prompt` column, one row per prompt.
 */
import * as XLSX from 'xlsx';

export const ANSWERS_COLUMN = 'Answers';
export const GENERATED_PROMPT_COLUMN = 'generated_prompt';

export class MissingAnswersColumnError extends Error {
  constructor(readonly columns: string[]) {
    super(
      `CSV file is missing the required '${ANSWERS_COLUMN}' column. Found: ${
        columns.length > 0 ? columns.join(', ') : '(no header)'
      }`,
    );
    this.name = 'MissingAnswersColumnError';
  }
}

function cellText(cell: unknown): string {
  return cell === undefined || cell === null ? '' : String(cell);
}

/**
 * Read answers from CSV text.
 *
 * Blank lines are skipped; an empty cell yields an empty answer.
 *
 * @throws MissingAnswersColumnError when the header lacks `Answers`
 */
export function parseAnswersCsv(csv: string): string[] {
  // raw: keep every cell as the text written in the file. FS: always split
  // on commas, never on a separator guessed from the content.
  const workbook = XLSX.read(csv.replace(/^\uFEFF/, ''), {
    type: 'string',
    raw: true,
    FS: ',',
  });
  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  const rows: unknown[][] = worksheet
    ? XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
        header: 1,
        defval: '',
        blankrows: false,
        raw: false,
      })
    : [];

  const header = (rows[0] ?? []).map(cellText);
  const column = header.indexOf(ANSWERS_COLUMN);
  if (column === -1) {
    throw new MissingAnswersColumnError(header.filter(Boolean));
  }

  return rows.slice(1).map((row) => cellText(row[column]));
}

/**
 * Render generated prompts as CSV with a `generated_prompt` header.
 * Cells holding commas, quotes or newlines are quoted.
 */
export function formatPromptsCsv(prompts: readonly string[]): string {
  const worksheet = XLSX.utils.aoa_to_sheet([
    [GENERATED_PROMPT_COLUMN],
    ...prompts.map((prompt) => [prompt]),
  ]);
  return XLSX.utils.sheet_to_csv(worksheet);
}
