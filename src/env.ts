import fs from 'fs';
import path from 'path';

/**
 * Read selected keys from a `.env` file in the working directory.
 *
 * Only the requested keys are returned; nothing is written into
 * `process.env`. A missing file yields an empty record.
 */
export function readEnvFile(
  keys: string[],
  envPath: string = path.join(process.cwd(), '.env'),
): Record<string, string> {
  let content: string;
  try {
    content = fs.readFileSync(envPath, 'utf-8');
  } catch {
    return {};
  }

  const wanted = new Set(keys);
  const result: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    if (!wanted.has(key)) continue;
    let value = trimmed.slice(eqIdx + 1).trim();
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }
    if (value) result[key] = value;
  }
  return result;
}
