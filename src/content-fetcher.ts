/**
 * Fetches activity content over HTTP and extracts the content variables.
 *
 * One GET per call, abandoned after a fixed timeout. Any transport,
 * status or body problem fails the whole fetch with a ContentFetchError;
 * problems inside an otherwise valid document are left to the extractor.
 */
import { CONTENT_FETCH_TIMEOUT } from './config.js';
import { ExtractionResult, extractContentValues } from './extractor.js';
import { logger } from './logger.js';

export type ContentFetchErrorKind =
  | 'invalid-url'
  | 'network'
  | 'timeout'
  | 'http'
  | 'parse'
  | 'shape';

export class ContentFetchError extends Error {
  constructor(
    readonly kind: ContentFetchErrorKind,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'ContentFetchError';
  }
}

export interface FetchContentOptions {
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

function parseUrl(url: string): URL {
  try {
    const parsed = new URL(url);
    if (parsed.protocol === 'http:' || parsed.protocol === 'https:') {
      return parsed;
    }
  } catch {
    // fall through
  }
  throw new ContentFetchError('invalid-url', `Invalid content URL: ${url}`);
}

function isPlainObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * GET `url`, parse its JSON body and extract the content variables.
 *
 * @throws ContentFetchError on invalid URL, transport failure, timeout,
 *   non-2xx status, unparseable body, or a body that is not a JSON object
 */
export async function fetchContentValues(
  url: string,
  opts: FetchContentOptions = {},
): Promise<ExtractionResult> {
  const target = parseUrl(url);
  const timeoutMs = opts.timeoutMs ?? CONTENT_FETCH_TIMEOUT;
  const fetchImpl = opts.fetchImpl ?? fetch;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let body: string;
  try {
    logger.info({ url: target.href, timeoutMs }, 'Fetching activity content');
    const res = await fetchImpl(target.href, {
      signal: controller.signal,
      headers: { Accept: 'application/json' },
      redirect: 'follow',
    });

    if (!res.ok) {
      throw new ContentFetchError(
        'http',
        `HTTP ${res.status} for ${target.href}`,
        res.status,
      );
    }
    body = await res.text();
  } catch (err) {
    if (err instanceof ContentFetchError) throw err;
    if (controller.signal.aborted) {
      throw new ContentFetchError(
        'timeout',
        `Timed out after ${timeoutMs}ms fetching ${target.href}`,
      );
    }
    throw new ContentFetchError(
      'network',
      `Error fetching ${target.href}: ${err instanceof Error ? err.message : String(err)}`,
    );
  } finally {
    clearTimeout(timeout);
  }

  let document: unknown;
  try {
    document = JSON.parse(body);
  } catch (err) {
    throw new ContentFetchError(
      'parse',
      `Error parsing JSON response: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!isPlainObject(document)) {
    throw new ContentFetchError(
      'shape',
      'JSON response is not an object; expected activity content.',
    );
  }

  const result = extractContentValues(document);
  logger.debug(
    { url: target.href, warnings: result.warnings.length },
    'Activity content extracted',
  );
  return result;
}
