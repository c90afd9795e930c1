import { z } from 'zod';
import { streamContentsSchema } from '../types/adapter';
import { FetchError, errorMessage } from '../utils/errors';
import { silentLogger, type DigestLogger } from '../utils/logger';

// FreshRSS exposes the Google Reader API under this path
const READING_LIST_PATH = '/api/greader.php/reader/api/0/stream/contents/reading-list';
const LABEL_PREFIX = 'user/-/label/';
const REQUEST_TIMEOUT_MS = 30000;

export interface FreshRssCredentials {
  baseUrl: string;
  username: string;
  apiPassword: string;
}

export interface FetchItemsOptions {
  maxItems: number;
  /** Oldest item to include, epoch seconds. */
  oldestTimestamp: number;
  label?: string | null;
  logger?: DigestLogger;
  fetchImpl?: typeof fetch;
}

export function readingListUrl(baseUrl: string, maxItems: number, oldestTimestamp: number): string {
  const url = new URL(baseUrl.replace(/\/+$/, '') + READING_LIST_PATH);
  url.searchParams.set('n', String(maxItems));
  url.searchParams.set('ot', String(oldestTimestamp));
  return url.toString();
}

export function normalizeLabel(label: string): string {
  return label.startsWith(LABEL_PREFIX) ? label : `${LABEL_PREFIX}${label}`;
}

const categoriesSchema = z.object({
  categories: z.array(z.unknown()).nullish()
});

/**
 * Keep only items tagged with the label. Items whose categories cannot be
 * read are treated as untagged.
 */
export function filterByLabel(items: readonly unknown[], label: string | null | undefined): unknown[] {
  if (!label) {
    return [...items];
  }
  const normalized = normalizeLabel(label);
  return items.filter(item => {
    const parsed = categoriesSchema.safeParse(item);
    return parsed.success && (parsed.data.categories ?? []).includes(normalized);
  });
}

function basicAuth(username: string, password: string): string {
  return 'Basic ' + Buffer.from(`${username}:${password}`, 'utf8').toString('base64');
}

/**
 * Fetch one page of the reading list. Any transport, HTTP or payload problem
 * is a FetchError; there is no retry.
 */
export async function fetchItems(credentials: FreshRssCredentials, options: FetchItemsOptions): Promise<unknown[]> {
  const log = options.logger ?? silentLogger;
  const doFetch = options.fetchImpl ?? fetch;
  const url = readingListUrl(credentials.baseUrl, options.maxItems, options.oldestTimestamp);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

  let response: Response;
  try {
    log.debug(`Requesting reading list: ${url}`);
    response = await doFetch(url, {
      signal: controller.signal,
      headers: {
        Accept: 'application/json',
        Authorization: basicAuth(credentials.username, credentials.apiPassword)
      }
    });
  } catch (error) {
    const message = error instanceof Error && error.name === 'AbortError' ? 'Request timeout' : errorMessage(error);
    throw new FetchError(`FreshRSS API error: ${message}`, undefined, { cause: error });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    throw new FetchError(`FreshRSS API error: HTTP ${response.status}`, response.status);
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new FetchError(`FreshRSS API returned invalid JSON: ${errorMessage(error)}`, response.status, { cause: error });
  }

  const parsed = streamContentsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new FetchError('FreshRSS API returned an unexpected payload', response.status, { cause: parsed.error });
  }

  const items = parsed.data.items ?? [];
  log.info(`Fetched ${items.length} items from FreshRSS`);

  const filtered = filterByLabel(items, options.label);
  if (options.label) {
    log.info(`${filtered.length} items carry label ${normalizeLabel(options.label)}`);
  }
  return filtered;
}
