import type { RawRecord } from '../types/adapter';

type LinkList = RawRecord['canonical'];

function firstHref(links: LinkList): string | undefined {
  const href = links?.[0]?.href;
  return href ? href : undefined;
}

/**
 * Pick the representative link of a record: canonical, then alternate,
 * then the plain `link` field. Returns undefined when none is usable.
 */
export function chooseUrl(record: RawRecord): string | undefined {
  for (const links of [record.canonical, record.alternate]) {
    const href = firstHref(links);
    if (href) return href.trim();
  }
  if (record.link) {
    return record.link.trim();
  }
  return undefined;
}

// Whitespace trim only: query order and scheme differences stay distinct.
export function canonicalizeUrl(url: string): string {
  return url.trim();
}

/**
 * Display name for where an item came from: the feed title when the reader
 * supplies one, otherwise the host of the item URL.
 */
export function resolveSource(record: RawRecord, url: string): string {
  const title = record.origin?.title;
  if (title) return title;
  try {
    const { host } = new URL(url);
    return host || 'Unknown Source';
  } catch {
    return 'Unknown Source';
  }
}
