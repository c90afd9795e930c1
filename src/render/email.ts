import { digestSections } from '../digest/assemble';
import type { Digest } from '../types/digest';
import { escapeHtml } from '../utils/text';
import { formatDateTime, formatLongDate, type ZonedDateTime } from '../utils/time';

export const REPORT_TITLE_PREFIX = 'Daily PR Coverage';

/** `Daily PR Coverage — Saturday, 01 March 2025` */
export function reportTitle(reportDate: ZonedDateTime): string {
  return `${REPORT_TITLE_PREFIX} — ${formatLongDate(reportDate)}`;
}

export function noCoverageMessage(windowHours: number): string {
  return `No coverage found in the last ${windowHours} hours.`;
}

/**
 * HTML body of the digest email. One heading per client with coverage, in
 * roster order; every value from the feed is escaped.
 */
export function buildEmailHtml(digest: Digest): string {
  const parts = [`<h2>${escapeHtml(reportTitle(digest.reportDate))}</h2>`];

  const sections = digestSections(digest);
  for (const { entity, items } of sections) {
    parts.push(`<h3>${escapeHtml(entity.name)}</h3>`);
    parts.push('<ul>');
    for (const item of items) {
      parts.push(
        `<li><strong>${escapeHtml(item.source)}</strong> · ` +
          `<em>${escapeHtml(formatDateTime(item.publishedAt))}</em> · ` +
          `<span>${escapeHtml(item.sentiment)}</span><br>` +
          `<a href="${escapeHtml(item.url)}">${escapeHtml(item.title)}</a></li>`
      );
    }
    parts.push('</ul>');
  }

  if (sections.length === 0) {
    parts.push(`<p>${escapeHtml(noCoverageMessage(digest.windowHours))}</p>`);
  }

  return parts.join('\n');
}
