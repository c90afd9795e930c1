/**
 * Digest assembly: turns one batch of reader items into per-client groups.
 *
 * Each record goes through, in order:
 * 1. Schema check (malformed records are logged and skipped)
 * 2. Title and URL extraction
 * 3. Canonical-URL dedupe across the whole batch
 * 4. Blocklist rejection on the title
 * 5. Source and timestamp resolution
 * 6. Client match (first roster hit) and sentiment tag
 *
 * Groups are then sorted newest first. All state lives on a DigestRun;
 * two builds in one process never share a dedupe set.
 */

import { CLIENTS } from '../config/roster';
import { rawRecordSchema, type RawRecord } from '../types/adapter';
import type { Digest, DigestItem, DigestSection, DigestStats, Roster } from '../types/digest';
import { silentLogger, type DigestLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { compareNewestFirst, fromDate, fromEpochSeconds, type ZonedDateTime } from '../utils/time';
import { isBlocked } from './blocklist';
import { canonicalizeUrl, chooseUrl, resolveSource } from './canonicalize';
import { UrlDeduplicator } from './dedupe';
import { classifySentiment, findEntity, matchText } from './matcher';

export interface BuildDigestOptions {
  timeZone: string;
  roster?: Roster;
  blocklist?: readonly string[];
  /** Lookback window the batch was fetched with; shown in the no-coverage message. */
  windowHours?: number;
  now?: () => Date;
  logger?: DigestLogger;
}

export type RecordOutcome =
  | { kind: 'matched'; item: DigestItem }
  | { kind: 'incomplete' | 'duplicate' | 'blocked' | 'unmatched' };

/**
 * Resolve when an item was published: `published`, else `updated`, read as
 * UTC epoch seconds. Anything non-numeric means "now"; a number outside the
 * representable range throws, so the record is skipped.
 */
export function resolvePublishedAt(record: RawRecord, timeZone: string, now: () => Date = () => new Date()): ZonedDateTime {
  const raw = record.published || record.updated;
  if (typeof raw === 'number') {
    return fromEpochSeconds(raw, timeZone);
  }
  return fromDate(now(), timeZone);
}

/**
 * Per-run accumulator. Owns the dedupe set and the client groups.
 */
export class DigestRun {
  private readonly dedupe = new UrlDeduplicator();
  private readonly groups = new Map<string, DigestItem[]>();
  private readonly roster: Roster;
  private readonly blocklist: readonly string[];
  private readonly now: () => Date;
  private readonly logger: DigestLogger;

  readonly stats: DigestStats = {
    totalRecords: 0,
    matched: 0,
    duplicates: 0,
    blocked: 0,
    unmatched: 0,
    incomplete: 0,
    failed: 0
  };

  constructor(private readonly options: BuildDigestOptions) {
    this.roster = options.roster ?? CLIENTS;
    this.blocklist = options.blocklist ?? [];
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Classify one record. Never throws: a failure is logged and counted.
   */
  add(raw: unknown, index: number): RecordOutcome | undefined {
    this.stats.totalRecords++;
    try {
      const outcome = this.classify(raw);
      this.record(outcome);
      return outcome;
    } catch (error) {
      this.stats.failed++;
      this.logger.warn(`Skipping item ${index} due to parse error: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private classify(raw: unknown): RecordOutcome {
    const record = rawRecordSchema.parse(raw);

    const title = (record.title ?? '').trim();
    const url = chooseUrl(record);
    if (!title || !url) {
      return { kind: 'incomplete' };
    }

    const canonicalUrl = canonicalizeUrl(url);
    if (this.dedupe.isDuplicate(canonicalUrl)) {
      return { kind: 'duplicate' };
    }

    if (isBlocked(title, this.blocklist)) {
      return { kind: 'blocked' };
    }

    const source = resolveSource(record, canonicalUrl);
    const publishedAt = resolvePublishedAt(record, this.options.timeZone, this.now);

    const entity = findEntity(matchText(title, source), this.roster);
    if (!entity) {
      return { kind: 'unmatched' };
    }

    return {
      kind: 'matched',
      item: Object.freeze({
        entity,
        title,
        url: canonicalUrl,
        source,
        publishedAt,
        sentiment: classifySentiment(title)
      })
    };
  }

  private record(outcome: RecordOutcome) {
    switch (outcome.kind) {
      case 'matched': {
        this.stats.matched++;
        const group = this.groups.get(outcome.item.entity.name);
        if (group) {
          group.push(outcome.item);
        } else {
          this.groups.set(outcome.item.entity.name, [outcome.item]);
        }
        this.logger.debug(`Matched "${outcome.item.title}" to ${outcome.item.entity.name}`);
        break;
      }
      case 'duplicate':
        this.stats.duplicates++;
        break;
      case 'blocked':
        this.stats.blocked++;
        break;
      case 'unmatched':
        this.stats.unmatched++;
        break;
      case 'incomplete':
        this.stats.incomplete++;
        break;
    }
  }

  /**
   * Sort every group newest first. Array#sort is stable, so items with
   * equal timestamps keep their input order.
   */
  finish(): Digest {
    const groups = new Map<string, readonly DigestItem[]>();
    for (const [name, items] of this.groups) {
      groups.set(name, [...items].sort((a, b) => compareNewestFirst(a.publishedAt, b.publishedAt)));
    }
    return {
      groups,
      roster: this.roster,
      reportDate: fromDate(this.now(), this.options.timeZone),
      windowHours: this.options.windowHours ?? 24,
      stats: { ...this.stats }
    };
  }
}

export function buildDigest(records: readonly unknown[], options: BuildDigestOptions): Digest {
  const run = new DigestRun(options);
  records.forEach((raw, index) => {
    run.add(raw, index);
  });
  return run.finish();
}

/**
 * Non-empty groups in roster order, the order both renderers list clients in.
 */
export function digestSections(digest: Digest): DigestSection[] {
  const sections: DigestSection[] = [];
  for (const entity of digest.roster) {
    const items = digest.groups.get(entity.name);
    if (items && items.length > 0) {
      sections.push({ entity, items });
    }
  }
  return sections;
}

export function countItems(digest: Digest): number {
  let total = 0;
  for (const items of digest.groups.values()) {
    total += items.length;
  }
  return total;
}
