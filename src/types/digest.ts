import type { ZonedDateTime } from '../utils/time';

export interface Entity {
  readonly name: string;
  readonly aliases: readonly string[];
  /** Empty means the entity matches on alias alone. */
  readonly contextKeywords: readonly string[];
}

export type Roster = readonly Entity[];

export type Sentiment = 'positive' | 'negative' | 'neutral';

export interface DigestItem {
  readonly entity: Entity;
  readonly title: string;
  readonly url: string;
  readonly source: string;
  readonly publishedAt: ZonedDateTime;
  readonly sentiment: Sentiment;
}

export interface DigestStats {
  totalRecords: number;
  matched: number;
  duplicates: number;
  blocked: number;
  unmatched: number;
  incomplete: number;
  failed: number;
}

export interface Digest {
  /** Entity name -> items, newest first. Only entities with coverage have a key. */
  readonly groups: ReadonlyMap<string, readonly DigestItem[]>;
  readonly roster: Roster;
  readonly reportDate: ZonedDateTime;
  readonly windowHours: number;
  readonly stats: DigestStats;
}

export interface DigestSection {
  entity: Entity;
  items: readonly DigestItem[];
}
