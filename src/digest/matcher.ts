import { NEGATIVE_WORDS, POSITIVE_WORDS } from '../config/keywords';
import type { Entity, Roster, Sentiment } from '../types/digest';
import { containsAny } from '../utils/text';

/**
 * Text an item is matched on: title and source, lowercased.
 */
export function matchText(title: string, source: string): string {
  return `${title} ${source}`.toLowerCase();
}

/**
 * An alias must occur in the text. Entities with context keywords also need
 * one of those to co-occur.
 */
export function matchesEntity(text: string, entity: Entity): boolean {
  const lowered = text.toLowerCase();
  if (!containsAny(lowered, entity.aliases)) {
    return false;
  }
  if (entity.contextKeywords.length === 0) {
    return true;
  }
  return containsAny(lowered, entity.contextKeywords);
}

/** First roster entry the text matches; an item belongs to one client at most. */
export function findEntity(text: string, roster: Roster): Entity | undefined {
  return roster.find(entity => matchesEntity(text, entity));
}

export function classifySentiment(title: string): Sentiment {
  const text = title.toLowerCase();
  if (containsAny(text, POSITIVE_WORDS)) return 'positive';
  if (containsAny(text, NEGATIVE_WORDS)) return 'negative';
  return 'neutral';
}
