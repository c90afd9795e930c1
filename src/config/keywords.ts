// Title words that tag an item positive. Checked before NEGATIVE_WORDS.
export const POSITIVE_WORDS: readonly string[] = [
  'wins',
  'award',
  'growth',
  'record',
  'approves',
  'success',
  'surge',
  'raises',
  'backs',
  'confirms',
  'expands',
  'appoints'
];

export const NEGATIVE_WORDS: readonly string[] = [
  'fraud',
  'scandal',
  'probe',
  'lawsuit',
  'ban',
  'cuts',
  'warning',
  'fall',
  'drop',
  'decline',
  'sacked',
  'fined',
  'charged',
  'collapse',
  'sanction',
  'risk'
];

// Built-in blocklist; BLOCKLIST_PHRASES extends it at run time.
export const BLOCKLIST_PHRASES: readonly string[] = [];
