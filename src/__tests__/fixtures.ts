/**
 * Shared test data builders
 */

import type { RawRecord } from '../types/adapter';

// Utility function to create a mock fetch Response
export const createMockResponse = (data: unknown, ok = true, status = 200) => ({
  ok,
  status,
  text: () => Promise.resolve(typeof data === 'string' ? data : JSON.stringify(data)),
  json: () => (typeof data === 'string' ? Promise.reject(new SyntaxError('Unexpected token')) : Promise.resolve(data))
});

// Utility function to create a reader item with sensible defaults
export const createRawRecord = (overrides: Partial<RawRecord> & Record<string, unknown> = {}): RawRecord => ({
  id: 'tag:google.com,2005:reader/item/0000000000000001',
  title: 'Test Article',
  alternate: [{ href: 'https://news.example.test/article' }],
  origin: { title: 'Example News', streamId: 'feed/1' },
  published: 1752580800,
  categories: ['user/-/state/com.google/reading-list'],
  ...overrides
});

// Environment with every required variable set
export const createTestEnv = (overrides: Record<string, string | undefined> = {}): Record<string, string | undefined> => ({
  FRESHRSS_BASE_URL: 'https://freshrss.example.test',
  FRESHRSS_USERNAME: 'digest',
  FRESHRSS_API_PASSWORD: 'test-password',
  FROM_EMAIL: 'digest@example.test',
  TO_EMAILS: 'a@example.test, b@example.test',
  SMTP_HOST: 'smtp.example.test',
  ...overrides
});
