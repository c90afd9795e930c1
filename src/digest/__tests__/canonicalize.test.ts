/**
 * Unit tests for link selection and source resolution
 */

import { canonicalizeUrl, chooseUrl, resolveSource } from '../canonicalize';
import { rawRecordSchema } from '../../types/adapter';

const record = (input: Record<string, unknown>) => rawRecordSchema.parse(input);

describe('chooseUrl', () => {
  it('should prefer the canonical link over alternate and link', () => {
    const url = chooseUrl(record({
      canonical: [{ href: 'https://a.test/canonical' }],
      alternate: [{ href: 'https://a.test/alternate' }],
      link: 'https://a.test/link'
    }));

    expect(url).toBe('https://a.test/canonical');
  });

  it('should fall back to alternate when canonical is empty', () => {
    const url = chooseUrl(record({
      canonical: [],
      alternate: [{ href: '  https://a.test/alternate \n' }]
    }));

    expect(url).toBe('https://a.test/alternate');
  });

  it('should skip a canonical entry without href', () => {
    const url = chooseUrl(record({
      canonical: [{ type: 'text/html' }],
      link: 'https://a.test/link'
    }));

    expect(url).toBe('https://a.test/link');
  });

  it('should only look at the first entry of each list', () => {
    const url = chooseUrl(record({
      alternate: [{ href: '' }, { href: 'https://a.test/second' }]
    }));

    expect(url).toBeUndefined();
  });

  it('should return undefined when no link exists', () => {
    expect(chooseUrl(record({ title: 'No links here' }))).toBeUndefined();
  });
});

describe('canonicalizeUrl', () => {
  it('should trim whitespace only', () => {
    expect(canonicalizeUrl('  HTTP://Example.test/a?b=2&a=1#frag  ')).toBe('HTTP://Example.test/a?b=2&a=1#frag');
  });
});

describe('resolveSource', () => {
  it('should use the origin title when present', () => {
    expect(resolveSource(record({ origin: { title: 'Law Gazette' } }), 'https://x.test/a')).toBe('Law Gazette');
  });

  it('should fall back to the URL host', () => {
    expect(resolveSource(record({ origin: { title: '' } }), 'https://news.x.test:8443/a')).toBe('news.x.test:8443');
  });

  it('should report an unknown source for unparseable URLs', () => {
    expect(resolveSource(record({}), 'not a url')).toBe('Unknown Source');
  });
});
