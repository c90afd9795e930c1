/**
 * Unit tests for the OPML exporter
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { XMLParser } from 'fast-xml-parser';
import { createRawRecord } from '../../__tests__/fixtures';
import { buildDigest } from '../../digest/assemble';
import { RenderError } from '../../utils/errors';
import { buildOpml, writeOpml } from '../opml';

const NOW = new Date('2025-07-15T12:00:00Z');
const options = { timeZone: 'Europe/London', now: () => NOW };

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  isArray: name => name === 'outline'
});

describe('buildOpml', () => {
  it('should nest item outlines under each client', () => {
    const digest = buildDigest(
      [
        createRawRecord({
          title: 'FOIL insurance & claims "update"',
          alternate: [{ href: 'https://x.test/f?a=1&b=2' }],
          origin: { title: 'Insurance Times' },
          published: 1752566400
        })
      ],
      options
    );

    const xml = buildOpml(digest);
    expect(xml.startsWith('<?xml version="1.0" encoding="utf-8"?>')).toBe(true);

    const doc = parser.parse(xml);
    expect(doc.opml.version).toBe('2.0');
    expect(doc.opml.head).toEqual({
      title: 'Daily PR Coverage — Tuesday, 15 July 2025',
      dateCreated: '2025-07-15T13:00:00+01:00'
    });

    const clients = doc.opml.body.outline;
    expect(clients).toHaveLength(1);
    expect(clients[0].text).toBe('FOIL');
    expect(clients[0].title).toBe('FOIL');
    expect(clients[0].outline).toEqual([
      {
        text: 'FOIL insurance & claims "update"',
        title: 'FOIL insurance & claims "update"',
        type: 'link',
        url: 'https://x.test/f?a=1&b=2',
        htmlUrl: 'https://x.test/f?a=1&b=2',
        created: '2025-07-15T09:00:00+01:00',
        sentiment: 'neutral',
        source: 'Insurance Times'
      }
    ]);
  });

  it('should emit one placeholder outline for an empty digest', () => {
    const doc = parser.parse(buildOpml(buildDigest([], { ...options, windowHours: 24 })));

    expect(doc.opml.body.outline).toEqual([
      {
        text: 'No coverage found in the last 24 hours.',
        title: 'No coverage found in the last 24 hours.'
      }
    ]);
  });
});

describe('writeOpml', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'coverage-digest-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write the document to disk', async () => {
    const digest = buildDigest([], options);
    const target = path.join(dir, 'coverage.opml');

    await writeOpml(digest, target);

    await expect(fs.readFile(target, 'utf8')).resolves.toBe(buildOpml(digest));
  });

  it('should raise a RenderError when the target is not writable', async () => {
    const digest = buildDigest([], options);

    await expect(writeOpml(digest, path.join(dir, 'missing', 'coverage.opml'))).rejects.toBeInstanceOf(RenderError);
  });
});
