import { promises as fs } from 'fs';
import { XMLBuilder } from 'fast-xml-parser';
import { digestSections } from '../digest/assemble';
import type { Digest, DigestItem } from '../types/digest';
import { RenderError, errorMessage } from '../utils/errors';
import { toIsoString } from '../utils/time';
import { noCoverageMessage, reportTitle } from './email';

interface OutlineNode {
  '@_text': string;
  '@_title': string;
  '@_type'?: string;
  '@_url'?: string;
  '@_htmlUrl'?: string;
  '@_created'?: string;
  '@_sentiment'?: string;
  '@_source'?: string;
  outline?: OutlineNode[];
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true
});

function itemOutline(item: DigestItem): OutlineNode {
  return {
    '@_text': item.title,
    '@_title': item.title,
    '@_type': 'link',
    '@_url': item.url,
    '@_htmlUrl': item.url,
    '@_created': toIsoString(item.publishedAt),
    '@_sentiment': item.sentiment,
    '@_source': item.source
  };
}

/**
 * OPML 2.0 export of the digest, one outline per client holding its items.
 * An empty digest still yields a single placeholder outline.
 */
export function buildOpml(digest: Digest): string {
  const outlines: OutlineNode[] = digestSections(digest).map(({ entity, items }) => ({
    '@_text': entity.name,
    '@_title': entity.name,
    outline: items.map(itemOutline)
  }));

  if (outlines.length === 0) {
    const message = noCoverageMessage(digest.windowHours);
    outlines.push({ '@_text': message, '@_title': message });
  }

  const document = {
    '?xml': { '@_version': '1.0', '@_encoding': 'utf-8' },
    opml: {
      '@_version': '2.0',
      head: {
        title: reportTitle(digest.reportDate),
        dateCreated: toIsoString(digest.reportDate)
      },
      body: { outline: outlines }
    }
  };

  return builder.build(document);
}

export async function writeOpml(digest: Digest, outputPath: string): Promise<void> {
  const xml = buildOpml(digest);
  try {
    await fs.writeFile(outputPath, xml, 'utf8');
  } catch (error) {
    throw new RenderError(`Failed to write OPML: ${errorMessage(error)}`, { cause: error });
  }
}
