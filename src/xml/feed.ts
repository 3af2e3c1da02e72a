import { XMLParser } from 'fast-xml-parser';

export type XmlNode = Record<string, unknown>;

export interface FeedLink {
  rel: string | undefined;
  href: string | undefined;
}

/** Feed-level links and entry nodes of one response page. */
export interface FeedDocument {
  links: FeedLink[];
  entries: XmlNode[];
}

export const ATTR = '@_';
export const TEXT = '#text';

const ARRAY_PATHS = new Set(['feed.link', 'feed.entry']);

// Namespace prefixes are dropped: `m:properties` reads as `properties`,
// `m:null` as `@_null`.
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR,
  textNodeName: TEXT,
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  isArray: (_name, jpath) => ARRAY_PATHS.has(jpath),
});

export function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function attribute(node: XmlNode, name: string): string | undefined {
  const value = node[`${ATTR}${name}`];
  return typeof value === 'string' ? value : undefined;
}

function nodes(value: unknown): XmlNode[] {
  const list: unknown[] = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return list.filter(isNode);
}

/**
 * Parses a page body. Accepts a `<feed>` or a lone `<entry>` root;
 * anything else yields an empty document. Malformed XML throws the
 * parser's validation error.
 */
export function parseFeed(body: string): FeedDocument {
  const doc: unknown = parser.parse(body, true);
  if (!isNode(doc)) return { links: [], entries: [] };

  const feed = doc['feed'];
  if (isNode(feed)) {
    return {
      links: nodes(feed['link']).map((link) => ({
        rel: attribute(link, 'rel'),
        href: attribute(link, 'href'),
      })),
      entries: nodes(feed['entry']),
    };
  }

  return { links: [], entries: nodes(doc['entry']) };
}
