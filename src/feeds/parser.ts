import Parser from 'rss-parser';
import xml2js from 'xml2js';
import type { FeedConfig, FeedEntry } from '../types/index.js';
import { cleanHtml, truncate } from '../shared/text.js';
import { normalizeUrl } from '../shared/url-utils.js';

const SUMMARY_MAX_CHARS = 300;

type CustomItem = {
  description?: string;
  published?: string;
  updated?: string;
};

const parser = new Parser<Record<string, unknown>, CustomItem>({
  customFields: {
    item: ['description', 'published', 'updated']
  }
});

export interface ParsedFeed {
  entries: FeedEntry[];
  fetchedRaw: number;
  parser: 'rss-parser' | 'lenient';
}

interface RawEntryFields {
  title?: string;
  link?: string;
  date?: string;
  description?: string;
}

// Custom fields come straight from xml2js and may be nested objects
function textField(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toIsoDate(value: string | undefined): string | null {
  if (!value) return null;
  const ts = new Date(value.trim()).getTime();
  return Number.isNaN(ts) ? null : new Date(ts).toISOString();
}

function toFeedEntry(raw: RawEntryFields, feed: FeedConfig): FeedEntry | null {
  const title = cleanHtml(raw.title);
  const link = normalizeUrl(raw.link || '');
  if (!title || !link) return null;
  return {
    title,
    link,
    pubDate: toIsoDate(raw.date),
    summary: truncate(cleanHtml(raw.description), SUMMARY_MAX_CHARS),
    sourceFeed: feed.name
  };
}

/**
 * Parse a feed document into entries. rss-parser is tried first; documents it
 * rejects (bare ampersands, unclosed tags) are re-read with a non-strict xml2js pass.
 */
export async function parseFeedXml(xml: string, feed: FeedConfig, maxEntries: number): Promise<ParsedFeed> {
  try {
    const parsed = await parser.parseString(xml);
    const entries: FeedEntry[] = [];
    for (const item of parsed.items.slice(0, maxEntries)) {
      const entry = toFeedEntry({
        title: item.title,
        link: item.link || (item.guid && item.guid.startsWith('http') ? item.guid : undefined),
        date: item.isoDate || item.pubDate || textField(item.published) || textField(item.updated),
        description: textField(item.description) || item.content || item.summary || item.contentSnippet
      }, feed);
      if (entry) entries.push(entry);
    }
    return { entries, fetchedRaw: parsed.items.length, parser: 'rss-parser' };
  } catch (strictError) {
    try {
      return await parseLeniently(xml, feed, maxEntries);
    } catch (lenientError) {
      const first = strictError instanceof Error ? strictError.message : String(strictError);
      const second = lenientError instanceof Error ? lenientError.message : String(lenientError);
      throw new Error(`Feed parse failed: ${first}. Lenient parse failed: ${second}`);
    }
  }
}

// --- lenient fallback -------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(node: unknown, key: string): unknown[] {
  if (!isRecord(node)) return [];
  const value = node[key];
  return Array.isArray(value) ? value : [];
}

function textOf(node: unknown): string {
  if (typeof node === 'string') return node;
  if (isRecord(node) && typeof node._ === 'string') return node._;
  return '';
}

function firstText(node: unknown, keys: string[]): string | undefined {
  for (const key of keys) {
    const text = textOf(children(node, key)[0]).trim();
    if (text) return text;
  }
  return undefined;
}

function attr(node: unknown, name: string): string | undefined {
  if (!isRecord(node) || !isRecord(node.$)) return undefined;
  const value = node.$[name];
  return typeof value === 'string' ? value : undefined;
}

function entryLink(node: unknown): string | undefined {
  for (const link of children(node, 'link')) {
    const text = textOf(link).trim();
    if (text) return text;
    const href = attr(link, 'href');
    const rel = attr(link, 'rel');
    if (href && (!rel || rel === 'alternate')) return href;
  }
  const guid = firstText(node, ['guid', 'id']);
  return guid && guid.startsWith('http') ? guid : undefined;
}

export async function parseLeniently(xml: string, feed: FeedConfig, maxEntries: number): Promise<ParsedFeed> {
  const doc: unknown = await xml2js.parseStringPromise(xml, {
    strict: false,
    normalizeTags: true,
    attrNameProcessors: [xml2js.processors.normalize],
    explicitArray: true
  });

  if (!isRecord(doc)) {
    throw new Error('Document has no root element');
  }

  let rawItems: unknown[];
  const { rss, feed: atom, 'rdf:rdf': rdf } = doc;
  if (rss !== undefined) {
    rawItems = children(children(rss, 'channel')[0], 'item');
  } else if (atom !== undefined) {
    rawItems = children(atom, 'entry');
  } else if (rdf !== undefined) {
    rawItems = children(rdf, 'item');
  } else {
    throw new Error('Document is not an RSS or Atom feed');
  }

  const entries: FeedEntry[] = [];
  for (const item of rawItems.slice(0, maxEntries)) {
    const entry = toFeedEntry({
      title: firstText(item, ['title']),
      link: entryLink(item),
      date: firstText(item, ['pubdate', 'published', 'updated', 'dc:date']),
      description: firstText(item, ['description', 'summary', 'content:encoded', 'content'])
    }, feed);
    if (entry) entries.push(entry);
  }
  return { entries, fetchedRaw: rawItems.length, parser: 'lenient' };
}
