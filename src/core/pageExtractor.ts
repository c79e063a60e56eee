import { load } from 'cheerio';
import { log } from '../utils/logger';
import { normalizeProfileUrl } from './identifierNormalizer';
import { ProfileIdentifier, SerpResultPage } from './types';

export interface ProfileMatch {
  identifier: ProfileIdentifier;
  url: string;
}

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord => !!value && typeof value === 'object' && !Array.isArray(value);

const readOrganicUrls = (content: UnknownRecord): string[] => {
  const results = content.results;
  if (!isRecord(results) || !Array.isArray(results.organic)) return [];
  const urls: string[] = [];
  for (const entry of results.organic) {
    if (!isRecord(entry)) continue;
    const { url } = entry;
    if (typeof url === 'string' && url.trim()) urls.push(url.trim());
  }
  return urls;
};

// Google wraps outbound links as /url?q=<target>&...
const unwrapRedirect = (href: string): string => {
  if (!href.startsWith('/url?')) return href;
  try {
    const wrapped = new URL(href, 'https://www.google.com').searchParams;
    return wrapped.get('q') || wrapped.get('url') || href;
  } catch {
    return href;
  }
};

const readHtmlUrls = (html: string): string[] => {
  const $ = load(html);
  const urls: string[] = [];
  $('a[href]').each((_, el) => {
    const href = ($(el).attr('href') || '').trim();
    if (href) urls.push(unwrapRedirect(href));
  });
  return urls;
};

const readPageUrls = (page: SerpResultPage): string[] => {
  const { content } = page;
  if (typeof content === 'string') {
    log('WARN', 'serp page was not parsed, falling back to html anchors', { page: page.page, url: page.url });
    return readHtmlUrls(content);
  }
  return isRecord(content) ? readOrganicUrls(content) : [];
};

/** Profile matches of one result page, deduplicated, each with the first URL it was found at. */
export const extractProfileMatches = (page: SerpResultPage): ProfileMatch[] => {
  const matches = new Map<ProfileIdentifier, ProfileMatch>();
  if (!isRecord(page)) return [];
  for (const url of readPageUrls(page)) {
    const identifier = normalizeProfileUrl(url);
    if (!identifier || matches.has(identifier)) continue;
    matches.set(identifier, { identifier, url });
  }
  return [...matches.values()];
};

export const extractIdentifiers = (page: SerpResultPage): Set<ProfileIdentifier> =>
  new Set(extractProfileMatches(page).map((match) => match.identifier));
