import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { SitemapParseError } from '../../common/errors/tracker.errors.js';
import { Logger } from '../../common/logger.js';
import type { SitemapArticle } from './interfaces/sitemap-article.interface.js';

const logger = new Logger('SitemapParser');

/**
 * Tag name without its namespace prefix (`news:title` -> `title`)
 */
function localName(tagName: string): string {
  const separator = tagName.indexOf(':');
  return separator === -1 ? tagName : tagName.slice(separator + 1);
}

function childrenNamed(node: Cheerio<Element>, name: string): Cheerio<Element> {
  return node.children().filter((_, child) => localName(child.tagName) === name);
}

/**
 * Trimmed text of the first element reached by following `path` from `node`
 */
function textAt(node: Cheerio<Element>, path: string[]): string {
  let current = node;
  for (const name of path) {
    current = childrenNamed(current, name).first();
    if (current.length === 0) {
      return '';
    }
  }
  return current.text().trim();
}

function titleCase(text: string): string {
  return text
    .split(' ')
    .map(word => (word ? word.charAt(0).toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

/**
 * Human readable title built from the last path segment of an article URL
 */
export function titleFromUrl(url: string): string {
  const slug = url.replace(/\/+$/, '').split('/').pop() ?? '';
  return titleCase(slug.replace(/-/g, ' '));
}

export function parseKeywords(value: string): string[] {
  return value
    .split(',')
    .map(keyword => keyword.trim())
    .filter(keyword => keyword.length > 0);
}

function findUrlset($: CheerioAPI): Cheerio<Element> {
  return $.root()
    .children()
    .filter((_, child) => localName(child.tagName) === 'urlset')
    .first();
}

/**
 * Parse a (Google News) sitemap document.
 * Namespace prefixes are ignored, elements are matched by local name.
 */
export function parseSitemap(xml: string): SitemapArticle[] {
  const $ = load(xml, { xml: true });
  const urlset = findUrlset($);

  if (urlset.length === 0) {
    throw new SitemapParseError('Sitemap document has no <urlset> root element');
  }

  const entries = childrenNamed(urlset, 'url');
  logger.log(`Found ${entries.length} URL entries in sitemap`);

  const articles: SitemapArticle[] = [];

  entries.each((_, element) => {
    const entry = $(element);
    const url = textAt(entry, ['loc']);
    if (!url) {
      return;
    }

    const title = textAt(entry, ['news', 'title']) || titleFromUrl(url);

    articles.push({
      url,
      title,
      publicationDate: textAt(entry, ['news', 'publication_date']),
      keywords: parseKeywords(textAt(entry, ['news', 'keywords'])),
    });
  });

  return articles;
}
