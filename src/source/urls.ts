import { JSDOM } from 'jsdom';
import fs from 'node:fs';
import path from 'node:path';
import { SourceError } from '../shared/errors.js';

const URL_REGEX = /https?:\/\/[^\s]+/g;

/**
 * Pull every http(s) URL out of free text. Duplicates are dropped, first-seen
 * order is kept.
 */
export function extractUrls(text: string): string[] {
  return [...new Set(text.match(URL_REGEX) ?? [])];
}

/**
 * Parse OPML XML and collect the xmlUrl of every outline, including nested
 * folders.
 */
export function parseOpml(xmlString: string): string[] {
  const dom = new JSDOM(xmlString, { contentType: 'text/xml' });
  const doc = dom.window.document;
  const urls = new Set<string>();

  function traverse(node: Element): void {
    const outlines = Array.from(node.children).filter(
      (el) => el.tagName.toLowerCase() === 'outline',
    );
    for (const outline of outlines) {
      const xmlUrl = outline.getAttribute('xmlUrl')?.trim();
      if (xmlUrl) urls.add(xmlUrl);
      traverse(outline);
    }
  }

  const body = doc.querySelector('body');
  if (body) {
    traverse(body);
  }

  return [...urls];
}

/**
 * Read candidate URLs from a file: OPML subscriptions for `.opml`, otherwise
 * any text containing URLs.
 */
export function readCandidateUrls(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new SourceError(`URL file not found: ${filePath}`, { path: filePath });
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  if (path.extname(filePath).toLowerCase() === '.opml') {
    return parseOpml(content);
  }
  return extractUrls(content);
}
