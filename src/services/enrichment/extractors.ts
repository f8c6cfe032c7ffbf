/**
 * HTML and text extraction for the company scraper.
 */

import { load, type CheerioAPI } from 'cheerio';

const PHONE_PATTERNS = [
  // US/Canada
  /\+?1?\s*\(?[0-9]{3}\)?[-.\s]?[0-9]{3}[-.\s]?[0-9]{4}/,
  // International
  /\+?[0-9]{1,4}[-.\s]?[0-9]{2,4}[-.\s]?[0-9]{2,4}[-.\s]?[0-9]{2,4}/,
];

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;

const ADDRESS_CLASS_HINTS = ['address', 'location', 'headquarters', 'contact'];
const STREET_PATTERN = /\d+.*(?:street|st|avenue|ave|road|rd|boulevard|blvd)/i;

/** Hosts that never count as a company site */
export const EXCLUDED_RESULT_HOSTS = ['google.', 'youtube.com', 'facebook.com'];

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function extractPhone(text: string): string | null {
  for (const pattern of PHONE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return cleanText(match[0]);
    }
  }
  return null;
}

export function extractEmail(text: string): string | null {
  const match = EMAIL_PATTERN.exec(text);
  return match ? match[0].toLowerCase() : null;
}

/**
 * First block whose class mentions an address-like word and whose text
 * looks like a street address. Hints are tried in order.
 */
export function extractAddress($: CheerioAPI): string | null {
  const blocks = $('div, p, span').toArray();

  for (const hint of ADDRESS_CLASS_HINTS) {
    for (const element of blocks) {
      const className = $(element).attr('class');
      if (!className || !className.toLowerCase().includes(hint)) continue;

      const text = cleanText($(element).text());
      if (STREET_PATTERN.test(text)) {
        return text;
      }
    }
  }
  return null;
}

/**
 * Visible text of a page, scripts and styles removed
 */
export function pageText($: CheerioAPI): string {
  $('script, style, noscript').remove();
  return cleanText($.root().text());
}

/**
 * Outbound links of a search results page, in page order and without
 * duplicates. Redirect links (`/url?q=<target>&...`) are unwrapped.
 */
export function extractResultLinks(html: string): string[] {
  const $ = load(html);
  const links: string[] = [];

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href') ?? '';
    let target = href;

    const redirect = href.indexOf('url?q=');
    if (redirect !== -1) {
      target = safeDecode(href.slice(redirect + 'url?q='.length).split('&')[0]);
    }

    const url = parseHttpUrl(target);
    if (!url) return;
    if (EXCLUDED_RESULT_HOSTS.some((host) => url.hostname.includes(host))) return;

    if (!links.includes(url.href)) {
      links.push(url.href);
    }
  });

  return links;
}

export function parseHttpUrl(value: string): URL | null {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url : null;
  } catch {
    return null;
  }
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
