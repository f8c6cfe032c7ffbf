/**
 * Web Company Scraper
 *
 * Finds a company's website through a search page, then reads phone,
 * email and address from the site's HTML. Ambiguous searches are
 * rejected: exactly one result host has to match the company name.
 */

import fetch from 'node-fetch';
import { load } from 'cheerio';
import {
  isRetryableError,
  retryWithBackoff,
  withTimeout,
  type BackoffOptions,
} from '../../core/concurrency.js';
import { PermanentAPIError, ScrapeError, TransientAPIError, toError } from '../../core/errors.js';
import { createLogger } from '../../core/logger.js';
import type { CompanyScraper, ScrapeQuery } from '../../core/types.js';
import { toFieldValues, type ScrapedCompany } from './candidate-values.js';
import {
  extractAddress,
  extractEmail,
  extractPhone,
  extractResultLinks,
  pageText,
  parseHttpUrl,
} from './extractors.js';

const log = createLogger('scraper');

export type FetchHtml = (url: string) => Promise<string>;

export interface WebScraperOptions {
  /** Search page URL with a `{query}` placeholder */
  searchUrl: string;
  userAgent: string;
  defaultCountry: string;
  /** Per-page timeout in milliseconds */
  timeoutMs: number;
  retry: BackoffOptions;
  /** Page loader, node-fetch when omitted */
  fetchHtml?: FetchHtml;
}

const COMPANY_SUFFIXES = new Set([
  'inc',
  'corp',
  'corporation',
  'llc',
  'ltd',
  'co',
  'company',
  'plc',
  'gmbh',
  'the',
]);

/**
 * Lower-case alphanumeric form of a company name without legal suffixes
 *
 * @example
 * companySlug('The Acme Widget Co., Inc.'); // 'acmewidget'
 */
export function companySlug(name: string): string {
  return name
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0 && !COMPANY_SUFFIXES.has(word))
    .join('');
}

function siteLabel(hostname: string): string {
  return hostname.replace(/^www\./, '').split('.')[0] ?? '';
}

function hostMatches(hostname: string, slug: string): boolean {
  const label = siteLabel(hostname).replace(/[^a-z0-9]/g, '');
  if (!label) return false;
  return label === slug || label.includes(slug) || (label.length >= 3 && slug.includes(label));
}

/**
 * Pick the company site among search result links. Links are grouped by
 * host; exactly one host must match the company name.
 *
 * @throws ScrapeError when no host or more than one host matches
 */
export function selectCompanySite(links: readonly string[], companyName: string): string {
  const slug = companySlug(companyName);
  if (!slug) {
    throw new ScrapeError(`Cannot derive a search key from '${companyName}'`, companyName);
  }

  const byHost = new Map<string, string>();
  for (const link of links) {
    const url = parseHttpUrl(link);
    if (!url) continue;
    const host = url.hostname.toLowerCase().replace(/^www\./, '');
    if (!byHost.has(host) && hostMatches(host, slug)) {
      byHost.set(host, url.href);
    }
  }

  const matches = [...byHost.values()];
  if (matches.length === 0) {
    throw new ScrapeError(`Could not find a website for '${companyName}'`, companyName);
  }
  if (matches.length > 1) {
    throw new ScrapeError(
      `Several websites match '${companyName}': ${[...byHost.keys()].join(', ')}`,
      companyName
    );
  }
  return matches[0];
}

function createFetchHtml(userAgent: string): FetchHtml {
  return async (url) => {
    const response = await fetch(url, {
      headers: {
        'User-Agent': userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
      },
    });

    if (response.status === 429 || response.status >= 500) {
      throw new TransientAPIError(`${url} answered ${response.status}`, String(response.status));
    }
    if (!response.ok) {
      throw new PermanentAPIError(
        `Failed to fetch ${url}: ${response.status} ${response.statusText}`,
        String(response.status)
      );
    }
    return response.text();
  };
}

export class WebCompanyScraper implements CompanyScraper {
  private readonly fetchHtml: FetchHtml;

  constructor(private readonly options: WebScraperOptions) {
    this.fetchHtml = options.fetchHtml ?? createFetchHtml(options.userAgent);
  }

  async scrape(query: ScrapeQuery): Promise<Record<string, string>> {
    const { searchKey, objectType, fields } = query;
    if (!searchKey.trim()) {
      throw new ScrapeError(`${objectType} has no name to search for`, searchKey);
    }

    const site = query.website ? normalizeWebsite(query.website) : await this.findCompanySite(searchKey);
    log.info({ searchKey, site }, 'Reading company site');

    const $ = load(await this.fetchPage(site, searchKey));
    const address = extractAddress($);
    const text = pageText($);

    const company: ScrapedCompany = {
      phone: extractPhone(text) ?? '',
      email: extractEmail(text) ?? '',
      address: address ?? '',
      website: query.website?.trim() || site,
    };
    log.debug({ searchKey, company }, 'Scraped company data');

    const values = toFieldValues(objectType, company, fields, this.options.defaultCountry);
    if (Object.keys(values).length === 0) {
      throw new ScrapeError(`No usable data found for '${searchKey}'`, searchKey);
    }
    return values;
  }

  private async findCompanySite(searchKey: string): Promise<string> {
    const searchText = encodeURIComponent(`${searchKey} company contact`);
    const url = this.options.searchUrl.replace('{query}', searchText);
    const links = extractResultLinks(await this.fetchPage(url, searchKey));
    log.debug({ searchKey, links: links.length }, 'Search results');
    return selectCompanySite(links, searchKey);
  }

  private async fetchPage(url: string, searchKey: string): Promise<string> {
    try {
      return await retryWithBackoff(
        () => withTimeout(this.fetchHtml(url), this.options.timeoutMs, `GET ${url}`),
        {
          ...this.options.retry,
          shouldRetry: isRetryableError,
          onRetry: (err, attempt, delayMs) => log.warn({ err, url, attempt, delayMs }, 'Retrying page fetch'),
        }
      );
    } catch (error) {
      const err = toError(error);
      throw new ScrapeError(`Could not fetch ${url}: ${err.message}`, searchKey, err);
    }
  }
}

function normalizeWebsite(website: string): string {
  const trimmed = website.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}
