/**
 * Enrichment module exports
 */

export { EnrichmentPipeline, computeDiff, type EnrichmentDependencies } from './enrichment-pipeline.js';
export {
  WebCompanyScraper,
  companySlug,
  selectCompanySite,
  type FetchHtml,
  type WebScraperOptions,
} from './company-scraper.js';
export { parseAddress, toFieldValues, type ParsedAddress, type ScrapedCompany } from './candidate-values.js';
export { extractAddress, extractEmail, extractPhone, extractResultLinks } from './extractors.js';
