/**
 * Centralized Default Configuration Values
 *
 * All magic numbers and default values are defined here for consistency
 * and maintainability. Users can override most of these in
 * sf-dataops.config.json or via CLI flags.
 */

export const DEFAULTS = {
  /**
   * Salesforce REST API version used for every call.
   */
  API_VERSION: '60.0',

  /**
   * Records per SObject Collections call.
   * CLI flag: --batch-size
   */
  BATCH_SIZE: 200,

  /**
   * Hard ceiling imposed by the SObject Collections endpoints.
   */
  MAX_BATCH_SIZE: 200,

  /**
   * Timeout for a single org call, in seconds.
   */
  API_TIMEOUT_SECONDS: 30,

  /**
   * Submissions per record before a transient failure becomes final.
   */
  RETRY_ATTEMPTS: 3,

  /**
   * Initial delay between retries in milliseconds.
   */
  RETRY_DELAY_MS: 1000,

  /**
   * Multiplier for exponential backoff between retries.
   */
  RETRY_BACKOFF_MULTIPLIER: 2,

  /**
   * Maximum delay between retries in milliseconds.
   */
  RETRY_MAX_DELAY_MS: 30000,

  /**
   * Timeout for one scraper page fetch in milliseconds.
   */
  SCRAPE_TIMEOUT_MS: 10000,

  CSV_ENCODING: 'utf-8',
  CSV_DELIMITER: ',',
  ERROR_DIRECTORY: 'errors',
  RESULTS_DIRECTORY: 'results',

  /**
   * Config file looked up in the working directory when no path is given.
   */
  CONFIG_FILE: 'sf-dataops.config.json',

  SEARCH_URL: 'https://www.google.com/search?q={query}',
  USER_AGENT: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36',
  DEFAULT_COUNTRY: 'United States',
} as const;

/**
 * Type for the defaults object
 */
export type Defaults = typeof DEFAULTS;
