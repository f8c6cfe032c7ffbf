/**
 * Turns scraped company data into candidate values for object fields.
 */

import { SCRAPED_FIELD_TARGETS } from '../../config/enrichment-fields.js';

/**
 * What the scraper found on a company site; '' when not found
 */
export interface ScrapedCompany {
  phone: string;
  email: string;
  address: string;
  website: string;
}

export interface ParsedAddress {
  street: string;
  city: string;
  state: string;
  postalCode: string;
}

const STATE_AND_ZIP = /^(.*?)\s*(\d{5}(?:-\d{4})?)$/;

/**
 * Split a one-line US-style address into its parts.
 *
 * @example
 * parseAddress('100 Main Street, Suite 5, Springfield, IL 62701');
 * // { street: '100 Main Street, Suite 5', city: 'Springfield', state: 'IL', postalCode: '62701' }
 *
 * @returns null when fewer than street, city and state can be told apart
 */
export function parseAddress(text: string): ParsedAddress | null {
  const parts = text
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  const last = parts.pop();
  if (last === undefined) return null;

  let state = last;
  let postalCode = '';
  const match = STATE_AND_ZIP.exec(last);
  if (match) {
    postalCode = match[2].replace(/\D/g, '');
    state = match[1].trim() || (parts.pop() ?? '');
  }

  if (!state || parts.length < 2) return null;

  const city = parts[parts.length - 1];
  const street = parts.slice(0, -1).join(', ');
  return { street, city, state, postalCode };
}

/**
 * Candidate values keyed by object field, limited to `fields`.
 * Field names are matched ignoring case and returned as spelled in
 * `fields`. Empty values are left out.
 */
export function toFieldValues(
  objectType: string,
  company: ScrapedCompany,
  fields: readonly string[],
  defaultCountry: string
): Record<string, string> {
  const targets = SCRAPED_FIELD_TARGETS[objectType];
  if (!targets) return {};

  const requested = new Map(fields.map((field) => [field.toLowerCase(), field]));
  const values: Record<string, string> = {};
  const put = (target: string | undefined, value: string): void => {
    if (!target || !value) return;
    const field = requested.get(target.toLowerCase());
    if (field !== undefined) {
      values[field] = value;
    }
  };

  put(targets.phone, company.phone);
  put(targets.email, company.email);
  put(targets.website, company.website);

  const address = targets.address && company.address ? parseAddress(company.address) : null;
  if (targets.address && address) {
    put(targets.address.street, address.street);
    put(targets.address.city, address.city);
    put(targets.address.state, address.state);
    put(targets.address.postalCode, address.postalCode);
    put(targets.address.country, defaultCountry);
  }

  return values;
}
