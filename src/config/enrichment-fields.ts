/**
 * Enrichment field tables per object type.
 *
 * DEFAULT_ENRICHMENT_FIELDS is the allow-list used when the config file
 * names none; SCRAPED_FIELD_TARGETS says which object fields each piece
 * of scraped company data lands in.
 */

export const DEFAULT_ENRICHMENT_FIELDS: Record<string, string[]> = {
  Account: [
    'Phone',
    'Website',
    'BillingStreet',
    'BillingCity',
    'BillingState',
    'BillingPostalCode',
    'BillingCountry',
  ],
  Contact: [
    'Phone',
    'Email',
    'MailingStreet',
    'MailingCity',
    'MailingState',
    'MailingPostalCode',
    'MailingCountry',
  ],
  Lead: ['Phone', 'Email', 'Street', 'City', 'State', 'PostalCode', 'Country'],
};

/**
 * Object fields that receive the parts of a parsed postal address
 */
export interface AddressFieldTargets {
  street: string;
  city: string;
  state: string;
  postalCode: string;
  country: string;
}

export interface ScrapedFieldTargets {
  phone?: string;
  email?: string;
  website?: string;
  address?: AddressFieldTargets;
}

export const SCRAPED_FIELD_TARGETS: Record<string, ScrapedFieldTargets> = {
  Account: {
    phone: 'Phone',
    website: 'Website',
    address: {
      street: 'BillingStreet',
      city: 'BillingCity',
      state: 'BillingState',
      postalCode: 'BillingPostalCode',
      country: 'BillingCountry',
    },
  },
  Contact: {
    phone: 'Phone',
    email: 'Email',
    address: {
      street: 'MailingStreet',
      city: 'MailingCity',
      state: 'MailingState',
      postalCode: 'MailingPostalCode',
      country: 'MailingCountry',
    },
  },
  Lead: {
    phone: 'Phone',
    email: 'Email',
    address: {
      street: 'Street',
      city: 'City',
      state: 'State',
      postalCode: 'PostalCode',
      country: 'Country',
    },
  },
};
