import { describe, it, expect } from 'vitest';
import { load } from 'cheerio';
import {
  cleanText,
  extractAddress,
  extractEmail,
  extractPhone,
  extractResultLinks,
  pageText,
  parseHttpUrl,
} from './extractors.js';

describe('cleanText', () => {
  it('collapses whitespace', () => {
    expect(cleanText('  100   Main\n\tStreet  ')).toBe('100 Main Street');
  });
});

describe('extractPhone', () => {
  it('finds a US number', () => {
    expect(extractPhone('Call us at (555) 123-4567 today')).toBe('(555) 123-4567');
  });

  it('returns null without digits', () => {
    expect(extractPhone('No phone here')).toBeNull();
  });
});

describe('extractEmail', () => {
  it('finds the first address and lower-cases it', () => {
    expect(extractEmail('Write to Sales@Acme.com.')).toBe('sales@acme.com');
  });

  it('returns null without an address', () => {
    expect(extractEmail('contact us on the form')).toBeNull();
  });
});

describe('extractAddress', () => {
  it('reads the block whose class mentions an address', () => {
    const $ = load(`
      <div class="contact">Call us</div>
      <div class="footer-address">100  Main Street,
        Springfield, IL 62701</div>
    `);

    expect(extractAddress($)).toBe('100 Main Street, Springfield, IL 62701');
  });

  it('ignores blocks that do not look like a street address', () => {
    const $ = load('<p class="location">Springfield</p>');

    expect(extractAddress($)).toBeNull();
  });
});

describe('pageText', () => {
  it('leaves out scripts and styles', () => {
    const $ = load('<p>Hello </p><script>var x = 1;</script><style>p { color: red }</style><p>world</p>');

    expect(pageText($)).toBe('Hello world');
  });
});

describe('extractResultLinks', () => {
  it('unwraps redirects, drops excluded hosts and duplicates', () => {
    const html = `
      <a href="/url?q=https://www.acme.com/&amp;sa=U">Acme</a>
      <a href="https://www.google.com/search?q=acme">More results</a>
      <a href="https://acme.com/about">About</a>
      <a href="/url?q=https://www.acme.com/&amp;sa=X">Acme again</a>
      <a href="mailto:info@acme.com">Mail</a>
    `;

    expect(extractResultLinks(html)).toEqual(['https://www.acme.com/', 'https://acme.com/about']);
  });
});

describe('parseHttpUrl', () => {
  it('accepts http and https only', () => {
    expect(parseHttpUrl('https://acme.com')?.hostname).toBe('acme.com');
    expect(parseHttpUrl('ftp://acme.com')).toBeNull();
    expect(parseHttpUrl('not a url')).toBeNull();
  });
});
