/**
 * Code List Lookups
 *
 * Language, currency, timezone and URL validity as checked by the agency,
 * fare and feed_info checks. Code lists live in src/data.
 */

import iso639 from '../data/iso-639.json' with { type: 'json' };
import iso4217 from '../data/iso-4217.json' with { type: 'json' };

const ALPHA2 = new Set(iso639.languages.map(language => language.alpha2));
const ALPHA3 = new Set([...iso639.languages.flatMap(language => language.alpha3), ...iso639.alpha3Only]);
const CURRENCIES = new Set(iso4217.codes);

/** ll_CC, ll-CC, lll-CC, ll-Script-CC ... */
const LOCALE_PATTERN = /^([a-z]{2,3})(?:[-_][a-z0-9]{2,8})+$/;

/**
 * Whether a language code is an ISO 639-1 or 639-2 code, or a locale whose
 * primary language is one
 */
export function isValidLanguage(code: string): boolean {
  const lang = code.toLowerCase();

  if (lang.length === 2) return ALPHA2.has(lang);
  if (lang.length === 3) return ALPHA3.has(lang);
  if (lang.length > 11) return false;

  const match = LOCALE_PATTERN.exec(lang);
  if (match === null) return false;
  const primary = match[1];
  if (!ALPHA2.has(primary) && !ALPHA3.has(primary)) return false;

  try {
    Intl.getCanonicalLocales(lang.replaceAll('_', '-'));
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether a code is an active ISO 4217 currency (case-sensitive, as GTFS
 * requires upper case)
 */
export function isValidCurrency(code: string): boolean {
  return CURRENCIES.has(code);
}

/**
 * Whether a timezone is an IANA zone known to the runtime
 */
export function isValidTimezone(timezone: string): boolean {
  if (timezone.length === 0) return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether a URL is fully qualified with an http or https scheme
 */
export function isValidHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
