/**
 * Metadata Format Checks
 *
 * URLs, timezones, languages and currencies of agency.txt, feed_info.txt
 * and fare_attributes.txt, plus the calendar presence check.
 */

import { agencyRef, feedInfoRef, subject } from '../core/objects.js';
import { recordsOf } from '../core/types/feed.js';
import { createIssue } from '../core/types/issues.js';
import type { Check } from '../core/types/validators.js';
import { isValidCurrency, isValidHttpUrl, isValidLanguage, isValidTimezone } from './codes.js';

// =============================================================================
// Agency
// =============================================================================

export const agencyCheck: Check = {
  name: 'agency',
  requires: ['agency'],
  domain: 'InvalidUrl',
  *run(index) {
    for (const agency of index.agencies) {
      const id = agency.id ?? '';
      const object = subject(agencyRef(agency));

      if (agency.url.length === 0) {
        yield createIssue('MissingUrl', id, object);
      } else if (!isValidHttpUrl(agency.url)) {
        yield createIssue('InvalidUrl', id, {
          ...object,
          details: `The agency_url (in agency.txt) ${agency.url} is invalid`,
        });
      }

      if (!isValidTimezone(agency.timezone)) {
        yield createIssue('InvalidTimezone', id, {
          ...object,
          details: `The timezone ${agency.timezone} is not a known IANA timezone`,
        });
      }

      if (agency.lang !== undefined && !isValidLanguage(agency.lang)) {
        yield createIssue('InvalidLanguage', id, {
          ...object,
          details: `Language code ${agency.lang} does not exist`,
        });
      }
    }
  },
};

// =============================================================================
// Feed Info
// =============================================================================

export const feedInfoCheck: Check = {
  name: 'feed-info',
  requires: ['feed_info'],
  domain: 'InvalidUrl',
  *run(index) {
    for (const feedInfo of index.feedInfo) {
      const object = subject(feedInfoRef(feedInfo));

      if (feedInfo.publisherUrl.length === 0) {
        yield createIssue('MissingUrl', '', object);
      } else if (!isValidHttpUrl(feedInfo.publisherUrl)) {
        yield createIssue('InvalidUrl', '', {
          ...object,
          details: `The feed_publisher_url (in feed_info.txt) ${feedInfo.publisherUrl} is invalid`,
        });
      }

      if (feedInfo.lang.length === 0) {
        yield createIssue('MissingLanguage', '', object);
      } else if (!isValidLanguage(feedInfo.lang)) {
        yield createIssue('InvalidLanguage', '', {
          ...object,
          details: `Language code ${feedInfo.lang} does not exist`,
        });
      }
    }
  },
};

// =============================================================================
// Fare Attributes
// =============================================================================

const VALID_TRANSFERS: ReadonlySet<number> = new Set([0, 1, 2]);

export const fareAttributesCheck: Check = {
  name: 'fare-attributes',
  requires: ['fare_attributes'],
  domain: 'InvalidCurrency',
  *run(index) {
    for (const fare of index.fareAttributes.values()) {
      if (fare.price.length === 0) {
        yield createIssue('MissingPrice', fare.id, { objectType: 'fare' });
      }
      if (!isValidCurrency(fare.currency)) {
        yield createIssue('InvalidCurrency', fare.id, {
          objectType: 'fare',
          details: `The currency ${fare.currency} is not an ISO 4217 code`,
        });
      }
      if (fare.transfers !== undefined && !VALID_TRANSFERS.has(fare.transfers)) {
        yield createIssue('InvalidTransfers', fare.id, {
          objectType: 'fare',
          details: `${fare.transfers} is not a valid number of transfers`,
        });
      }
      if (fare.transferDuration !== undefined && fare.transferDuration < 0) {
        yield createIssue('InvalidTransferDuration', fare.id, {
          objectType: 'fare',
          details: `The transfer duration ${fare.transferDuration} is negative`,
        });
      }
    }
  },
};

// =============================================================================
// Calendar
// =============================================================================

export const calendarCheck: Check = {
  name: 'calendar',
  requires: [],
  domain: 'NoCalendar',
  *run(index) {
    const { tables } = index.raw;
    // A calendar file that failed to load is reported as an unloadable model
    if (tables.calendar.status === 'failed' || tables.calendar_dates.status === 'failed') return;
    if (recordsOf(tables.calendar).length + recordsOf(tables.calendar_dates).length === 0) {
      yield createIssue('NoCalendar', '', {
        details: 'Neither calendar.txt nor calendar_dates.txt has a service',
      });
    }
  },
};
