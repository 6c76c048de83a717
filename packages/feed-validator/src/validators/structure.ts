/**
 * Structural Checks
 *
 * Archive layout and identifier uniqueness, read straight from the raw
 * tables: duplicates and unknown files are invisible once the model is
 * indexed.
 */

import { recordsOf } from '../core/types/feed.js';
import { createIssue, type Issue, type ObjectType } from '../core/types/issues.js';
import type { Check } from '../core/types/validators.js';

// =============================================================================
// File Lists
// =============================================================================

export const MANDATORY_FILES = [
  'agency.txt',
  'routes.txt',
  'stops.txt',
  'stop_times.txt',
  'trips.txt',
] as const;

export const OPTIONAL_FILES = [
  'calendar.txt',
  'calendar_dates.txt',
  'fare_attributes.txt',
  'fare_rules.txt',
  'fare_media.txt',
  'fare_products.txt',
  'fare_leg_rules.txt',
  'fare_leg_join_rules.txt',
  'fare_transfer_rules.txt',
  'feed_info.txt',
  'frequencies.txt',
  'transfers.txt',
  'shapes.txt',
  'pathways.txt',
  'levels.txt',
  'translations.txt',
  'attributions.txt',
  'timeframes.txt',
  'areas.txt',
  'stop_areas.txt',
  'networks.txt',
  'route_networks.txt',
  'location_groups.txt',
  'location_group_stops.txt',
  'locations.geojson',
  'booking_rules.txt',
] as const;

const KNOWN_FILES: ReadonlySet<string> = new Set([...MANDATORY_FILES, ...OPTIONAL_FILES]);

/**
 * Last segment of an archive path
 */
export function baseName(path: string): string {
  const segments = path.split('/').filter(segment => segment.length > 0);
  return segments.at(-1) ?? '';
}

function folderOf(path: string): string {
  const segments = path.split('/').filter(segment => segment.length > 0);
  return segments.slice(0, -1).join('/');
}

// =============================================================================
// Duplicate Object Ids
// =============================================================================

function* duplicates<T>(
  records: readonly T[],
  id: (record: T) => string,
  objectType: ObjectType
): Generator<Issue> {
  const seen = new Set<string>();
  for (const record of records) {
    const key = id(record);
    if (seen.has(key)) {
      yield createIssue('DuplicateObjectId', key, {
        objectType,
        details: `The id ${key} is used by more than one ${objectType}`,
      });
    }
    seen.add(key);
  }
}

export const duplicateObjectIdCheck: Check = {
  name: 'duplicate-object-id',
  requires: [],
  domain: 'DuplicateObjectId',
  *run(index) {
    const { tables } = index.raw;
    yield* duplicates(recordsOf(tables.stops), stop => stop.id, 'stop');
    yield* duplicates(recordsOf(tables.routes), route => route.id, 'route');
    yield* duplicates(recordsOf(tables.trips), trip => trip.id, 'trip');
    yield* duplicates(recordsOf(tables.calendar), calendar => calendar.id, 'calendar');
    yield* duplicates(recordsOf(tables.fare_attributes), fare => fare.id, 'fare');
  },
};

// =============================================================================
// File Presence
// =============================================================================

export const filePresenceCheck: Check = {
  name: 'file-presence',
  requires: [],
  domain: 'MissingMandatoryFile',
  *run(index) {
    const present = new Set(index.raw.files.map(baseName));

    for (const file of MANDATORY_FILES) {
      if (!present.has(file)) {
        yield createIssue('MissingMandatoryFile', file, {
          objectType: 'file',
          details: 'The mandatory file was not found',
        });
      }
    }

    for (const path of index.raw.files) {
      if (!KNOWN_FILES.has(baseName(path))) {
        yield createIssue('ExtraFile', path, {
          objectType: 'file',
          details: 'This file should not be in the archive',
        });
      }
    }
  },
};

// =============================================================================
// Sub Folder
// =============================================================================

export const subFolderCheck: Check = {
  name: 'sub-folder',
  requires: [],
  domain: 'SubFolder',
  *run(index) {
    const stopsPath = index.raw.files.find(
      path => baseName(path) === 'stops.txt' && folderOf(path).length > 0
    );
    if (stopsPath !== undefined) {
      const folder = folderOf(stopsPath);
      yield createIssue('SubFolder', folder, {
        objectType: 'file',
        details: `Data is contained in sub folder: ${folder}`,
      });
    }
  },
};

