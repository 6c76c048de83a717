/**
 * Feed Loader
 *
 * Reads a GTFS feed from a directory or a .zip archive into a RawFeed.
 * Each table is decoded independently: a table that fails to decode is
 * recorded as failed and the others still load. Only an input that cannot
 * be opened at all throws (FeedLoadError).
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import JSZip from 'jszip';
import { FeedLoadError, TableParseError } from '../core/errors.js';
import {
  TABLE_NAMES,
  tableFileName,
  type RawFeed,
  type RawTable,
  type TableName,
  type TableRecords,
} from '../core/types/feed.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { baseName } from '../validators/structure.js';
import { readCsv } from './csv.js';
import { TABLE_DECODERS } from './tables.js';

export interface LoadOptions {
  readonly logger?: Logger;
}

const defaultLogger = createLogger('loader');

const TABLE_FILES: ReadonlySet<string> = new Set(TABLE_NAMES.map(tableFileName));

// =============================================================================
// Decoding
// =============================================================================

/**
 * Path of a table's file; the shallowest match wins when several folders
 * hold one
 */
function locate(table: TableName, paths: Iterable<string>): string | undefined {
  const fileName = tableFileName(table);
  let found: string | undefined;
  for (const path of paths) {
    if (baseName(path) !== fileName) continue;
    if (found === undefined || path.length < found.length) {
      found = path;
    }
  }
  return found;
}

function decodeTable<K extends TableName>(
  table: K,
  contents: ReadonlyMap<string, string>
): RawTable<TableRecords[K]> {
  const path = locate(table, contents.keys());
  if (path === undefined) {
    return { status: 'missing' };
  }

  const decode = TABLE_DECODERS[table];
  try {
    const records = readCsv(tableFileName(table), contents.get(path) ?? '').map(row => decode(row));
    return { status: 'loaded', records };
  } catch (error) {
    if (error instanceof TableParseError) {
      return { status: 'failed', error: error.toLoadError() };
    }
    throw error;
  }
}

/**
 * Decode every known table from file contents keyed by archive path
 *
 * `files` lists every path of the archive; it defaults to the keys of
 * `contents`.
 */
export function parseFeedFiles(
  contents: ReadonlyMap<string, string>,
  files: readonly string[] = [...contents.keys()]
): RawFeed {
  return {
    files,
    tables: {
      agency: decodeTable('agency', contents),
      stops: decodeTable('stops', contents),
      routes: decodeTable('routes', contents),
      trips: decodeTable('trips', contents),
      stop_times: decodeTable('stop_times', contents),
      calendar: decodeTable('calendar', contents),
      calendar_dates: decodeTable('calendar_dates', contents),
      shapes: decodeTable('shapes', contents),
      fare_attributes: decodeTable('fare_attributes', contents),
      fare_rules: decodeTable('fare_rules', contents),
      feed_info: decodeTable('feed_info', contents),
      pathways: decodeTable('pathways', contents),
    },
  };
}

// =============================================================================
// Sources
// =============================================================================

/**
 * Load a feed from the bytes of a .zip archive
 */
export async function loadFeedFromZipBuffer(data: Buffer, input = '<buffer>'): Promise<RawFeed> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FeedLoadError(`${input} is not a valid zip archive: ${message}`, input, { cause: error });
  }

  const files: string[] = [];
  const contents = new Map<string, string>();
  for (const [path, file] of Object.entries(zip.files)) {
    if (file.dir) continue;
    files.push(path);
    if (TABLE_FILES.has(baseName(path))) {
      contents.set(path, await file.async('string'));
    }
  }

  return parseFeedFiles(contents, files);
}

async function listFiles(root: string, directory: string = root): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, path)));
    } else if (entry.isFile()) {
      files.push(relative(root, path).split(sep).join('/'));
    }
  }
  return files.sort();
}

/**
 * Load a feed from an unpacked directory
 */
export async function loadFeedFromDirectory(directory: string): Promise<RawFeed> {
  const files = await listFiles(directory);
  const contents = new Map<string, string>();
  for (const path of files) {
    if (TABLE_FILES.has(baseName(path))) {
      contents.set(path, await readFile(join(directory, path), 'utf-8'));
    }
  }
  return parseFeedFiles(contents, files);
}

/**
 * Load a feed from a directory or a .zip archive
 */
export async function loadFeed(input: string, options: LoadOptions = {}): Promise<RawFeed> {
  const logger = options.logger ?? defaultLogger;

  let feed: RawFeed;
  try {
    const info = await stat(input);
    if (info.isDirectory()) {
      logger.debug('Reading feed directory', { input });
      feed = await loadFeedFromDirectory(input);
    } else {
      logger.debug('Reading feed archive', { input, size: info.size });
      feed = await loadFeedFromZipBuffer(await readFile(input), input);
    }
  } catch (error) {
    if (error instanceof FeedLoadError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new FeedLoadError(`Unable to read ${input}: ${message}`, input, { cause: error });
  }

  const failed = TABLE_NAMES.filter(table => feed.tables[table].status === 'failed');
  logger.info('Feed loaded', { input, files: feed.files.length, failedTables: failed });
  return feed;
}
