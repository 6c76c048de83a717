export {
  loadFeed,
  loadFeedFromDirectory,
  loadFeedFromZipBuffer,
  parseFeedFiles,
  type LoadOptions,
} from './feed-loader.js';
export { CsvRow, readCsv } from './csv.js';
export { TABLE_DECODERS, type TableDecoder } from './tables.js';
