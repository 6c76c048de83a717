/**
 * CSV Rows
 *
 * Decodes one GTFS text file into rows and offers strict field accessors.
 * Any value that cannot be decoded throws a TableParseError carrying the
 * file name, line number, headers and values of the offending row.
 */

import { parse } from 'csv-parse/sync';
import { TableParseError } from '../core/errors.js';

const TIME_PATTERN = /^(\d{1,3}):([0-5]\d):([0-5]\d)$/;
const DATE_PATTERN = /^\d{4}(0[1-9]|1[0-2])(0[1-9]|[12]\d|3[01])$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'))
  );
}

export class CsvRow {
  constructor(
    readonly fileName: string,
    readonly headers: readonly string[],
    readonly values: readonly string[],
    readonly lineNumber: number
  ) {}

  fail(message: string): never {
    throw new TableParseError(
      `${this.fileName}:${this.lineNumber}: ${message}`,
      this.fileName,
      this.lineNumber,
      this.headers,
      this.values
    );
  }

  /**
   * Raw value, empty string when the column is absent
   */
  text(field: string): string {
    const column = this.headers.indexOf(field);
    return column < 0 ? '' : (this.values[column] ?? '');
  }

  optional(field: string): string | undefined {
    const value = this.text(field);
    return value.length === 0 ? undefined : value;
  }

  required(field: string): string {
    return this.optional(field) ?? this.fail(`missing value for ${field}`);
  }

  integer(field: string): number | undefined {
    const value = this.optional(field);
    if (value === undefined) return undefined;
    if (!INTEGER_PATTERN.test(value)) {
      this.fail(`invalid integer '${value}' for ${field}`);
    }
    return Number.parseInt(value, 10);
  }

  requiredInteger(field: string): number {
    return this.integer(field) ?? this.fail(`missing value for ${field}`);
  }

  float(field: string): number | undefined {
    const value = this.optional(field);
    if (value === undefined) return undefined;
    if (!FLOAT_PATTERN.test(value)) {
      this.fail(`invalid number '${value}' for ${field}`);
    }
    return Number.parseFloat(value);
  }

  requiredFloat(field: string): number {
    return this.float(field) ?? this.fail(`missing value for ${field}`);
  }

  /**
   * H:MM:SS as seconds after midnight of the service day (may exceed 24h)
   */
  time(field: string): number | undefined {
    const value = this.optional(field);
    if (value === undefined) return undefined;
    const match = TIME_PATTERN.exec(value);
    if (match === null) {
      return this.fail(`invalid time '${value}' for ${field}`);
    }
    return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
  }

  /**
   * YYYYMMDD, kept as text
   */
  date(field: string): string | undefined {
    const value = this.optional(field);
    if (value !== undefined && !DATE_PATTERN.test(value)) {
      this.fail(`invalid date '${value}' for ${field}`);
    }
    return value;
  }

  requiredDate(field: string): string {
    return this.date(field) ?? this.fail(`missing value for ${field}`);
  }

  /**
   * Map a coded value; `fallback` applies to an empty value
   */
  code<T>(field: string, mapping: Readonly<Record<string, T>>, fallback: T): T {
    const value = this.optional(field);
    if (value === undefined) return fallback;
    if (!Object.hasOwn(mapping, value)) {
      return this.fail(`invalid value '${value}' for ${field}`);
    }
    return mapping[value];
  }

  optionalCode<T>(field: string, mapping: Readonly<Record<string, T>>): T | undefined {
    const value = this.optional(field);
    if (value === undefined) return undefined;
    if (!Object.hasOwn(mapping, value)) {
      return this.fail(`invalid value '${value}' for ${field}`);
    }
    return mapping[value];
  }
}

/**
 * Split a GTFS file into rows; the first record is the header
 */
export function readCsv(fileName: string, content: string): CsvRow[] {
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TableParseError(`${fileName}: ${message}`, fileName);
  }

  if (!isStringMatrix(records)) {
    throw new TableParseError(`${fileName}: unexpected CSV structure`, fileName);
  }

  const [headers, ...rows] = records;
  if (headers === undefined) {
    return [];
  }
  // Data rows start on line 2
  return rows.map((values, position) => new CsvRow(fileName, headers, values, position + 2));
}
