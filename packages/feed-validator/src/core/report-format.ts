/**
 * Report Formats
 *
 * Serializes a Report as compact JSON, indented JSON or YAML, and reads one
 * back. A parsed report is checked against a zod schema, including that
 * every issue's severity is the one its kind carries.
 */

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { TRANSPORT_MODES } from '../config/rules.js';
import type { Report } from './engine.js';
import { ReportParseError } from './errors.js';
import { isIssueKind, SEVERITIES, severityOf } from './types/issues.js';

export const REPORT_FORMATS = ['json', 'pretty-json', 'yaml'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some(format => format === value);
}

export function formatReport(report: Report, format: ReportFormat = 'json'): string {
  switch (format) {
    case 'json':
      return JSON.stringify(report);
    case 'pretty-json':
      return JSON.stringify(report, null, 2);
    case 'yaml':
      return stringifyYaml(report);
  }
}

// ============================================================================
// Schema
// ============================================================================

const relatedObjectSchema = z.object({
  id: z.string(),
  objectType: z
    .enum(['agency', 'stop', 'route', 'trip', 'calendar', 'shape', 'fare', 'feed-info', 'stop-time', 'file'])
    .optional(),
  name: z.string().optional(),
});

const relatedFileSchema = z.object({
  fileName: z.string(),
  line: z
    .object({
      lineNumber: z.number().int(),
      headers: z.array(z.string()),
      values: z.array(z.string()),
    })
    .optional(),
});

const geometrySchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(
    z.object({
      type: z.literal('Feature'),
      geometry: z.object({ type: z.string() }).passthrough().nullable(),
      properties: z.record(z.unknown()).nullable(),
    })
  ),
});

const issueSchema = z
  .object({
    severity: z.enum(SEVERITIES),
    kind: z.string().refine(isIssueKind, kind => ({ message: `Unknown issue kind '${kind}'` })),
    objectId: z.string(),
    objectType: relatedObjectSchema.shape.objectType,
    objectName: z.string().optional(),
    relatedObjects: z.array(relatedObjectSchema),
    details: z.string().optional(),
    relatedFile: relatedFileSchema.optional(),
    geojson: geometrySchema.optional(),
  })
  .superRefine((issue, ctx) => {
    if (isIssueKind(issue.kind) && severityOf(issue.kind) !== issue.severity) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['severity'],
        message: `${issue.kind} is always ${severityOf(issue.kind)}, not ${issue.severity}`,
      });
    }
  });

const dateRangeSchema = z.object({ start: z.string(), end: z.string() });

const metadataSchema = z.object({
  startDate: z.string().nullable(),
  endDate: z.string().nullable(),
  stopsCount: z.number().int().nonnegative(),
  stopAreasCount: z.number().int().nonnegative(),
  stopPointsCount: z.number().int().nonnegative(),
  stopsWithWheelchairInfoCount: z.number().int().nonnegative().nullable(),
  linesCount: z.number().int().nonnegative(),
  tripsCount: z.number().int().nonnegative(),
  tripsWithBikeInfoCount: z.number().int().nonnegative(),
  tripsWithWheelchairInfoCount: z.number().int().nonnegative(),
  networks: z.array(z.string()),
  networksStartEndDates: z.record(dateRangeSchema.nullable()).nullable(),
  modes: z.array(z.enum(TRANSPORT_MODES)),
  issuesCount: z.record(z.number().int().nonnegative()),
  hasFares: z.boolean(),
  hasShapes: z.boolean(),
  hasPathways: z.boolean(),
  linesWithCustomColorCount: z.number().int().nonnegative(),
  someStopsNeedPhoneAgency: z.boolean(),
  someStopsNeedPhoneDriver: z.boolean(),
  validatorVersion: z.string(),
});

export const reportSchema = z.object({
  metadata: metadataSchema.nullable(),
  validations: z.record(z.array(issueSchema)),
});

export type ReportDocument = z.infer<typeof reportSchema>;

/**
 * Read a report written by formatReport, in any of its formats
 */
export function parseReport(text: string): ReportDocument {
  let document: unknown;
  try {
    // YAML 1.2 is a superset of JSON
    document = parseYaml(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReportParseError(`Report is neither JSON nor YAML: ${message}`);
  }

  const result = reportSchema.safeParse(document);
  if (!result.success) {
    throw new ReportParseError(
      'Report does not match the report schema',
      result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
