/**
 * Issue Geometry
 *
 * GeoJSON attached to issues so they can be drawn on a map: a Point for each
 * stop the issue references (subject or related) and a LineString for each
 * shape. When there is any geometry, a final feature without geometry
 * carries the issue details.
 */

import * as turf from '@turf/turf';
import type { Feature, Geometry } from 'geojson';
import type { ModelIndex } from './model-index.js';
import { withGeometry, type Issue, type RelatedObject } from './types/issues.js';

type IssueFeature = Feature<Geometry | null>;

function stopFeature(index: ModelIndex, id: string): IssueFeature | undefined {
  const stop = index.stops.get(id);
  if (stop?.latitude === undefined || stop.longitude === undefined) {
    return undefined;
  }
  return turf.point([stop.longitude, stop.latitude], { id: stop.id, name: stop.name });
}

function shapeFeature(index: ModelIndex, id: string): IssueFeature | undefined {
  const shape = index.shapes.get(id);
  // A LineString needs two positions
  if (shape === undefined || shape.points.length < 2) {
    return undefined;
  }
  return turf.lineString(
    shape.points.map(point => [point.longitude, point.latitude]),
    { id: shape.id }
  );
}

function featureOf(index: ModelIndex, ref: RelatedObject): IssueFeature | undefined {
  switch (ref.objectType) {
    case 'stop':
      return stopFeature(index, ref.id);
    case 'shape':
      return shapeFeature(index, ref.id);
    default:
      return undefined;
  }
}

/**
 * Attach geometry to an issue, or return it unchanged when it references
 * nothing that can be drawn
 */
export function addIssueGeometry<I extends Issue>(issue: I, index: ModelIndex): I {
  const refs: RelatedObject[] = [];
  if (issue.objectType !== undefined) {
    refs.push({ id: issue.objectId, objectType: issue.objectType });
  }
  refs.push(...issue.relatedObjects);

  const features: IssueFeature[] = [];
  for (const ref of refs) {
    const feature = featureOf(index, ref);
    if (feature !== undefined) {
      features.push(feature);
    }
  }
  if (features.length === 0) {
    return issue;
  }

  features.push({
    type: 'Feature',
    geometry: null,
    properties: { details: issue.details ?? null },
  });
  return withGeometry(issue, { type: 'FeatureCollection', features });
}
