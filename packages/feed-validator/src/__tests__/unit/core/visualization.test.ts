/**
 * Issue Geometry Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ModelIndex } from '../../../core/model-index.js';
import { createIssue } from '../../../core/types/issues.js';
import { addIssueGeometry } from '../../../core/visualization.js';
import { BASE_LAT, BASE_LON, buildRawFeed, cleanFeedFixture, createStop } from '../../utils/fixtures.js';

const index = ModelIndex.build(buildRawFeed(cleanFeedFixture()));

describe('addIssueGeometry', () => {
  it('draws the subject stop, related stops and shapes, then the details', () => {
    const issue = createIssue('CloseStops', 'S1', {
      objectType: 'stop',
      relatedObjects: [
        { id: 'S2', objectType: 'stop' },
        { id: 'T1', objectType: 'trip' },
        { id: 'SH1', objectType: 'shape' },
      ],
      details: 'The stops are 3.2 meters apart',
    });

    const features = addIssueGeometry(issue, index).geojson?.features ?? [];

    expect(features.map(feature => feature.geometry?.type ?? null)).toEqual([
      'Point',
      'Point',
      'LineString',
      null,
    ]);
    expect(features[0].geometry).toEqual({ type: 'Point', coordinates: [BASE_LON, BASE_LAT] });
    expect(features[0].properties).toEqual({ id: 'S1', name: 'Gare Centrale' });
    expect(features[2].properties).toEqual({ id: 'SH1' });
    expect(features[3]).toEqual({
      type: 'Feature',
      geometry: null,
      properties: { details: 'The stops are 3.2 meters apart' },
    });
  });

  it('uses null details when the issue has none', () => {
    const issue = createIssue('UnusedStop', 'S1', { objectType: 'stop' });
    const features = addIssueGeometry(issue, index).geojson?.features ?? [];

    expect(features.at(-1)?.properties).toEqual({ details: null });
  });

  it('leaves an issue without drawable objects unchanged', () => {
    const issue = createIssue('NoShape', 'T1', { objectType: 'trip' });

    expect(addIssueGeometry(issue, index)).toBe(issue);
  });

  it('skips stops without coordinates and unknown ids', () => {
    const sparse = ModelIndex.build(
      buildRawFeed({ stops: [createStop('S1', { latitude: undefined, longitude: undefined })] })
    );
    const issue = createIssue('MissingCoordinates', 'S1', {
      objectType: 'stop',
      relatedObjects: [{ id: 'S404', objectType: 'stop' }],
    });

    expect(addIssueGeometry(issue, sparse).geojson).toBeUndefined();
  });
});
