/**
 * Stop Checks Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  duplicateStopsCheck,
  normalizeStopName,
  stopParentCheck,
  unusedStopCheck,
} from '../../../validators/stops.js';
import { kindsOf, runCheck } from '../../utils/checks.js';
import { BASE_LAT, cleanFeedFixture, createStop, type FeedFixture } from '../../utils/fixtures.js';

function withStops(...extra: ReturnType<typeof createStop>[]): FeedFixture {
  const fixture = cleanFeedFixture();
  return { ...fixture, stops: [...(fixture.stops ?? []), ...extra] };
}

describe('unusedStopCheck', () => {
  it('reports a stop no trip serves', () => {
    const issues = runCheck(unusedStopCheck, withStops(createStop('S3', { latitude: BASE_LAT + 0.01 })));

    expect(issues).toEqual([
      {
        severity: 'Information',
        kind: 'UnusedStop',
        objectId: 'S3',
        objectType: 'stop',
        objectName: 'Stop S3',
        relatedObjects: [],
        details: 'The stop is not used by any trip',
      },
    ]);
  });

  it('counts the parent of a served stop as used', () => {
    const fixture = cleanFeedFixture();
    const issues = runCheck(unusedStopCheck, {
      ...fixture,
      stops: [
        createStop('ST', { locationType: 'stop-area' }),
        createStop('S1', { parentStation: 'ST' }),
        createStop('S2', { longitude: 2.3622 }),
      ],
    });

    expect(issues).toEqual([]);
  });

  it('counts stops linked by a pathway as used', () => {
    const issues = runCheck(unusedStopCheck, {
      ...withStops(createStop('E1', { locationType: 'generic-node' })),
      pathways: [{ id: 'P1', fromStopId: 'S1', toStopId: 'E1', mode: 1, isBidirectional: true }],
    });

    expect(issues).toEqual([]);
  });

  it('stops climbing at a parent cycle', () => {
    const issues = runCheck(unusedStopCheck, {
      ...cleanFeedFixture(),
      stops: [
        createStop('S1', { parentStation: 'S2' }),
        createStop('S2', { parentStation: 'S1', longitude: 2.3622 }),
      ],
    });

    expect(issues).toEqual([]);
  });
});

describe('normalizeStopName', () => {
  it('folds case and collapses whitespace', () => {
    expect(normalizeStopName('  Gare   du\tNord ')).toBe('gare du nord');
  });
});

describe('duplicateStopsCheck', () => {
  it('finds nothing in a clean feed', () => {
    expect(runCheck(duplicateStopsCheck, cleanFeedFixture())).toEqual([]);
  });

  it('reports same-name stop points closer than two meters', () => {
    const issues = runCheck(
      duplicateStopsCheck,
      withStops(createStop('S3', { name: 'gare  centrale', latitude: BASE_LAT + 0.00001 }))
    );

    expect(issues).toEqual([
      {
        severity: 'Information',
        kind: 'DuplicateStops',
        objectId: 'S1',
        objectType: 'stop',
        objectName: 'Gare Centrale',
        relatedObjects: [{ id: 'S3', objectType: 'stop', name: 'gare  centrale' }],
      },
    ]);
  });

  it('uses the wider threshold for stop areas', () => {
    const issues = runCheck(duplicateStopsCheck, {
      ...cleanFeedFixture(),
      stops: [
        createStop('A1', { name: 'Nation', locationType: 'stop-area' }),
        createStop('A2', { name: 'Nation', locationType: 'stop-area', latitude: BASE_LAT + 0.0005 }),
        createStop('A3', { name: 'Nation', locationType: 'stop-area', latitude: BASE_LAT + 0.003 }),
      ],
    });

    expect(issues.map(issue => [issue.objectId, issue.relatedObjects[0].id])).toEqual([['A1', 'A2']]);
  });

  it('ignores stops of different location types and entrances', () => {
    const issues = runCheck(duplicateStopsCheck, {
      ...cleanFeedFixture(),
      stops: [
        createStop('S1', { name: 'Nation' }),
        createStop('ST', { name: 'Nation', locationType: 'stop-area' }),
        createStop('E1', { name: 'Nation', locationType: 'station-entrance' }),
        createStop('E2', { name: 'Nation', locationType: 'station-entrance' }),
      ],
    });

    expect(issues).toEqual([]);
  });

  it('ignores stops without coordinates', () => {
    const issues = runCheck(duplicateStopsCheck, {
      ...cleanFeedFixture(),
      stops: [createStop('S1'), createStop('S3', { latitude: undefined, longitude: undefined })],
    });

    expect(issues).toEqual([]);
  });
});

describe('stopParentCheck', () => {
  it('accepts stop points inside a station', () => {
    const issues = runCheck(stopParentCheck, {
      ...cleanFeedFixture(),
      stops: [
        createStop('ST', { locationType: 'stop-area' }),
        createStop('S1', { parentStation: 'ST' }),
        createStop('B1', { locationType: 'boarding-area', parentStation: 'S1' }),
      ],
    });

    expect(issues).toEqual([]);
  });

  it('rejects a station with a parent', () => {
    const issues = runCheck(stopParentCheck, {
      ...cleanFeedFixture(),
      stops: [createStop('ST', { locationType: 'stop-area', parentStation: 'OTHER' })],
    });

    expect(issues).toHaveLength(1);
    expect(issues[0].details).toBe('A station cannot have a parent station');
    expect(issues[0].relatedObjects).toEqual([{ id: 'OTHER', objectType: 'stop' }]);
  });

  it('rejects a parent of the wrong location type', () => {
    const issues = runCheck(stopParentCheck, {
      ...cleanFeedFixture(),
      stops: [createStop('S1'), createStop('S2', { parentStation: 'S1' })],
    });

    expect(kindsOf(issues)).toEqual(['InvalidStopParent']);
    expect(issues[0].objectId).toBe('S2');
    expect(issues[0].details).toBe('The parent of a stop-point must be a stop-area, not a stop-point');
  });

  it('leaves unresolved parents to the reference check', () => {
    const issues = runCheck(stopParentCheck, {
      ...cleanFeedFixture(),
      stops: [createStop('S1', { parentStation: 'NOWHERE' })],
    });

    expect(issues).toEqual([]);
  });
});
