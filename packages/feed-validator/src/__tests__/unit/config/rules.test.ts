/**
 * Rule Configuration Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  customRulesSchema,
  DEFAULT_RULES,
  mergeRules,
  standardModeOf,
  transportModeOf,
  TRANSPORT_MODES,
} from '../../../config/rules.js';

describe('standardModeOf', () => {
  it.each([
    [0, 'tramway'],
    [1, 'subway'],
    [2, 'rail'],
    [3, 'bus'],
    [4, 'ferry'],
    [5, 'cable_car'],
    [6, 'gondola'],
    [7, 'funicular'],
    [109, 'rail'],
    [202, 'coach'],
    [401, 'subway'],
    [715, 'bus'],
    [900, 'tramway'],
    [1000, 'ferry'],
    [1100, 'air'],
    [1300, 'gondola'],
    [1400, 'funicular'],
    [1501, 'taxi'],
  ] as const)('maps route type %i to %s', (routeType, mode) => {
    expect(standardModeOf(routeType)).toBe(mode);
  });

  it.each([8, 11, 12, 99, 300, 800, 1200, 1600, -1])('does not recognize route type %i', routeType => {
    expect(standardModeOf(routeType)).toBeUndefined();
  });

  it('falls back to other for speed ceilings', () => {
    expect(transportModeOf(11)).toBe('other');
    expect(transportModeOf(3)).toBe('bus');
  });
});

describe('DEFAULT_RULES', () => {
  it('has a ceiling for every mode', () => {
    expect(Object.keys(DEFAULT_RULES.maxSpeeds).sort()).toEqual([...TRANSPORT_MODES].sort());
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_RULES)).toBe(true);
    expect(Object.isFrozen(DEFAULT_RULES.maxSpeeds)).toBe(true);
  });
});

describe('mergeRules', () => {
  it('returns the defaults for empty custom rules', () => {
    expect(mergeRules({})).toEqual(DEFAULT_RULES);
  });

  it('overrides only the given thresholds', () => {
    const rules = mergeRules({ max_bus_speed: 150, close_stops_distance: 25 });

    expect(rules.maxSpeeds).toEqual({ ...DEFAULT_RULES.maxSpeeds, bus: 150 });
    expect(rules.closeStopsDistance).toBe(25);
    expect(rules.slowSpeed).toBe(DEFAULT_RULES.slowSpeed);
    expect(Object.isFrozen(rules.maxSpeeds)).toBe(true);
  });

  it('accepts zero distances', () => {
    expect(mergeRules({ null_duration_distance: 0, duplicate_stop_area_distance: 0 })).toMatchObject({
      nullDurationDistance: 0,
      duplicateStopAreaDistance: 0,
    });
  });

  it('merges over the defaults it is given', () => {
    const base = mergeRules({ max_rail_speed: 250 });

    expect(mergeRules({ max_bus_speed: 90 }, base).maxSpeeds).toMatchObject({ rail: 250, bus: 90 });
  });
});

describe('customRulesSchema', () => {
  it('rejects unknown keys', () => {
    expect(customRulesSchema.safeParse({ max_boat_speed: 40 }).success).toBe(false);
  });

  it('rejects non-positive speeds and negative distances', () => {
    expect(customRulesSchema.safeParse({ max_bus_speed: 0 }).success).toBe(false);
    expect(customRulesSchema.safeParse({ close_stops_distance: -1 }).success).toBe(false);
  });

  it('rejects non-numeric values', () => {
    expect(customRulesSchema.safeParse({ max_bus_speed: '150' }).success).toBe(false);
  });
});
