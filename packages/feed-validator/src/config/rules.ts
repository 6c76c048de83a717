/**
 * Rule Configuration
 *
 * Numeric thresholds used by the checks: one speed ceiling per transport
 * mode plus the distance/speed limits of the kinematic and duplicate-stop
 * checks. Custom rules (snake_case keys, as written in a rules file) are
 * merged over the built-in defaults once, before any check runs.
 *
 * TYPE SAFETY: the merged configuration is frozen and fully populated;
 * checks never deal with optional thresholds.
 */

import { z } from 'zod';

// ============================================================================
// Transport Modes
// ============================================================================

export const TRANSPORT_MODES = [
  'tramway',
  'subway',
  'rail',
  'bus',
  'ferry',
  'cable_car',
  'gondola',
  'funicular',
  'coach',
  'air',
  'taxi',
  'other',
] as const;

export type TransportMode = (typeof TRANSPORT_MODES)[number];

/**
 * Mode of a GTFS route_type, `undefined` when the value is neither a basic
 * nor an extended route type.
 *
 * Basic types 0-7 and the extended ranges of the Google Transit extension.
 * Trolleybus (11) and monorail (12) are not part of the recognized set.
 */
export function standardModeOf(routeType: number): TransportMode | undefined {
  if (routeType === 0 || (routeType >= 900 && routeType <= 999)) return 'tramway';
  if (routeType === 1 || (routeType >= 400 && routeType <= 499)) return 'subway';
  if (routeType === 2 || (routeType >= 100 && routeType <= 199)) return 'rail';
  if (routeType === 3 || (routeType >= 700 && routeType <= 799)) return 'bus';
  if (routeType === 4 || (routeType >= 1000 && routeType <= 1099)) return 'ferry';
  if (routeType === 5) return 'cable_car';
  if (routeType === 6 || (routeType >= 1300 && routeType <= 1399)) return 'gondola';
  if (routeType === 7 || (routeType >= 1400 && routeType <= 1499)) return 'funicular';
  if (routeType >= 200 && routeType <= 299) return 'coach';
  if (routeType >= 1100 && routeType <= 1199) return 'air';
  if (routeType >= 1500 && routeType <= 1599) return 'taxi';
  return undefined;
}

/**
 * Mode used to pick a speed ceiling; unknown route types fall back to `other`
 */
export function transportModeOf(routeType: number): TransportMode {
  return standardModeOf(routeType) ?? 'other';
}

// ============================================================================
// Rule Configuration
// ============================================================================

export interface RuleConfiguration {
  /** Maximum plausible speed per mode, km/h */
  readonly maxSpeeds: Readonly<Record<TransportMode, number>>;

  /** Consecutive stops of a trip closer than this are CloseStops (meters) */
  readonly closeStopsDistance: number;

  /** Segments slower than this are Slow (km/h) */
  readonly slowSpeed: number;

  /** A zero-duration segment longer than this is a NullDuration (meters) */
  readonly nullDurationDistance: number;

  /** Same-name stop points closer than this are DuplicateStops (meters) */
  readonly duplicateStopPointDistance: number;

  /** Same-name stations closer than this are DuplicateStops (meters) */
  readonly duplicateStopAreaDistance: number;
}

export const DEFAULT_RULES: RuleConfiguration = Object.freeze({
  maxSpeeds: Object.freeze({
    tramway: 100,
    subway: 140,
    rail: 320,
    bus: 100,
    ferry: 90, // fastest high-speed craft routes
    cable_car: 30,
    gondola: 45,
    funicular: 40,
    coach: 120,
    air: 1000,
    taxi: 150,
    other: 500,
  }),
  closeStopsDistance: 10,
  slowSpeed: 0.36,
  nullDurationDistance: 0,
  duplicateStopPointDistance: 2,
  duplicateStopAreaDistance: 100,
});

// ============================================================================
// Custom Rules
// ============================================================================

const speed = z.number().positive();
const distance = z.number().nonnegative();

/**
 * Custom rules as written in a rules file
 */
export const customRulesSchema = z
  .object({
    max_tramway_speed: speed.optional(),
    max_subway_speed: speed.optional(),
    max_rail_speed: speed.optional(),
    max_bus_speed: speed.optional(),
    max_ferry_speed: speed.optional(),
    max_cable_car_speed: speed.optional(),
    max_gondola_speed: speed.optional(),
    max_funicular_speed: speed.optional(),
    max_coach_speed: speed.optional(),
    max_air_speed: speed.optional(),
    max_taxi_speed: speed.optional(),
    max_other_speed: speed.optional(),
    close_stops_distance: distance.optional(),
    slow_speed: distance.optional(),
    null_duration_distance: distance.optional(),
    duplicate_stop_point_distance: distance.optional(),
    duplicate_stop_area_distance: distance.optional(),
  })
  .strict();

export type CustomRules = z.infer<typeof customRulesSchema>;

function customSpeed(custom: CustomRules, mode: TransportMode): number | undefined {
  switch (mode) {
    case 'tramway':
      return custom.max_tramway_speed;
    case 'subway':
      return custom.max_subway_speed;
    case 'rail':
      return custom.max_rail_speed;
    case 'bus':
      return custom.max_bus_speed;
    case 'ferry':
      return custom.max_ferry_speed;
    case 'cable_car':
      return custom.max_cable_car_speed;
    case 'gondola':
      return custom.max_gondola_speed;
    case 'funicular':
      return custom.max_funicular_speed;
    case 'coach':
      return custom.max_coach_speed;
    case 'air':
      return custom.max_air_speed;
    case 'taxi':
      return custom.max_taxi_speed;
    case 'other':
      return custom.max_other_speed;
  }
}

/**
 * Merge custom rules over the defaults
 */
export function mergeRules(
  custom: CustomRules = {},
  defaults: RuleConfiguration = DEFAULT_RULES
): RuleConfiguration {
  const maxSpeeds: Record<TransportMode, number> = { ...defaults.maxSpeeds };
  for (const mode of TRANSPORT_MODES) {
    maxSpeeds[mode] = customSpeed(custom, mode) ?? defaults.maxSpeeds[mode];
  }

  return Object.freeze({
    maxSpeeds: Object.freeze(maxSpeeds),
    closeStopsDistance: custom.close_stops_distance ?? defaults.closeStopsDistance,
    slowSpeed: custom.slow_speed ?? defaults.slowSpeed,
    nullDurationDistance: custom.null_duration_distance ?? defaults.nullDurationDistance,
    duplicateStopPointDistance:
      custom.duplicate_stop_point_distance ?? defaults.duplicateStopPointDistance,
    duplicateStopAreaDistance:
      custom.duplicate_stop_area_distance ?? defaults.duplicateStopAreaDistance,
  });
}
