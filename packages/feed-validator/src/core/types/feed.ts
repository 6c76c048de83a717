/**
 * Raw Feed Types
 *
 * Typed records for every GTFS table the validator reads, as produced by the
 * loader. Each table is wrapped in a RawTable so a broken or absent file does
 * not prevent the rest of the feed from being inspected.
 *
 * Records are plain immutable data. Relationships are expressed as identifier
 * fields only; the ModelIndex turns them into lookups.
 */

// ============================================================================
// Enumerations
// ============================================================================

/**
 * GTFS `location_type`
 */
export type LocationType =
  | 'stop-point'
  | 'stop-area'
  | 'station-entrance'
  | 'generic-node'
  | 'boarding-area';

/**
 * Wheelchair boarding / accessibility flag (0, 1, 2)
 */
export type Availability = 'unknown' | 'available' | 'not-available';

/**
 * GTFS `bikes_allowed`
 */
export type BikesAllowed = 'no-info' | 'allowed' | 'not-allowed';

/**
 * Pickup / drop-off behaviour, shared by `pickup_type`, `drop_off_type`
 * and the `continuous_*` fields.
 */
export type PickupDropOffType =
  | 'regular'
  | 'none'
  | 'arrange-by-phone'
  | 'coordinate-with-driver';

/**
 * GTFS `exception_type` in calendar_dates.txt
 */
export type ExceptionType = 'added' | 'removed';

// ============================================================================
// Records
// ============================================================================

export interface Agency {
  /** Optional when the feed has a single agency */
  readonly id?: string;
  readonly name: string;
  readonly url: string;
  readonly timezone: string;
  readonly lang?: string;
  readonly phone?: string;
}

export interface Stop {
  readonly id: string;
  readonly code?: string;
  readonly name: string;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly locationType: LocationType;
  readonly parentStation?: string;
  readonly wheelchairBoarding: Availability;
  readonly platformCode?: string;
}

export interface Route {
  readonly id: string;
  readonly agencyId?: string;
  readonly shortName: string;
  readonly longName: string;
  /** Raw `route_type`; basic (0-7) or extended (100-1702) values */
  readonly routeType: number;
  /** Hex color without `#` */
  readonly color?: string;
  readonly textColor?: string;
  readonly continuousPickup?: PickupDropOffType;
  readonly continuousDropOff?: PickupDropOffType;
}

export interface Trip {
  readonly id: string;
  readonly routeId: string;
  readonly serviceId: string;
  readonly shapeId?: string;
  readonly headsign?: string;
  readonly wheelchairAccessible: Availability;
  readonly bikesAllowed: BikesAllowed;
}

export interface StopTime {
  readonly tripId: string;
  readonly stopId: string;
  readonly stopSequence: number;
  /** Seconds after midnight of the service day (can exceed 24h) */
  readonly arrivalTime?: number;
  readonly departureTime?: number;
  readonly pickupType: PickupDropOffType;
  readonly dropOffType: PickupDropOffType;
  readonly continuousPickup?: PickupDropOffType;
  readonly continuousDropOff?: PickupDropOffType;
  readonly shapeDistTraveled?: number;
}

export interface Calendar {
  /** The service_id */
  readonly id: string;
  readonly monday: boolean;
  readonly tuesday: boolean;
  readonly wednesday: boolean;
  readonly thursday: boolean;
  readonly friday: boolean;
  readonly saturday: boolean;
  readonly sunday: boolean;
  /** YYYYMMDD */
  readonly startDate: string;
  /** YYYYMMDD */
  readonly endDate: string;
}

export interface CalendarDate {
  readonly serviceId: string;
  /** YYYYMMDD */
  readonly date: string;
  readonly exceptionType: ExceptionType;
}

export interface ShapePoint {
  /** The shape_id this point belongs to */
  readonly id: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly sequence: number;
  readonly distTraveled?: number;
}

export interface FareAttribute {
  readonly id: string;
  /** Kept as text: an empty price is an issue, not a parse failure */
  readonly price: string;
  readonly currency: string;
  readonly paymentMethod?: number;
  /** undefined means unlimited transfers */
  readonly transfers?: number;
  readonly agencyId?: string;
  /** Seconds */
  readonly transferDuration?: number;
}

export interface FareRule {
  readonly fareId: string;
  readonly routeId?: string;
  readonly originId?: string;
  readonly destinationId?: string;
  readonly containsId?: string;
}

export interface FeedInfo {
  readonly publisherName: string;
  readonly publisherUrl: string;
  readonly lang: string;
  readonly defaultLang?: string;
  readonly startDate?: string;
  readonly endDate?: string;
  readonly version?: string;
}

export interface Pathway {
  readonly id: string;
  readonly fromStopId: string;
  readonly toStopId: string;
  readonly mode: number;
  readonly isBidirectional: boolean;
}

// ============================================================================
// Tables
// ============================================================================

/**
 * Record type of each table, keyed by table name
 */
export interface TableRecords {
  readonly agency: Agency;
  readonly stops: Stop;
  readonly routes: Route;
  readonly trips: Trip;
  readonly stop_times: StopTime;
  readonly calendar: Calendar;
  readonly calendar_dates: CalendarDate;
  readonly shapes: ShapePoint;
  readonly fare_attributes: FareAttribute;
  readonly fare_rules: FareRule;
  readonly feed_info: FeedInfo;
  readonly pathways: Pathway;
}

export type TableName = keyof TableRecords;

export const TABLE_NAMES = [
  'agency',
  'stops',
  'routes',
  'trips',
  'stop_times',
  'calendar',
  'calendar_dates',
  'shapes',
  'fare_attributes',
  'fare_rules',
  'feed_info',
  'pathways',
] as const satisfies readonly TableName[];

/**
 * Tables without which the model cannot be linked
 */
export const MANDATORY_TABLES: readonly TableName[] = [
  'agency',
  'stops',
  'routes',
  'trips',
  'stop_times',
];

export function tableFileName(table: TableName): string {
  return `${table}.txt`;
}

/**
 * Where a table failed to decode
 */
export interface TableLoadError {
  readonly fileName: string;
  readonly message: string;
  readonly lineNumber?: number;
  readonly headers?: readonly string[];
  readonly values?: readonly string[];
}

export type RawTable<T> =
  | { readonly status: 'loaded'; readonly records: readonly T[] }
  | { readonly status: 'missing' }
  | { readonly status: 'failed'; readonly error: TableLoadError };

/**
 * The whole feed as handed over by the loader
 */
export interface RawFeed {
  /** Every file path found in the archive, relative to its root */
  readonly files: readonly string[];
  readonly tables: { readonly [K in TableName]: RawTable<TableRecords[K]> };
}

/**
 * Records of a table, or nothing when it did not load
 */
export function recordsOf<T>(table: RawTable<T>): readonly T[] {
  return table.status === 'loaded' ? table.records : [];
}
