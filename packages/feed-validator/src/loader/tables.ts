/**
 * Table Decoders
 *
 * One decoder per GTFS table, turning a CSV row into a typed record.
 * Identifiers are kept as text even when empty; an empty identifier is a
 * MissingId issue, not a decoding failure.
 */

import type {
  Availability,
  BikesAllowed,
  ExceptionType,
  LocationType,
  PickupDropOffType,
  TableName,
  TableRecords,
} from '../core/types/feed.js';
import type { CsvRow } from './csv.js';

// =============================================================================
// Coded Values
// =============================================================================

const LOCATION_TYPES: Readonly<Record<string, LocationType>> = {
  '0': 'stop-point',
  '1': 'stop-area',
  '2': 'station-entrance',
  '3': 'generic-node',
  '4': 'boarding-area',
};

const AVAILABILITY: Readonly<Record<string, Availability>> = {
  '0': 'unknown',
  '1': 'available',
  '2': 'not-available',
};

const BIKES_ALLOWED: Readonly<Record<string, BikesAllowed>> = {
  '0': 'no-info',
  '1': 'allowed',
  '2': 'not-allowed',
};

const PICKUP_DROP_OFF: Readonly<Record<string, PickupDropOffType>> = {
  '0': 'regular',
  '1': 'none',
  '2': 'arrange-by-phone',
  '3': 'coordinate-with-driver',
};

const EXCEPTION_TYPES: Readonly<Record<string, ExceptionType>> = {
  '1': 'added',
  '2': 'removed',
};

const FLAGS: Readonly<Record<string, boolean>> = {
  '0': false,
  '1': true,
};

function weekday(row: CsvRow, field: string): boolean {
  const value = row.required(field);
  if (!Object.hasOwn(FLAGS, value)) {
    return row.fail(`invalid value '${value}' for ${field}`);
  }
  return FLAGS[value];
}

// =============================================================================
// Decoders
// =============================================================================

export type TableDecoder<K extends TableName> = (row: CsvRow) => TableRecords[K];

export const TABLE_DECODERS: { readonly [K in TableName]: TableDecoder<K> } = {
  agency: row => ({
    id: row.optional('agency_id'),
    name: row.text('agency_name'),
    url: row.text('agency_url'),
    timezone: row.text('agency_timezone'),
    lang: row.optional('agency_lang'),
    phone: row.optional('agency_phone'),
  }),

  stops: row => ({
    id: row.text('stop_id'),
    code: row.optional('stop_code'),
    name: row.text('stop_name'),
    latitude: row.float('stop_lat'),
    longitude: row.float('stop_lon'),
    locationType: row.code('location_type', LOCATION_TYPES, 'stop-point'),
    parentStation: row.optional('parent_station'),
    wheelchairBoarding: row.code('wheelchair_boarding', AVAILABILITY, 'unknown'),
    platformCode: row.optional('platform_code'),
  }),

  routes: row => ({
    id: row.text('route_id'),
    agencyId: row.optional('agency_id'),
    shortName: row.text('route_short_name'),
    longName: row.text('route_long_name'),
    routeType: row.requiredInteger('route_type'),
    color: row.optional('route_color'),
    textColor: row.optional('route_text_color'),
    continuousPickup: row.optionalCode('continuous_pickup', PICKUP_DROP_OFF),
    continuousDropOff: row.optionalCode('continuous_drop_off', PICKUP_DROP_OFF),
  }),

  trips: row => ({
    id: row.text('trip_id'),
    routeId: row.text('route_id'),
    serviceId: row.text('service_id'),
    shapeId: row.optional('shape_id'),
    headsign: row.optional('trip_headsign'),
    wheelchairAccessible: row.code('wheelchair_accessible', AVAILABILITY, 'unknown'),
    bikesAllowed: row.code('bikes_allowed', BIKES_ALLOWED, 'no-info'),
  }),

  stop_times: row => ({
    tripId: row.text('trip_id'),
    stopId: row.text('stop_id'),
    stopSequence: row.requiredInteger('stop_sequence'),
    arrivalTime: row.time('arrival_time'),
    departureTime: row.time('departure_time'),
    pickupType: row.code('pickup_type', PICKUP_DROP_OFF, 'regular'),
    dropOffType: row.code('drop_off_type', PICKUP_DROP_OFF, 'regular'),
    continuousPickup: row.optionalCode('continuous_pickup', PICKUP_DROP_OFF),
    continuousDropOff: row.optionalCode('continuous_drop_off', PICKUP_DROP_OFF),
    shapeDistTraveled: row.float('shape_dist_traveled'),
  }),

  calendar: row => ({
    id: row.text('service_id'),
    monday: weekday(row, 'monday'),
    tuesday: weekday(row, 'tuesday'),
    wednesday: weekday(row, 'wednesday'),
    thursday: weekday(row, 'thursday'),
    friday: weekday(row, 'friday'),
    saturday: weekday(row, 'saturday'),
    sunday: weekday(row, 'sunday'),
    startDate: row.requiredDate('start_date'),
    endDate: row.requiredDate('end_date'),
  }),

  calendar_dates: row => ({
    serviceId: row.text('service_id'),
    date: row.requiredDate('date'),
    exceptionType: row.code('exception_type', EXCEPTION_TYPES, 'added'),
  }),

  shapes: row => ({
    id: row.text('shape_id'),
    latitude: row.requiredFloat('shape_pt_lat'),
    longitude: row.requiredFloat('shape_pt_lon'),
    sequence: row.requiredInteger('shape_pt_sequence'),
    distTraveled: row.float('shape_dist_traveled'),
  }),

  fare_attributes: row => ({
    id: row.text('fare_id'),
    price: row.text('price'),
    currency: row.text('currency_type'),
    paymentMethod: row.integer('payment_method'),
    transfers: row.integer('transfers'),
    agencyId: row.optional('agency_id'),
    transferDuration: row.integer('transfer_duration'),
  }),

  fare_rules: row => ({
    fareId: row.text('fare_id'),
    routeId: row.optional('route_id'),
    originId: row.optional('origin_id'),
    destinationId: row.optional('destination_id'),
    containsId: row.optional('contains_id'),
  }),

  feed_info: row => ({
    publisherName: row.text('feed_publisher_name'),
    publisherUrl: row.text('feed_publisher_url'),
    lang: row.text('feed_lang'),
    defaultLang: row.optional('default_lang'),
    startDate: row.date('feed_start_date'),
    endDate: row.date('feed_end_date'),
    version: row.optional('feed_version'),
  }),

  pathways: row => ({
    id: row.text('pathway_id'),
    fromStopId: row.text('from_stop_id'),
    toStopId: row.text('to_stop_id'),
    mode: row.requiredInteger('pathway_mode'),
    isBidirectional: row.code('is_bidirectional', FLAGS, false),
  }),
};
