/**
 * Display names and issue references for feed objects
 */

import type { Agency, FeedInfo, Route, Stop, Trip } from './types/feed.js';
import type { IssueOptions, RelatedObject } from './types/issues.js';

export function routeName(route: Route): string {
  return [route.shortName, route.longName].filter(part => part.length > 0).join(' ');
}

export function tripName(trip: Trip): string {
  return `route id: ${trip.routeId}, service id: ${trip.serviceId}`;
}

export function stopRef(stop: Stop): RelatedObject {
  return { id: stop.id, objectType: 'stop', name: stop.name };
}

export function routeRef(route: Route): RelatedObject {
  return { id: route.id, objectType: 'route', name: routeName(route) };
}

export function tripRef(trip: Trip): RelatedObject {
  return { id: trip.id, objectType: 'trip', name: tripName(trip) };
}

export function agencyRef(agency: Agency): RelatedObject {
  return { id: agency.id ?? '', objectType: 'agency', name: agency.name };
}

export function feedInfoRef(feedInfo: FeedInfo): RelatedObject {
  return { id: '', objectType: 'feed-info', name: feedInfo.publisherName };
}

/**
 * Subject fields of an issue about the referenced object
 */
export function subject(ref: RelatedObject): Pick<IssueOptions, 'objectType' | 'objectName'> {
  return { objectType: ref.objectType, objectName: ref.name };
}
