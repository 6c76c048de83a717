/**
 * Shape Checks
 *
 * Trips must point at shapes that exist; shapes nobody points at and trips
 * without any shape are reported for information.
 */

import { subject, tripRef } from '../core/objects.js';
import { createIssue } from '../core/types/issues.js';
import type { Check } from '../core/types/validators.js';

export const shapesCheck: Check = {
  name: 'shapes',
  requires: ['trips', 'shapes'],
  domain: 'InvalidShapeId',
  *run(index) {
    const usedShapes = new Set<string>();

    for (const trip of index.trips.values()) {
      if (trip.shapeId === undefined) {
        yield createIssue('NoShape', trip.id, {
          ...subject(tripRef(trip)),
          details: 'The trip has no shape',
        });
        continue;
      }

      usedShapes.add(trip.shapeId);
      if (!index.shapes.has(trip.shapeId)) {
        yield createIssue('InvalidShapeId', trip.id, {
          ...subject(tripRef(trip)),
          relatedObjects: [{ id: trip.shapeId, objectType: 'shape' }],
          details: `The shape ${trip.shapeId} does not exist`,
        });
      }
    }

    for (const shape of index.shapes.values()) {
      if (!usedShapes.has(shape.id)) {
        yield createIssue('UnusedShapeId', shape.id, {
          objectType: 'shape',
          details: 'The shape is not used by any trip',
        });
      }
    }
  },
};
