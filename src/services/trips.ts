/**
 * TripService: public reads and owner-only writes.
 *
 * Update and delete load the trip first (NotFound), then check ownership
 * (PermissionDenied), and only then touch storage.
 */

import type { Identity, NewTrip, Trip, TripChanges, TripDetail, TripSummary } from "../types";
import type { TripStorage } from "../storage/trips";
import { assertOwnership } from "../auth/ownership";
import { NotFoundError } from "../api/errors";
import { ctxLogger } from "../api/request-context";

const RESOURCE = "trip";

export function toSummary(trip: Trip): TripSummary {
  return {
    id: trip.id,
    title: trip.title,
    description: trip.description,
    photos: trip.photos,
    tags: trip.tags,
  };
}

export class TripService {
  constructor(private readonly trips: TripStorage) {}

  listTrips(): TripSummary[] {
    return this.trips.listAll().map(toSummary);
  }

  searchTrips(query: string): TripSummary[] {
    return this.trips.search(query).map(toSummary);
  }

  getTrip(id: number): TripDetail {
    const trip = this.trips.findById(id);
    if (!trip) {
      throw new NotFoundError("Trip", id);
    }
    return trip;
  }

  listMine(identity: Identity): TripDetail[] {
    return this.trips.findByAuthor(identity.userId);
  }

  createTrip(identity: Identity, trip: NewTrip): TripDetail {
    const created = this.trips.create(identity.userId, trip);
    ctxLogger.info("Trip created", { tripId: created.id });
    return this.getTrip(created.id);
  }

  updateTrip(identity: Identity, id: number, changes: TripChanges): TripDetail {
    const existing = this.getTrip(id);
    assertOwnership(identity, existing, "update", RESOURCE, id, "You can only edit your own trips");

    if (!this.trips.update(id, changes)) {
      // Deleted between the read and the write
      throw new NotFoundError("Trip", id);
    }
    ctxLogger.info("Trip updated", { tripId: id });
    return this.getTrip(id);
  }

  deleteTrip(identity: Identity, id: number): void {
    const existing = this.getTrip(id);
    assertOwnership(identity, existing, "delete", RESOURCE, id, "You can only delete your own trips");

    if (!this.trips.delete(id)) {
      throw new NotFoundError("Trip", id);
    }
    ctxLogger.info("Trip deleted", { tripId: id });
  }
}
