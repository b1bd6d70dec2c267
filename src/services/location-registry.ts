import type { LocationRecord } from '../types';

/**
 * Per-batch set of locations keyed by location id.
 * Append-only; a later record for the same id replaces the earlier one.
 */
export class LocationRegistry {
  private readonly locations = new Map<string, LocationRecord>();

  register(location: LocationRecord): void {
    this.locations.set(location.locationId, location);
  }

  toArray(): LocationRecord[] {
    return [...this.locations.values()].sort((a, b) => a.locationId.localeCompare(b.locationId));
  }
}
