import type { CanonicalRecord, LocationRecord } from '../types';

/**
 * Where canonical records and the batch's locations end up.
 */
export interface RecordSink {
  readonly name: string;
  saveRecord(record: CanonicalRecord, pageIndex: number): Promise<void>;
  saveLocations(batchId: string, locations: LocationRecord[]): Promise<void>;
}
