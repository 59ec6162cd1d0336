import type { FacilityRecord } from "../../types/facility.types";
import type { RemoteSnapshot, StoreMetadata } from "../../types/sync.types";

export interface StoreHealth {
  status: "healthy" | "unhealthy";
  latency?: number;
  error?: string;
  timestamp: Date;
}

/**
 * Durable per-location persistence of merged facility collections.
 *
 * `replaceFacilities` swaps a location's whole collection in one write; there
 * is no field-level update, so readers never observe a half-merged record.
 */
export interface FacilityStore {
  getFacilities(locationCode: string): Promise<FacilityRecord[]>;
  replaceFacilities(locationCode: string, records: FacilityRecord[]): Promise<void>;
  listLocations(): Promise<string[]>;

  getMetadata(): Promise<StoreMetadata>;
  saveMetadata(metadata: StoreMetadata): Promise<void>;

  getRemoteSnapshot(locationCode: string): Promise<RemoteSnapshot | null>;
  saveRemoteSnapshot(locationCode: string, snapshot: RemoteSnapshot): Promise<void>;
  /** Drops every cached remote batch; returns how many locations had one */
  clearRemoteSnapshots(): Promise<number>;

  /** Remote ids deleted locally whose remote delete is still outstanding */
  getTombstones(locationCode: string): Promise<string[]>;
  addTombstone(locationCode: string, remoteIdentifier: string): Promise<void>;
  removeTombstone(locationCode: string, remoteIdentifier: string): Promise<void>;

  healthCheck(): Promise<StoreHealth>;
  close(): Promise<void>;
}
