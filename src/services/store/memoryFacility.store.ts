import { EMPTY_METADATA } from "../../schemas/facility.schemas";
import type { FacilityRecord } from "../../types/facility.types";
import type { RemoteSnapshot, StoreMetadata } from "../../types/sync.types";
import type { FacilityStore, StoreHealth } from "./facility.store";

/**
 * Process-local store. Values are cloned on the way in and out so callers can
 * never mutate what is stored.
 */
export class MemoryFacilityStore implements FacilityStore {
  private facilities = new Map<string, FacilityRecord[]>();
  private snapshots = new Map<string, RemoteSnapshot>();
  private tombstones = new Map<string, Set<string>>();
  private metadata: StoreMetadata = structuredClone(EMPTY_METADATA);

  async getFacilities(locationCode: string): Promise<FacilityRecord[]> {
    return structuredClone(this.facilities.get(locationCode) ?? []);
  }

  async replaceFacilities(locationCode: string, records: FacilityRecord[]): Promise<void> {
    this.facilities.set(locationCode, structuredClone(records));
  }

  async listLocations(): Promise<string[]> {
    return [...this.facilities.keys()].sort();
  }

  async getMetadata(): Promise<StoreMetadata> {
    return structuredClone(this.metadata);
  }

  async saveMetadata(metadata: StoreMetadata): Promise<void> {
    this.metadata = structuredClone(metadata);
  }

  async getRemoteSnapshot(locationCode: string): Promise<RemoteSnapshot | null> {
    const snapshot = this.snapshots.get(locationCode);
    return snapshot ? structuredClone(snapshot) : null;
  }

  async saveRemoteSnapshot(locationCode: string, snapshot: RemoteSnapshot): Promise<void> {
    this.snapshots.set(locationCode, structuredClone(snapshot));
  }

  async clearRemoteSnapshots(): Promise<number> {
    const cleared = this.snapshots.size;
    this.snapshots.clear();
    return cleared;
  }

  async getTombstones(locationCode: string): Promise<string[]> {
    return [...(this.tombstones.get(locationCode) ?? [])];
  }

  async addTombstone(locationCode: string, remoteIdentifier: string): Promise<void> {
    const ids = this.tombstones.get(locationCode) ?? new Set<string>();
    ids.add(remoteIdentifier);
    this.tombstones.set(locationCode, ids);
  }

  async removeTombstone(locationCode: string, remoteIdentifier: string): Promise<void> {
    this.tombstones.get(locationCode)?.delete(remoteIdentifier);
  }

  async healthCheck(): Promise<StoreHealth> {
    return { status: "healthy", latency: 0, timestamp: new Date() };
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
