import type { LocationSyncStatus, StoreMetadata } from "../../types/sync.types";
import type { KeyedMutex } from "../sync/keyedMutex";
import type { FacilityStore } from "./facility.store";

// Not a valid location code, so never contends with a location lock
const METADATA_LOCK = "#metadata";

/**
 * Read-modify-write of the single metadata record, serialized across callers
 */
export async function updateMetadata(
  store: FacilityStore,
  locks: KeyedMutex,
  update: (metadata: StoreMetadata) => StoreMetadata,
): Promise<StoreMetadata> {
  return locks.runExclusive(METADATA_LOCK, async () => {
    const next = update(await store.getMetadata());
    await store.saveMetadata(next);
    return next;
  });
}

export function recordLocationStatus(
  metadata: StoreMetadata,
  locationCode: string,
  status: LocationSyncStatus,
): StoreMetadata {
  return {
    ...metadata,
    locations: { ...metadata.locations, [locationCode]: status },
  };
}
