import type { FacilityRecord } from "../../types/facility.types";

/**
 * Shared collaborative backend holding every user's facility data.
 * Records it returns carry `remoteIdentifier`; local ids are never sent as identity.
 */
export interface RemoteFacilityStore {
  queryByLocation(locationCode: string, signal?: AbortSignal): Promise<FacilityRecord[]>;
  /** Creates the record remotely; resolves with the identifier the backend assigned */
  save(record: FacilityRecord): Promise<string>;
  update(remoteIdentifier: string, record: FacilityRecord): Promise<void>;
  delete(remoteIdentifier: string): Promise<void>;
}
