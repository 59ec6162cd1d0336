import type { FacilityRecord } from "./facility.types";

export type SyncOutcome = "synced" | "offline";

export interface LocationSyncStatus {
  lastSyncedAt: string | null;
  lastSyncOutcome: SyncOutcome | null;
}

/**
 * Small metadata record kept beside the facility collections
 */
export interface StoreMetadata {
  datasetVersion: number;
  importedAt: string | null;
  skippedRows: number;
  locations: Record<string, LocationSyncStatus>;
}

/**
 * Last batch fetched from the remote store for one location, before merging
 */
export interface RemoteSnapshot {
  records: FacilityRecord[];
  fetchedAt: string;
}

export interface FieldChange {
  field: string;
  oldValue: unknown;
  newValue: unknown;
  source: "EXISTING" | "INCOMING";
  reason: string;
}

export interface ReconcileReport {
  merged: number;
  added: number;
  duplicatesDropped: number;
  changes: FieldChange[];
}

export interface SyncResult {
  locationCode: string;
  records: FacilityRecord[];
  outcome: SyncOutcome;
  fetched: number;
  report: ReconcileReport;
}

export interface SyncStatus extends LocationSyncStatus {
  locationCode: string;
  recordCount: number;
  pendingPush: number;
  pendingDeletes: number;
  remoteSnapshotSize: number;
  remoteFetchedAt: string | null;
}

export interface BaselineParseResult {
  records: FacilityRecord[];
  skippedRows: number;
  emptyRows: number;
  datasetVersion: number;
}

export type BaselineImportStatus = "imported" | "up-to-date";

export interface BaselineImportResult {
  status: BaselineImportStatus;
  datasetVersion: number;
  locations: number;
  records: number;
  skippedRows: number;
}
