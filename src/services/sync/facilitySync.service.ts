import type { MergeOptions } from "../../models/merge-policy.model";
import type { FacilityRecord } from "../../types/facility.types";
import type { ReconcileReport, SyncOutcome, SyncResult } from "../../types/sync.types";
import logger, { getErrorMessage } from "../../utils/logger";
import { reconcileWithReport } from "../reconciliation/reconciler";
import type { RemoteFacilityStore } from "../remote/remoteFacility.store";
import type { FacilityRepository } from "../store/facility.repository";
import { recordLocationStatus, updateMetadata } from "../store/storeMetadata";
import type { KeyedMutex } from "./keyedMutex";
import type { OutboxDispatcher } from "./outbox.dispatcher";

export interface FacilitySyncOptions {
  mergeOptions?: MergeOptions;
  now?: () => Date;
}

export interface SyncLocationOptions {
  signal?: AbortSignal;
}

const emptyReport = (): ReconcileReport => ({ merged: 0, added: 0, duplicatesDropped: 0, changes: [] });

type FetchOutcome =
  | { ok: true; records: FacilityRecord[] }
  | { ok: false };

/**
 * Pulls one location from the remote store and folds it into the local
 * collection. Remote failure degrades to local data; it is never thrown.
 */
export class FacilitySyncService {
  private readonly now: () => Date;

  constructor(
    private readonly repository: FacilityRepository,
    private readonly remote: RemoteFacilityStore | null,
    private readonly locks: KeyedMutex,
    private readonly outbox: OutboxDispatcher,
    private readonly options: FacilitySyncOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async syncLocation(locationCode: string, syncOptions: SyncLocationOptions = {}): Promise<SyncResult> {
    const { signal } = syncOptions;

    const result = await this.locks.runExclusive(locationCode, async (): Promise<SyncResult> => {
      const store = this.repository.store;
      const local = await this.repository.read(locationCode);
      const fetched = await this.fetch(locationCode, signal);

      if (signal?.aborted) {
        logger.debug("Sync abandoned before write", { locationCode });
        return offlineResult(locationCode, local);
      }

      if (!fetched.ok) {
        // Unchanged collection written back so an offline sync is an idempotent no-op
        await this.repository.commit(locationCode, local);
        await this.recordStatus(locationCode, "offline");
        return offlineResult(locationCode, local);
      }

      const tombstones = new Set(await store.getTombstones(locationCode));
      const inLocation = fetched.records.filter(
        (record) => record.locationCode.trim().toUpperCase() === locationCode,
      );
      if (inLocation.length < fetched.records.length) {
        logger.warn("Remote returned records for another location", {
          locationCode,
          dropped: fetched.records.length - inLocation.length,
        });
      }
      const incoming = inLocation.filter(
        (record) => record.remoteIdentifier === null || !tombstones.has(record.remoteIdentifier),
      );

      await store.saveRemoteSnapshot(locationCode, {
        records: incoming,
        fetchedAt: this.now().toISOString(),
      });

      const { records, report } = reconcileWithReport(local, incoming, this.options.mergeOptions);
      await this.repository.commit(locationCode, records);
      await this.recordStatus(locationCode, "synced");

      logger.info("Location synced", {
        locationCode,
        fetched: fetched.records.length,
        suppressed: fetched.records.length - incoming.length,
        merged: report.merged,
        added: report.added,
        duplicatesDropped: report.duplicatesDropped,
      });
      if (report.changes.length > 0) {
        logger.debug("Reconcile audit", { locationCode, changes: report.changes });
      }

      return {
        locationCode,
        records,
        outcome: "synced",
        fetched: fetched.records.length,
        report,
      };
    });

    // Pushes run outside the lock; their failures stay in the outbox
    void this.outbox.schedule(locationCode);

    return result;
  }

  private async fetch(locationCode: string, signal?: AbortSignal): Promise<FetchOutcome> {
    if (!this.remote) return { ok: false };
    try {
      const records = await this.remote.queryByLocation(locationCode, signal);
      return { ok: true, records };
    } catch (error) {
      logger.warn("Remote fetch failed; serving local data", {
        locationCode,
        error: getErrorMessage(error),
      });
      return { ok: false };
    }
  }

  private async recordStatus(locationCode: string, outcome: SyncOutcome): Promise<void> {
    await updateMetadata(this.repository.store, this.locks, (metadata) =>
      recordLocationStatus(metadata, locationCode, {
        lastSyncedAt: this.now().toISOString(),
        lastSyncOutcome: outcome,
      }),
    );
  }
}

function offlineResult(locationCode: string, records: FacilityRecord[]): SyncResult {
  return { locationCode, records, outcome: "offline", fetched: 0, report: emptyReport() };
}
