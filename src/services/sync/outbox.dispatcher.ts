import { ResilienceExecutor } from "../../executors/resilienceExecutor";
import type { MergeOptions } from "../../models/merge-policy.model";
import type { FacilityRecord } from "../../types/facility.types";
import logger, { getErrorMessage } from "../../utils/logger";
import { mergeFields } from "../reconciliation/fieldMerge.policy";
import type { RemoteFacilityStore } from "../remote/remoteFacility.store";
import type { FacilityRepository } from "../store/facility.repository";
import { ErrorClassifier } from "./errorClassifier";
import type { KeyedMutex } from "./keyedMutex";

export interface FlushResult {
  locationCode: string;
  pushed: number;
  failed: number;
  deleted: number;
}

export interface OutboxDispatcherOptions {
  executor?: ResilienceExecutor;
  mergeOptions?: MergeOptions;
}

const EMPTY_FLUSH = (locationCode: string): FlushResult => ({
  locationCode,
  pushed: 0,
  failed: 0,
  deleted: 0,
});

/**
 * Best-effort push of locally created or edited records, and of pending
 * remote deletes. Runs after the local commit and never fails it.
 */
export class OutboxDispatcher {
  private readonly executor: ResilienceExecutor;
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly rerun = new Set<string>();

  constructor(
    private readonly repository: FacilityRepository,
    private readonly remote: RemoteFacilityStore | null,
    private readonly locks: KeyedMutex,
    private readonly options: OutboxDispatcherOptions = {},
  ) {
    this.executor = options.executor ?? new ResilienceExecutor();
  }

  /**
   * Start a flush for the location, or join the running one (which then runs
   * once more to pick up work queued after it started). Never rejects.
   */
  schedule(locationCode: string): Promise<void> {
    if (!this.remote) return Promise.resolve();

    const running = this.inFlight.get(locationCode);
    if (running) {
      this.rerun.add(locationCode);
      return running;
    }

    const run = this.drain(locationCode).finally(() => {
      this.inFlight.delete(locationCode);
    });
    this.inFlight.set(locationCode, run);
    return run;
  }

  scheduleAll(): Promise<void> {
    return Promise.all(this.repository.locations().map((code) => this.schedule(code))).then(() => undefined);
  }

  /**
   * Resolves once no flush is running
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  /**
   * Records still waiting for a successful push, across mirrored locations
   */
  getPendingCount(): number {
    return this.repository
      .locations()
      .reduce((count, code) => count + this.repository.snapshot(code).filter((r) => r.pendingPush).length, 0);
  }

  getCircuitState() {
    return this.executor.getState();
  }

  private async drain(locationCode: string): Promise<void> {
    do {
      this.rerun.delete(locationCode);
      try {
        const result = await this.flush(locationCode);
        if (result.pushed + result.failed + result.deleted > 0) {
          logger.info("Outbox flushed", result);
        }
      } catch (error) {
        logger.warn("Outbox flush aborted", { locationCode, error: getErrorMessage(error) });
      }
    } while (this.rerun.has(locationCode));
  }

  /**
   * Push every pending record and remote delete for one location
   */
  async flush(locationCode: string): Promise<FlushResult> {
    const remote = this.remote;
    const result = EMPTY_FLUSH(locationCode);
    if (!remote) return result;

    const pending = (await this.repository.read(locationCode)).filter((record) => record.pendingPush);
    for (const record of pending) {
      try {
        const remoteIdentifier = await this.push(remote, record);
        await this.acknowledge(locationCode, record, remoteIdentifier);
        result.pushed++;
      } catch (error) {
        result.failed++;
        logger.warn("Push failed; record stays queued", {
          locationCode,
          facilityId: record.id,
          error: getErrorMessage(error),
        });
      }
    }

    const store = this.repository.store;
    for (const remoteIdentifier of await store.getTombstones(locationCode)) {
      try {
        await this.executor.execute(() => remote.delete(remoteIdentifier), {
          context: `delete ${remoteIdentifier}`,
          shouldRetry: (error) => ErrorClassifier.classify(error).shouldRetry,
        });
        await store.removeTombstone(locationCode, remoteIdentifier);
        result.deleted++;
      } catch (error) {
        result.failed++;
        logger.warn("Remote delete failed; tombstone kept", {
          locationCode,
          remoteIdentifier,
          error: getErrorMessage(error),
        });
      }
    }

    return result;
  }

  private async push(remote: RemoteFacilityStore, record: FacilityRecord): Promise<string> {
    const existingId = record.remoteIdentifier;
    return this.executor.execute(
      async () => {
        if (existingId === null) {
          return remote.save(record);
        }
        await remote.update(existingId, record);
        return existingId;
      },
      {
        context: `push ${record.locationCode}/${record.id}`,
        shouldRetry: (error) => ErrorClassifier.classify(error).shouldRetry,
      },
    );
  }

  /**
   * Fold the backend's confirmation into the stored record under the location lock
   */
  private async acknowledge(locationCode: string, pushed: FacilityRecord, remoteIdentifier: string): Promise<void> {
    await this.locks.runExclusive(locationCode, async () => {
      const current = await this.repository.read(locationCode);
      const index = current.findIndex((record) => record.id === pushed.id);

      if (index === -1) {
        // Deleted locally while the push was in flight
        if (pushed.remoteIdentifier === null) {
          await this.repository.store.addTombstone(locationCode, remoteIdentifier);
        }
        return;
      }

      const stored = current[index];
      // Edited again during the push: keep it queued with the new data
      const stillPending = stored.lastUpdated.getTime() !== pushed.lastUpdated.getTime();
      const acknowledgement: FacilityRecord = { ...stored, remoteIdentifier, pendingPush: stillPending };
      const merged = mergeFields(stored, acknowledgement, {
        ...this.options.mergeOptions,
        acknowledgement: true,
      });

      const next = [...current];
      next[index] = merged;
      await this.repository.commit(locationCode, next);
    });
  }
}
