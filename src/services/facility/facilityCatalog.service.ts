import { v4 as uuidv4 } from "uuid";
import { BULK_IMPORT_LABEL, LOCATION_CODE_PATTERN } from "../../constants/facility.constants";
import {
  DuplicateFacilityError,
  FacilityNotFoundError,
  InvalidFacilityEditError,
  ProtectedRecordError,
} from "../../errors/facility.errors";
import type { MergeOptions } from "../../models/merge-policy.model";
import type { Amenities, EditResult, FacilityEdit, FacilityRecord } from "../../types/facility.types";
import type { SyncResult, SyncStatus } from "../../types/sync.types";
import logger from "../../utils/logger";
import { deduplicateFacilities, findDuplicateGroups } from "../reconciliation/deduplicator";
import type { DuplicateGroup } from "../reconciliation/deduplicator";
import { mergeFields } from "../reconciliation/fieldMerge.policy";
import { normalizeFacilityName } from "../reconciliation/normalizer";
import type { FacilitiesChangedListener, FacilityRepository } from "../store/facility.repository";
import type { FacilitySyncService, SyncLocationOptions } from "../sync/facilitySync.service";
import type { KeyedMutex } from "../sync/keyedMutex";
import type { OutboxDispatcher } from "../sync/outbox.dispatcher";

export interface FacilityCatalogOptions {
  mergeOptions?: MergeOptions;
  now?: () => Date;
}

export function normalizeLocationCode(locationCode: string): string {
  return locationCode.trim().toUpperCase();
}

/**
 * Consumer-facing surface: local reads, sync requests, interactive edits and deletes
 */
export class FacilityCatalogService {
  private readonly now: () => Date;

  constructor(
    private readonly repository: FacilityRepository,
    private readonly syncService: FacilitySyncService,
    private readonly outbox: OutboxDispatcher,
    private readonly locks: KeyedMutex,
    private readonly options: FacilityCatalogOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Deduplicated local collection; never touches the network
   */
  getRecords(locationCode: string): FacilityRecord[] {
    return deduplicateFacilities(this.repository.snapshot(normalizeLocationCode(locationCode)));
  }

  /**
   * Name groups with more than one stored record, and the one `getRecords` shows
   */
  getDuplicateGroups(locationCode: string): DuplicateGroup[] {
    return findDuplicateGroups(this.repository.snapshot(normalizeLocationCode(locationCode)));
  }

  requestSync(locationCode: string, options?: SyncLocationOptions): Promise<SyncResult> {
    return this.syncService.syncLocation(normalizeLocationCode(locationCode), options);
  }

  canDelete(record: FacilityRecord): boolean {
    return !record.isVerified;
  }

  onChange(listener: FacilitiesChangedListener): () => void {
    return this.repository.onChange(listener);
  }

  async submitEdit(edit: FacilityEdit): Promise<EditResult> {
    const locationCode = normalizeLocationCode(edit.locationCode);
    const name = edit.name.trim();
    const updatedBy = edit.updatedBy.trim();

    if (!LOCATION_CODE_PATTERN.test(locationCode)) {
      throw new InvalidFacilityEditError(`Invalid location code "${edit.locationCode}"`);
    }
    if (name === "") {
      throw new InvalidFacilityEditError("Facility name is required");
    }
    if (updatedBy === "" || updatedBy === BULK_IMPORT_LABEL) {
      throw new InvalidFacilityEditError("updatedBy must name the person or device making the edit");
    }

    const incoming = this.toRecord({ ...edit, locationCode, name, updatedBy });

    const result = await this.locks.runExclusive(locationCode, async (): Promise<EditResult> => {
      const stored = await this.repository.read(locationCode);
      const match = findMatch(stored, edit.id, name);

      if (!match) {
        await this.repository.commit(locationCode, [...stored, incoming]);
        return { record: incoming, outcome: "created" };
      }

      const ownEntry = edit.id === match.id || match.updatedBy === updatedBy;
      if (!match.isVerified && !ownEntry) {
        throw new DuplicateFacilityError(locationCode, match.name, match.id);
      }

      const merged = mergeFields(match, incoming, this.options.mergeOptions);
      await this.repository.commit(
        locationCode,
        stored.map((record) => (record.id === match.id ? merged : record)),
      );
      return { record: merged, outcome: "merged" };
    });

    logger.info(`Facility edit ${result.outcome}`, {
      locationCode,
      facilityId: result.record.id,
      updatedBy,
    });
    void this.outbox.schedule(locationCode);
    return result;
  }

  async deleteFacility(locationCode: string, facilityId: string): Promise<FacilityRecord> {
    const code = normalizeLocationCode(locationCode);

    const removed = await this.locks.runExclusive(code, async () => {
      const stored = await this.repository.read(code);
      const target = stored.find((record) => record.id === facilityId);
      if (!target) {
        throw new FacilityNotFoundError(code, facilityId);
      }
      if (!this.canDelete(target)) {
        throw new ProtectedRecordError(facilityId);
      }

      // Tombstone before the local delete, so a failed write leaves the record in place
      if (target.remoteIdentifier !== null) {
        await this.repository.store.addTombstone(code, target.remoteIdentifier);
      }
      await this.repository.commit(
        code,
        stored.filter((record) => record.id !== facilityId),
      );
      return target;
    });

    logger.info("Facility deleted", { locationCode: code, facilityId });
    if (removed.remoteIdentifier !== null) {
      void this.outbox.schedule(code);
    }
    return removed;
  }

  async getSyncStatus(locationCode: string): Promise<SyncStatus> {
    const code = normalizeLocationCode(locationCode);
    const store = this.repository.store;
    const [metadata, snapshot, tombstones] = await Promise.all([
      store.getMetadata(),
      store.getRemoteSnapshot(code),
      store.getTombstones(code),
    ]);
    const records = this.repository.snapshot(code);
    const status = metadata.locations[code];

    return {
      locationCode: code,
      lastSyncedAt: status?.lastSyncedAt ?? null,
      lastSyncOutcome: status?.lastSyncOutcome ?? null,
      recordCount: records.length,
      pendingPush: records.filter((record) => record.pendingPush).length,
      pendingDeletes: tombstones.length,
      remoteSnapshotSize: snapshot?.records.length ?? 0,
      remoteFetchedAt: snapshot?.fetchedAt ?? null,
    };
  }

  /**
   * Unverified, queued for push; omitted fields stay empty so the merge keeps stored values
   */
  private toRecord(edit: FacilityEdit): FacilityRecord {
    const now = this.now();
    const jetAPrice = edit.jetAPrice ?? null;
    const avgasPrice = edit.avgasPrice ?? null;
    const hasPrice = jetAPrice !== null || avgasPrice !== null;

    return {
      id: uuidv4(),
      locationCode: edit.locationCode,
      name: edit.name,
      phone: edit.phone ?? null,
      radioFrequency: edit.radioFrequency ?? null,
      website: edit.website ?? null,
      jetAPrice,
      avgasPrice,
      fuelPriceDate: hasPrice ? now : null,
      fuelPriceReporter: hasPrice ? edit.updatedBy : null,
      amenities: amenitiesOf(edit.amenities),
      handlingFee: edit.handlingFee ?? null,
      overnightFee: edit.overnightFee ?? null,
      rampFee: edit.rampFee ?? null,
      rampFeeWaived: edit.rampFeeWaived ?? false,
      averageRating: null,
      ratingCount: null,
      lastUpdated: now,
      updatedBy: edit.updatedBy,
      remoteIdentifier: null,
      isVerified: false,
      pendingPush: true,
    };
  }
}

function findMatch(stored: FacilityRecord[], id: string | undefined, name: string): FacilityRecord | undefined {
  if (id !== undefined) {
    const byId = stored.find((record) => record.id === id);
    if (byId) return byId;
  }
  const key = normalizeFacilityName(name);
  // Verified entries absorb edits ahead of same-named unverified ones
  const candidates = stored.filter((record) => normalizeFacilityName(record.name) === key);
  return candidates.find((record) => record.isVerified) ?? candidates[0];
}

function amenitiesOf(partial: Partial<Amenities> = {}): Amenities {
  return {
    crewCar: partial.crewCar ?? false,
    crewLounge: partial.crewLounge ?? false,
    catering: partial.catering ?? false,
    maintenance: partial.maintenance ?? false,
    hangars: partial.hangars ?? false,
    deice: partial.deice ?? false,
    oxygen: partial.oxygen ?? false,
    groundPower: partial.groundPower ?? false,
    lavatoryService: partial.lavatoryService ?? false,
  };
}
