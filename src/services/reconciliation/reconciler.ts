import type { MergeOptions } from "../../models/merge-policy.model";
import type { FacilityRecord } from "../../types/facility.types";
import type { FieldChange, ReconcileReport } from "../../types/sync.types";
import { deduplicateFacilities } from "./deduplicator";
import { mergeFieldsWithAudit } from "./fieldMerge.policy";
import { normalizeFacilityName } from "./normalizer";

export interface ReconcileResult {
  records: FacilityRecord[];
  report: ReconcileReport;
}

/**
 * Fold an incoming batch into the local collection of one location.
 *
 * Not symmetric: the merge policy trusts `incoming.updatedBy`, so the same rows
 * reconcile differently when they come from the backend than from a re-import.
 */
export function reconcileWithReport(
  local: FacilityRecord[],
  incoming: FacilityRecord[],
  options: MergeOptions = {},
): ReconcileResult {
  // Local same-tier duplicates are settled first so incoming data lands on the survivor
  const localWinners = deduplicateFacilities(local);
  const byKey = new Map<string, FacilityRecord>();
  for (const record of localWinners) {
    byKey.set(normalizeFacilityName(record.name), record);
  }

  let merged = 0;
  let added = 0;
  const changes: FieldChange[] = [];

  for (const record of incoming) {
    const key = normalizeFacilityName(record.name);
    const existing = byKey.get(key);
    if (existing) {
      const result = mergeFieldsWithAudit(existing, record, options);
      byKey.set(key, result.merged);
      changes.push(...result.changes);
      merged++;
    } else {
      byKey.set(key, record);
      added++;
    }
  }

  const records = deduplicateFacilities([...byKey.values()]);

  return {
    records,
    report: {
      merged,
      added,
      duplicatesDropped: local.length - localWinners.length,
      changes,
    },
  };
}

/**
 * Authoritative merged collection for one location. Pure; callers persist.
 */
export function reconcile(
  local: FacilityRecord[],
  incoming: FacilityRecord[],
  options: MergeOptions = {},
): FacilityRecord[] {
  return reconcileWithReport(local, incoming, options).records;
}
