import type { FacilityRecord } from "../../types/facility.types";
import { normalizeFacilityName } from "./normalizer";

export interface DuplicateGroup {
  key: string;
  winner: FacilityRecord;
  losers: FacilityRecord[];
}

/**
 * True when `candidate` should replace `current` as the representative of a
 * name group: verified beats unverified, then strictly newer lastUpdated.
 */
function outranks(candidate: FacilityRecord, current: FacilityRecord): boolean {
  if (candidate.isVerified !== current.isVerified) {
    return candidate.isVerified;
  }
  return candidate.lastUpdated.getTime() > current.lastUpdated.getTime();
}

function byName(a: FacilityRecord, b: FacilityRecord): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function groupByKey(records: FacilityRecord[]): Map<string, FacilityRecord[]> {
  const groups = new Map<string, FacilityRecord[]>();
  for (const record of records) {
    const key = normalizeFacilityName(record.name);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

function pickWinner(group: FacilityRecord[]): FacilityRecord {
  let winner = group[0];
  for (const record of group.slice(1)) {
    if (outranks(record, winner)) {
      winner = record;
    }
  }
  return winner;
}

/**
 * Collapse records of one location whose normalized names collide.
 *
 * Only selects; field content of the discarded copies is not merged in.
 * Output is ordered by name (ordinal comparison).
 */
export function deduplicateFacilities(records: FacilityRecord[]): FacilityRecord[] {
  const winners: FacilityRecord[] = [];
  for (const group of groupByKey(records).values()) {
    winners.push(pickWinner(group));
  }
  return winners.sort(byName);
}

/**
 * Name groups holding more than one record, with the record deduplication keeps
 */
export function findDuplicateGroups(records: FacilityRecord[]): DuplicateGroup[] {
  const duplicates: DuplicateGroup[] = [];
  for (const [key, group] of groupByKey(records)) {
    if (group.length < 2) continue;
    const winner = pickWinner(group);
    duplicates.push({
      key,
      winner,
      losers: group.filter((record) => record !== winner),
    });
  }
  return duplicates;
}
