import { AMENITY_KEYS, BULK_IMPORT_LABEL } from "../../constants/facility.constants";
import { ContactPrecedence, DEFAULT_MERGE_OPTIONS, MergeOptions } from "../../models/merge-policy.model";
import type { Amenities, FacilityRecord } from "../../types/facility.types";
import type { FieldChange } from "../../types/sync.types";

export interface FieldMergeResult {
  merged: FacilityRecord;
  changes: FieldChange[];
}

type CommercialField =
  | "phone"
  | "radioFrequency"
  | "website"
  | "handlingFee"
  | "overnightFee"
  | "rampFee"
  | "averageRating"
  | "ratingCount";

const COMMERCIAL_FIELDS: readonly CommercialField[] = [
  "phone",
  "radioFrequency",
  "website",
  "handlingFee",
  "overnightFee",
  "rampFee",
  "averageRating",
  "ratingCount",
];

interface FuelUnit {
  jetAPrice: number | null;
  avgasPrice: number | null;
  fuelPriceDate: Date | null;
  fuelPriceReporter: string | null;
}

const EMPTY_FUEL: FuelUnit = {
  jetAPrice: null,
  avgasPrice: null,
  fuelPriceDate: null,
  fuelPriceReporter: null,
};

/**
 * A label written by a person or device, as opposed to the importer or nobody
 */
export function isInteractiveLabel(label: string | null): boolean {
  return label !== null && label.trim() !== "" && label !== BULK_IMPORT_LABEL;
}

/**
 * Prices without an observation time (or a time without prices) carry no usable data
 */
function fuelUnitOf(record: FacilityRecord): FuelUnit {
  const hasPrice = record.jetAPrice !== null || record.avgasPrice !== null;
  if (!hasPrice || record.fuelPriceDate === null) {
    return EMPTY_FUEL;
  }
  return {
    jetAPrice: record.jetAPrice,
    avgasPrice: record.avgasPrice,
    fuelPriceDate: record.fuelPriceDate,
    fuelPriceReporter: record.fuelPriceReporter,
  };
}

function fuelTime(unit: FuelUnit): number {
  return unit.fuelPriceDate ? unit.fuelPriceDate.getTime() : Number.NEGATIVE_INFINITY;
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

class ChangeLog {
  readonly changes: FieldChange[] = [];

  record(field: string, oldValue: unknown, newValue: unknown, reason: string): void {
    if (sameValue(oldValue, newValue)) return;
    this.changes.push({ field, oldValue, newValue, source: "INCOMING", reason });
  }
}

/**
 * Merge two records already matched as the same facility, keeping the audit
 * trail of every field that moved away from `existing`.
 */
export function mergeFieldsWithAudit(
  existing: FacilityRecord,
  incoming: FacilityRecord,
  options: MergeOptions = {},
): FieldMergeResult {
  const contactPrecedence = options.contactPrecedence ?? DEFAULT_MERGE_OPTIONS.contactPrecedence;
  const acknowledgement = options.acknowledgement ?? DEFAULT_MERGE_OPTIONS.acknowledgement;
  const log = new ChangeLog();

  // Commercial data: user-edited incoming beats existing, anything else only fills gaps
  const incomingTrusted = isInteractiveLabel(incoming.updatedBy);
  const existingIsNewerEdit =
    contactPrecedence === ContactPrecedence.LATEST_UPDATE &&
    isInteractiveLabel(existing.updatedBy) &&
    existing.lastUpdated.getTime() > incoming.lastUpdated.getTime();

  const commercial: Pick<FacilityRecord, CommercialField> = {
    phone: existing.phone,
    radioFrequency: existing.radioFrequency,
    website: existing.website,
    handlingFee: existing.handlingFee,
    overnightFee: existing.overnightFee,
    rampFee: existing.rampFee,
    averageRating: existing.averageRating,
    ratingCount: existing.ratingCount,
  };
  const takenFromIncoming = new Set<CommercialField>();

  for (const field of COMMERCIAL_FIELDS) {
    const incomingValue = incoming[field];
    if (incomingValue === null) continue;

    const existingValue = existing[field];
    let reason: string | null = null;
    if (existingValue === null) {
      reason = "existing value was empty";
    } else if (incomingTrusted && !existingIsNewerEdit) {
      reason = `edited by ${incoming.updatedBy}`;
    }
    if (reason === null) continue;

    takenFromIncoming.add(field);
    log.record(field, existingValue, incomingValue, reason);
  }

  for (const field of takenFromIncoming) {
    assignField(commercial, incoming, field);
  }

  const rampFeeWaived =
    incoming.rampFee !== null && takenFromIncoming.has("rampFee")
      ? incoming.rampFeeWaived
      : existing.rampFeeWaived;
  log.record("rampFeeWaived", existing.rampFeeWaived, rampFeeWaived, "follows ramp fee");

  // Amenities only ever turn on
  const amenities = combineAmenities(existing.amenities, incoming.amenities);
  for (const key of AMENITY_KEYS) {
    log.record(`amenities.${key}`, existing.amenities[key], amenities[key], "amenity confirmed");
  }

  // Fuel moves as one unit. An empty unit sorts before any observation, so a price
  // always beats no price even when its date is old.
  const existingFuel = fuelUnitOf(existing);
  const incomingFuel = fuelUnitOf(incoming);
  const fuel = fuelTime(incomingFuel) > fuelTime(existingFuel) ? incomingFuel : existingFuel;
  const fuelReason =
    fuel !== existingFuel ? "newer fuel price observation" : "fuel price without observation time dropped";
  log.record("jetAPrice", existing.jetAPrice, fuel.jetAPrice, fuelReason);
  log.record("avgasPrice", existing.avgasPrice, fuel.avgasPrice, fuelReason);
  log.record("fuelPriceDate", existing.fuelPriceDate, fuel.fuelPriceDate, fuelReason);
  log.record("fuelPriceReporter", existing.fuelPriceReporter, fuel.fuelPriceReporter, fuelReason);

  const remoteIdentifier = incoming.remoteIdentifier ?? existing.remoteIdentifier;
  log.record("remoteIdentifier", existing.remoteIdentifier, remoteIdentifier, "assigned by remote store");

  const isVerified = existing.isVerified || incoming.isVerified;
  log.record("isVerified", existing.isVerified, isVerified, "verification is sticky");

  const incomingIsNewer = incoming.lastUpdated.getTime() >= existing.lastUpdated.getTime();
  const lastUpdated = incomingIsNewer ? incoming.lastUpdated : existing.lastUpdated;
  // An import never relabels a user edit, or it would be pushed under the reserved label
  const labelFromIncoming =
    incomingIsNewer &&
    incoming.updatedBy !== null &&
    (isInteractiveLabel(incoming.updatedBy) || !isInteractiveLabel(existing.updatedBy));
  const updatedBy = labelFromIncoming ? incoming.updatedBy : existing.updatedBy;
  log.record("lastUpdated", existing.lastUpdated, lastUpdated, "newer update");
  log.record("updatedBy", existing.updatedBy, updatedBy, "newer update");

  const pendingPush = acknowledgement ? incoming.pendingPush : existing.pendingPush || incoming.pendingPush;

  const merged: FacilityRecord = {
    id: existing.id,
    locationCode: existing.locationCode,
    name: existing.name,
    ...commercial,
    ...fuel,
    amenities,
    rampFeeWaived,
    lastUpdated,
    updatedBy,
    remoteIdentifier,
    isVerified,
    pendingPush,
  };

  return { merged, changes: log.changes };
}

function combineAmenities(a: Amenities, b: Amenities): Amenities {
  return {
    crewCar: a.crewCar || b.crewCar,
    crewLounge: a.crewLounge || b.crewLounge,
    catering: a.catering || b.catering,
    maintenance: a.maintenance || b.maintenance,
    hangars: a.hangars || b.hangars,
    deice: a.deice || b.deice,
    oxygen: a.oxygen || b.oxygen,
    groundPower: a.groundPower || b.groundPower,
    lavatoryService: a.lavatoryService || b.lavatoryService,
  };
}

function assignField<K extends CommercialField>(
  target: Pick<FacilityRecord, CommercialField>,
  source: FacilityRecord,
  field: K,
): void {
  target[field] = source[field];
}

/**
 * Merge an incoming record into an existing one believed to be the same facility.
 * Pure and total: never throws.
 */
export function mergeFields(
  existing: FacilityRecord,
  incoming: FacilityRecord,
  options: MergeOptions = {},
): FacilityRecord {
  return mergeFieldsWithAudit(existing, incoming, options).merged;
}
