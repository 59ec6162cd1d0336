import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import type { FacilityRecord } from "../types/facility.types";
import type { RemoteSnapshot, StoreMetadata } from "../types/sync.types";

const optionalText = z.string().nullable().default(null);
const optionalAmount = z.number().finite().nullable().default(null);

export const amenitiesSchema = z.object({
  crewCar: z.boolean().default(false),
  crewLounge: z.boolean().default(false),
  catering: z.boolean().default(false),
  maintenance: z.boolean().default(false),
  hangars: z.boolean().default(false),
  deice: z.boolean().default(false),
  oxygen: z.boolean().default(false),
  groundPower: z.boolean().default(false),
  lavatoryService: z.boolean().default(false),
});

/**
 * Facility record as persisted or returned by the remote store.
 * Timestamps arrive as ISO strings and are coerced to Date; fields the
 * backend omits fall back to their empty value.
 */
export const facilityRecordSchema = z.object({
  id: z.string().min(1).default(() => uuidv4()),
  locationCode: z.string().trim().toUpperCase().min(3).max(4),
  name: z.string().min(1),

  phone: optionalText,
  radioFrequency: optionalText,
  website: optionalText,

  jetAPrice: optionalAmount,
  avgasPrice: optionalAmount,
  fuelPriceDate: z.coerce.date().nullable().default(null),
  fuelPriceReporter: optionalText,

  amenities: amenitiesSchema.default({}),

  handlingFee: optionalAmount,
  overnightFee: optionalAmount,
  rampFee: optionalAmount,
  rampFeeWaived: z.boolean().default(false),

  averageRating: optionalAmount,
  ratingCount: z.number().int().nonnegative().nullable().default(null),

  lastUpdated: z.coerce.date(),
  updatedBy: optionalText,
  remoteIdentifier: optionalText,
  isVerified: z.boolean().default(false),
  pendingPush: z.boolean().default(false),
});

export const facilityCollectionSchema = z.array(facilityRecordSchema);

export const remoteSnapshotSchema = z.object({
  records: facilityCollectionSchema,
  fetchedAt: z.string(),
});

export const storeMetadataSchema = z.object({
  datasetVersion: z.number().int().nonnegative().default(0),
  importedAt: z.string().nullable().default(null),
  skippedRows: z.number().int().nonnegative().default(0),
  locations: z
    .record(
      z.object({
        lastSyncedAt: z.string().nullable().default(null),
        lastSyncOutcome: z.enum(["synced", "offline"]).nullable().default(null),
      }),
    )
    .default({}),
});

export const EMPTY_METADATA: StoreMetadata = {
  datasetVersion: 0,
  importedAt: null,
  skippedRows: 0,
  locations: {},
};

export function parseFacilityCollection(value: unknown): FacilityRecord[] {
  return facilityCollectionSchema.parse(value);
}

export function parseRemoteSnapshot(value: unknown): RemoteSnapshot {
  return remoteSnapshotSchema.parse(value);
}

export function parseStoreMetadata(value: unknown): StoreMetadata {
  return storeMetadataSchema.parse(value);
}
