import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import { facilityRecordSchema } from "../../schemas/facility.schemas";
import type { FacilityRecord } from "../../types/facility.types";

/**
 * Facility as the backend serializes it: its own `remoteId`, no local bookkeeping
 */
export const remoteFacilitySchema = facilityRecordSchema
  .omit({ id: true, remoteIdentifier: true, pendingPush: true })
  .extend({ remoteId: z.string().min(1) })
  .transform(
    ({ remoteId, ...fields }): FacilityRecord => ({
      ...fields,
      id: uuidv4(),
      remoteIdentifier: remoteId,
      pendingPush: false,
    }),
  );

export const queryResponseSchema = z.object({
  facilities: z.array(remoteFacilitySchema),
});

export const saveResponseSchema = z.object({
  remoteId: z.string().min(1),
});

/**
 * Body sent on save/update. Local id and push bookkeeping stay local.
 */
export function toRemotePayload(record: FacilityRecord) {
  const { id: _id, pendingPush: _pending, remoteIdentifier: _remote, ...fields } = record;
  return {
    ...fields,
    fuelPriceDate: fields.fuelPriceDate ? fields.fuelPriceDate.toISOString() : null,
    lastUpdated: fields.lastUpdated.toISOString(),
  };
}
