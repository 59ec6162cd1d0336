import { z } from "zod";
import { BULK_IMPORT_LABEL, LOCATION_CODE_PATTERN } from "../constants/facility.constants";

const locationCode = z
  .string()
  .trim()
  .toUpperCase()
  .regex(LOCATION_CODE_PATTERN, "Location code must be 3-4 letters or digits");

const optionalText = z.string().trim().min(1).nullable().optional();
const optionalAmount = z.number().finite().nonnegative().nullable().optional();

export const locationParamsSchema = z.object({
  locationCode,
});

export const facilityParamsSchema = z.object({
  locationCode,
  facilityId: z.string().min(1, "Facility ID is required"),
});

export const amenitiesPatchSchema = z
  .object({
    crewCar: z.boolean().optional(),
    crewLounge: z.boolean().optional(),
    catering: z.boolean().optional(),
    maintenance: z.boolean().optional(),
    hangars: z.boolean().optional(),
    deice: z.boolean().optional(),
    oxygen: z.boolean().optional(),
    groundPower: z.boolean().optional(),
    lavatoryService: z.boolean().optional(),
  })
  .strict();

export const facilityEditSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().trim().min(1, "Facility name is required"),
  updatedBy: z
    .string()
    .trim()
    .min(1, "updatedBy is required")
    .refine((value) => value !== BULK_IMPORT_LABEL, {
      message: `"${BULK_IMPORT_LABEL}" is reserved for the baseline importer`,
    }),
  phone: optionalText,
  radioFrequency: optionalText,
  website: optionalText,
  jetAPrice: optionalAmount,
  avgasPrice: optionalAmount,
  amenities: amenitiesPatchSchema.optional(),
  handlingFee: optionalAmount,
  overnightFee: optionalAmount,
  rampFee: optionalAmount,
  rampFeeWaived: z.boolean().optional(),
});

export const baselineImportSchema = z.object({
  force: z.boolean().default(false),
});

export type FacilityEditBody = z.infer<typeof facilityEditSchema>;
export type BaselineImportBody = z.infer<typeof baselineImportSchema>;
