import type { AmenityKey } from "../constants/facility.constants";

export type Amenities = Record<AmenityKey, boolean>;

/**
 * One ground-service provider (FBO) at one airport
 */
export interface FacilityRecord {
  id: string;
  locationCode: string;
  name: string;

  // Contact
  phone: string | null;
  radioFrequency: string | null;
  website: string | null;

  // Fuel
  jetAPrice: number | null;
  avgasPrice: number | null;
  fuelPriceDate: Date | null;
  fuelPriceReporter: string | null;

  amenities: Amenities;

  // Fees
  handlingFee: number | null;
  overnightFee: number | null;
  rampFee: number | null;
  rampFeeWaived: boolean;

  // Backend-derived
  averageRating: number | null;
  ratingCount: number | null;

  // Provenance
  lastUpdated: Date;
  updatedBy: string | null;
  remoteIdentifier: string | null;
  isVerified: boolean;
  pendingPush: boolean;
}

/**
 * One baseline CSV row, cells in BASELINE_COLUMNS order
 */
export type RawRow = string[];

/**
 * Facility data submitted by an interactive edit
 */
export interface FacilityEdit {
  id?: string;
  locationCode: string;
  name: string;
  updatedBy: string;
  phone?: string | null;
  radioFrequency?: string | null;
  website?: string | null;
  jetAPrice?: number | null;
  avgasPrice?: number | null;
  amenities?: Partial<Amenities>;
  handlingFee?: number | null;
  overnightFee?: number | null;
  rampFee?: number | null;
  rampFeeWaived?: boolean;
}

export type EditOutcome = "created" | "merged";

export interface EditResult {
  record: FacilityRecord;
  outcome: EditOutcome;
}
