/**
 * Provenance label written by the baseline importer. Interactive edits may
 * never carry it.
 */
export const BULK_IMPORT_LABEL = "baseline-import";

/**
 * Amenity flags carried by every facility record
 */
export const AMENITY_KEYS = [
  "crewCar",
  "crewLounge",
  "catering",
  "maintenance",
  "hangars",
  "deice",
  "oxygen",
  "groundPower",
  "lavatoryService",
] as const;

export type AmenityKey = (typeof AMENITY_KEYS)[number];

/**
 * Column order of the bundled baseline CSV
 */
export const BASELINE_COLUMNS = [
  "airport_code",
  "name",
  "phone",
  "unicom",
  "website",
  "jet_a_price",
  "avgas_price",
  "crew_cars",
  "crew_lounge",
  "catering",
  "maintenance",
  "hangars",
  "deice",
  "oxygen",
  "gpu",
  "lav",
  "handling_fee",
  "overnight_fee",
  "ramp_fee",
  "ramp_fee_waived",
] as const;

export type BaselineColumn = (typeof BASELINE_COLUMNS)[number];

/**
 * Baseline column backing each amenity flag
 */
export const AMENITY_COLUMNS: Record<AmenityKey, BaselineColumn> = {
  crewCar: "crew_cars",
  crewLounge: "crew_lounge",
  catering: "catering",
  maintenance: "maintenance",
  hangars: "hangars",
  deice: "deice",
  oxygen: "oxygen",
  groundPower: "gpu",
  lavatoryService: "lav",
};

/**
 * Tokens read as `true` in boolean baseline cells (compared lower-cased)
 */
export const TRUE_TOKENS = ["1", "yes", "true"] as const;

/**
 * Generic words dropped from facility names before comparison
 */
export const GENERIC_NAME_TOKENS = ["aviation", "fbo"] as const;

export const LOCATION_CODE_PATTERN = /^[A-Z0-9]{3,4}$/;
