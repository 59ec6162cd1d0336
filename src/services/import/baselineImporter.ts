import { v4 as uuidv4 } from "uuid";
import {
  AMENITY_COLUMNS,
  BASELINE_COLUMNS,
  BULK_IMPORT_LABEL,
  BaselineColumn,
  TRUE_TOKENS,
} from "../../constants/facility.constants";
import type { Amenities, FacilityRecord, RawRow } from "../../types/facility.types";
import type { BaselineParseResult } from "../../types/sync.types";

class MalformedRowError extends Error {}

export interface BaselineImportOptions {
  /** When the bundled data was observed; stamps prices and lastUpdated */
  datasetDate?: Date;
}

// Undated baselines lose to every dated observation
const UNDATED = new Date(0);

const COLUMN_INDEX = new Map<BaselineColumn, number>(
  BASELINE_COLUMNS.map((column, index) => [column, index]),
);

function cell(row: RawRow, column: BaselineColumn): string {
  const index = COLUMN_INDEX.get(column) ?? -1;
  return (row[index] ?? "").trim();
}

function text(row: RawRow, column: BaselineColumn): string | null {
  const value = cell(row, column);
  return value === "" ? null : value;
}

/**
 * Blank is "no value"; anything else must be a number
 */
function amount(row: RawRow, column: BaselineColumn): number | null {
  const value = cell(row, column).replace(/^\$/, "");
  if (value === "") return null;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new MalformedRowError(`${column} is not numeric: "${value}"`);
  }
  return parsed;
}

export function parseBaselineBoolean(value: string): boolean {
  const token = value.trim().toLowerCase();
  return TRUE_TOKENS.some((candidate) => candidate === token);
}

function flag(row: RawRow, column: BaselineColumn): boolean {
  return parseBaselineBoolean(cell(row, column));
}

function amenitiesOf(row: RawRow): Amenities {
  return {
    crewCar: flag(row, AMENITY_COLUMNS.crewCar),
    crewLounge: flag(row, AMENITY_COLUMNS.crewLounge),
    catering: flag(row, AMENITY_COLUMNS.catering),
    maintenance: flag(row, AMENITY_COLUMNS.maintenance),
    hangars: flag(row, AMENITY_COLUMNS.hangars),
    deice: flag(row, AMENITY_COLUMNS.deice),
    oxygen: flag(row, AMENITY_COLUMNS.oxygen),
    groundPower: flag(row, AMENITY_COLUMNS.groundPower),
    lavatoryService: flag(row, AMENITY_COLUMNS.lavatoryService),
  };
}

function toRecord(row: RawRow, datasetDate: Date): FacilityRecord {
  const jetAPrice = amount(row, "jet_a_price");
  const avgasPrice = amount(row, "avgas_price");
  const hasPrice = jetAPrice !== null || avgasPrice !== null;

  return {
    id: uuidv4(),
    locationCode: cell(row, "airport_code").toUpperCase(),
    name: cell(row, "name"),
    phone: text(row, "phone"),
    radioFrequency: text(row, "unicom"),
    website: text(row, "website"),
    jetAPrice,
    avgasPrice,
    fuelPriceDate: hasPrice ? datasetDate : null,
    fuelPriceReporter: hasPrice ? BULK_IMPORT_LABEL : null,
    amenities: amenitiesOf(row),
    handlingFee: amount(row, "handling_fee"),
    overnightFee: amount(row, "overnight_fee"),
    rampFee: amount(row, "ramp_fee"),
    rampFeeWaived: flag(row, "ramp_fee_waived"),
    averageRating: null,
    ratingCount: null,
    lastUpdated: datasetDate,
    updatedBy: BULK_IMPORT_LABEL,
    remoteIdentifier: null,
    isVerified: true,
    pendingPush: false,
  };
}

/**
 * Parse bundled baseline rows into verified facility records.
 *
 * Malformed rows (wrong field count, non-numeric amount) are skipped and
 * counted; rows without a location code or name are dropped silently.
 */
export function importBaseline(
  rows: RawRow[],
  datasetVersion: number,
  options: BaselineImportOptions = {},
): BaselineParseResult {
  const datasetDate = options.datasetDate ?? UNDATED;
  const records: FacilityRecord[] = [];
  let skippedRows = 0;
  let emptyRows = 0;

  for (const row of rows) {
    if (row.length !== BASELINE_COLUMNS.length) {
      skippedRows++;
      continue;
    }
    if (cell(row, "airport_code") === "" || cell(row, "name") === "") {
      emptyRows++;
      continue;
    }

    try {
      records.push(toRecord(row, datasetDate));
    } catch (error) {
      if (!(error instanceof MalformedRowError)) throw error;
      skippedRows++;
    }
  }

  return { records, skippedRows, emptyRows, datasetVersion };
}
