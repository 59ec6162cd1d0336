import fs from "fs";
import path from "path";
import { closePool, executeSql, query, transaction } from "../../config/database";
import {
  EMPTY_METADATA,
  parseFacilityCollection,
  parseRemoteSnapshot,
  parseStoreMetadata,
} from "../../schemas/facility.schemas";
import type { FacilityRecord } from "../../types/facility.types";
import type { RemoteSnapshot, StoreMetadata } from "../../types/sync.types";
import logger from "../../utils/logger";
import type { FacilityStore, StoreHealth } from "./facility.store";

const SCHEMA_PATH = path.resolve(__dirname, "../../../sql/schema.sql");

interface RecordsRow {
  records: unknown;
}

interface SnapshotRow {
  records: unknown;
  fetched_at: Date;
}

interface MetadataRow {
  metadata: unknown;
}

export class PostgresFacilityStore implements FacilityStore {
  /**
   * Create the tables when they are missing
   */
  async ensureSchema(): Promise<void> {
    const sql = await fs.promises.readFile(SCHEMA_PATH, "utf8");
    await executeSql(sql);
    logger.info("Facility store schema ready");
  }

  async getFacilities(locationCode: string): Promise<FacilityRecord[]> {
    const rows = await query<RecordsRow>(
      `SELECT records FROM facility_sets WHERE location_code = $1`,
      [locationCode],
    );
    return rows.length ? parseFacilityCollection(rows[0].records) : [];
  }

  async replaceFacilities(locationCode: string, records: FacilityRecord[]): Promise<void> {
    await transaction(async (client) => {
      await client.query(
        `INSERT INTO facility_sets (location_code, records, updated_at)
         VALUES ($1, $2::jsonb, NOW())
         ON CONFLICT (location_code)
         DO UPDATE SET records = EXCLUDED.records, updated_at = NOW()`,
        [locationCode, JSON.stringify(records)],
      );
    });
  }

  async listLocations(): Promise<string[]> {
    const rows = await query<{ location_code: string }>(
      `SELECT location_code FROM facility_sets ORDER BY location_code`,
    );
    return rows.map((row) => row.location_code);
  }

  async getMetadata(): Promise<StoreMetadata> {
    const rows = await query<MetadataRow>(
      `SELECT metadata FROM facility_store_metadata WHERE id = 1`,
    );
    return rows.length ? parseStoreMetadata(rows[0].metadata) : structuredClone(EMPTY_METADATA);
  }

  async saveMetadata(metadata: StoreMetadata): Promise<void> {
    await query(
      `INSERT INTO facility_store_metadata (id, metadata, updated_at)
       VALUES (1, $1::jsonb, NOW())
       ON CONFLICT (id)
       DO UPDATE SET metadata = EXCLUDED.metadata, updated_at = NOW()`,
      [JSON.stringify(metadata)],
    );
  }

  async getRemoteSnapshot(locationCode: string): Promise<RemoteSnapshot | null> {
    const rows = await query<SnapshotRow>(
      `SELECT records, fetched_at FROM facility_remote_snapshots WHERE location_code = $1`,
      [locationCode],
    );
    if (!rows.length) return null;
    return parseRemoteSnapshot({
      records: rows[0].records,
      fetchedAt: rows[0].fetched_at.toISOString(),
    });
  }

  async saveRemoteSnapshot(locationCode: string, snapshot: RemoteSnapshot): Promise<void> {
    await query(
      `INSERT INTO facility_remote_snapshots (location_code, records, fetched_at)
       VALUES ($1, $2::jsonb, $3)
       ON CONFLICT (location_code)
       DO UPDATE SET records = EXCLUDED.records, fetched_at = EXCLUDED.fetched_at`,
      [locationCode, JSON.stringify(snapshot.records), snapshot.fetchedAt],
    );
  }

  async clearRemoteSnapshots(): Promise<number> {
    const rows = await query<{ location_code: string }>(
      `DELETE FROM facility_remote_snapshots RETURNING location_code`,
    );
    return rows.length;
  }

  async getTombstones(locationCode: string): Promise<string[]> {
    const rows = await query<{ remote_identifier: string }>(
      `SELECT remote_identifier FROM facility_tombstones WHERE location_code = $1 ORDER BY created_at`,
      [locationCode],
    );
    return rows.map((row) => row.remote_identifier);
  }

  async addTombstone(locationCode: string, remoteIdentifier: string): Promise<void> {
    await query(
      `INSERT INTO facility_tombstones (location_code, remote_identifier)
       VALUES ($1, $2)
       ON CONFLICT DO NOTHING`,
      [locationCode, remoteIdentifier],
    );
  }

  async removeTombstone(locationCode: string, remoteIdentifier: string): Promise<void> {
    await query(
      `DELETE FROM facility_tombstones WHERE location_code = $1 AND remote_identifier = $2`,
      [locationCode, remoteIdentifier],
    );
  }

  async healthCheck(): Promise<StoreHealth> {
    const start = Date.now();
    const timestamp = new Date();

    try {
      await query("SELECT 1");
      return { status: "healthy", latency: Date.now() - start, timestamp };
    } catch (error) {
      return {
        status: "unhealthy",
        error: error instanceof Error ? error.message : "Unknown error",
        timestamp,
      };
    }
  }

  async close(): Promise<void> {
    await closePool();
  }
}
