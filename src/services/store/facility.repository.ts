import { EventEmitter } from "events";
import type { FacilityRecord } from "../../types/facility.types";
import logger from "../../utils/logger";
import type { FacilityStore } from "./facility.store";

export interface FacilitiesChangedEvent {
  locationCode: string;
  records: FacilityRecord[];
}

export type FacilitiesChangedListener = (event: FacilitiesChangedEvent) => void;

const CHANGED = "facilitiesChanged";

/**
 * Observable boundary over the local store: one atomic replace per commit,
 * mirrored in memory so consumers can read without awaiting.
 */
export class FacilityRepository {
  private readonly mirror = new Map<string, FacilityRecord[]>();
  private readonly events = new EventEmitter();

  constructor(public readonly store: FacilityStore) {}

  /**
   * Load every stored location into the mirror
   */
  async hydrate(): Promise<number> {
    const locations = await this.store.listLocations();
    for (const locationCode of locations) {
      this.mirror.set(locationCode, await this.store.getFacilities(locationCode));
    }
    logger.info(`Facility mirror hydrated`, { locations: locations.length });
    return locations.length;
  }

  /**
   * Last committed collection for a location, without touching the store
   */
  snapshot(locationCode: string): FacilityRecord[] {
    return structuredClone(this.mirror.get(locationCode) ?? []);
  }

  locations(): string[] {
    return [...this.mirror.keys()].sort();
  }

  async read(locationCode: string): Promise<FacilityRecord[]> {
    return this.store.getFacilities(locationCode);
  }

  async commit(locationCode: string, records: FacilityRecord[]): Promise<void> {
    await this.store.replaceFacilities(locationCode, records);
    const committed = structuredClone(records);
    this.mirror.set(locationCode, committed);
    try {
      this.events.emit(CHANGED, { locationCode, records: structuredClone(committed) });
    } catch (error) {
      // The write already landed
      logger.error("facilitiesChanged listener threw", {
        locationCode,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  onChange(listener: FacilitiesChangedListener): () => void {
    this.events.on(CHANGED, listener);
    return () => {
      this.events.off(CHANGED, listener);
    };
  }
}
