import { ResilienceExecutor } from '../executors/resilienceExecutor';
import { RemoteStoreError } from '../errors/facility.errors';
import type { RemoteFacilityStore } from '../services/remote/remoteFacility.store';
import type { Amenities, FacilityRecord } from '../types/facility.types';

export const NO_AMENITIES: Amenities = {
  crewCar: false,
  crewLounge: false,
  catering: false,
  maintenance: false,
  hangars: false,
  deice: false,
  oxygen: false,
  groundPower: false,
  lavatoryService: false,
};

let sequence = 0;

export function makeRecord(overrides: Partial<FacilityRecord> = {}): FacilityRecord {
  sequence++;
  return {
    id: `rec-${sequence}`,
    locationCode: 'KXMP',
    name: 'Harbor Field Aviation',
    phone: null,
    radioFrequency: null,
    website: null,
    jetAPrice: null,
    avgasPrice: null,
    fuelPriceDate: null,
    fuelPriceReporter: null,
    amenities: { ...NO_AMENITIES },
    handlingFee: null,
    overnightFee: null,
    rampFee: null,
    rampFeeWaived: false,
    averageRating: null,
    ratingCount: null,
    lastUpdated: new Date('2024-01-01T00:00:00Z'),
    updatedBy: null,
    remoteIdentifier: null,
    isVerified: false,
    pendingPush: false,
    ...overrides,
  };
}

/**
 * In-process stand-in for the collaborative backend
 */
export class FakeRemoteStore implements RemoteFacilityStore {
  readonly facilities = new Map<string, FacilityRecord[]>();
  readonly saved: FacilityRecord[] = [];
  readonly updated: Array<{ remoteIdentifier: string; record: FacilityRecord }> = [];
  readonly deleted: string[] = [];

  queryFailure: Error | null = null;
  writeFailure: Error | null = null;
  queryCalls = 0;
  private nextId = 0;

  async queryByLocation(locationCode: string): Promise<FacilityRecord[]> {
    this.queryCalls++;
    if (this.queryFailure) throw this.queryFailure;
    return structuredClone(this.facilities.get(locationCode) ?? []);
  }

  async save(record: FacilityRecord): Promise<string> {
    if (this.writeFailure) throw this.writeFailure;
    this.nextId++;
    this.saved.push(structuredClone(record));
    return `remote-${this.nextId}`;
  }

  async update(remoteIdentifier: string, record: FacilityRecord): Promise<void> {
    if (this.writeFailure) throw this.writeFailure;
    this.updated.push({ remoteIdentifier, record: structuredClone(record) });
  }

  async delete(remoteIdentifier: string): Promise<void> {
    if (this.writeFailure) throw this.writeFailure;
    this.deleted.push(remoteIdentifier);
  }
}

export const unavailable = () => new RemoteStoreError('Query facilities failed (HTTP 503)', 503);

/**
 * One attempt, no waiting, circuit never opens
 */
export const immediateExecutor = () =>
  new ResilienceExecutor({ maxRetries: 1, baseDelay: 0, jitter: 0 }, { threshold: 1000 });
