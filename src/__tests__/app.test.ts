import axios, { AxiosInstance } from 'axios';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../app';
import { parseEnv } from '../config/config';
import { createContainer, ServiceContainer } from '../container';
import { MemoryFacilityStore } from '../services/store/memoryFacility.store';
import { makeRecord } from './fixtures';

const NOW = new Date('2024-08-15T10:00:00Z');

describe('HTTP API', () => {
  let container: ServiceContainer;
  let server: Server;
  let http: AxiosInstance;

  beforeEach(async () => {
    container = createContainer(parseEnv({ NODE_ENV: 'test' }), {
      store: new MemoryFacilityStore(),
      remote: null,
      now: () => NOW,
    });
    server = createApp(container).listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server has no TCP address');
    }
    http = axios.create({
      baseURL: `http://127.0.0.1:${address.port}`,
      validateStatus: () => true,
    });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  const importBaseline = () => http.post('/api/v1/imports/baseline', {});

  // ============================================================================
  // Baseline import
  // ============================================================================

  describe('POST /api/v1/imports/baseline', () => {
    it('imports once and reports up-to-date afterwards', async () => {
      const first = await importBaseline();
      const second = await importBaseline();

      expect(first.status).toBe(201);
      expect(first.data.data).toMatchObject({ status: 'imported', datasetVersion: 1, locations: 3, records: 6 });
      expect(second.status).toBe(200);
      expect(second.data.data.status).toBe('up-to-date');
    });

    it('rejects a non-boolean force flag', async () => {
      const response = await http.post('/api/v1/imports/baseline', { force: 'yes' });

      expect(response.status).toBe(400);
      expect(response.data.code).toBe('VALIDATION_FAILED');
      expect(response.data.details[0].field).toBe('force');
    });
  });

  // ============================================================================
  // Facilities
  // ============================================================================

  describe('facilities', () => {
    beforeEach(async () => {
      await importBaseline();
    });

    it('lists deduplicated records for a normalized location code', async () => {
      const response = await http.get('/api/v1/facilities/kxmp');

      expect(response.status).toBe(200);
      expect(response.data.data.locationCode).toBe('KXMP');
      expect(response.data.data.records.map((r: { name: string }) => r.name)).toEqual([
        'Harbor Field Aviation',
        'Lakeside Jet Center',
        'Northgate FBO',
      ]);
    });

    it('lists stored duplicates with the record each collapses into', async () => {
      await container.repository.commit('KXMP', [
        ...container.repository.snapshot('KXMP'),
        makeRecord({ id: 'dup', locationCode: 'KXMP', name: 'Harbor Field FBO' }),
      ]);

      const response = await http.get('/api/v1/facilities/kxmp/duplicates');

      expect(response.status).toBe(200);
      expect(response.data.data.locationCode).toBe('KXMP');
      expect(response.data.data.count).toBe(1);
      const [group] = response.data.data.groups;
      expect(group.key).toBe('harbor field');
      expect(group.winner.name).toBe('Harbor Field Aviation');
      expect(group.losers.map((r: { id: string }) => r.id)).toEqual(['dup']);
    });

    it('rejects a malformed location code', async () => {
      const response = await http.get('/api/v1/facilities/TOOLONG');

      expect(response.status).toBe(400);
      expect(response.data.code).toBe('VALIDATION_FAILED');
    });

    it('creates a new facility with 201', async () => {
      const response = await http.post('/api/v1/facilities/kxmp', {
        name: 'Pilot Shack',
        updatedBy: 'pilot-7',
        jetAPrice: 6.25,
      });

      expect(response.status).toBe(201);
      expect(response.data.data.outcome).toBe('created');
      expect(response.data.data.record).toMatchObject({
        locationCode: 'KXMP',
        name: 'Pilot Shack',
        jetAPrice: 6.25,
        fuelPriceDate: NOW.toISOString(),
        isVerified: false,
        pendingPush: true,
      });
    });

    it('merges an edit naming a verified facility with 200', async () => {
      const response = await http.post('/api/v1/facilities/KXMP', {
        name: 'harbor field fbo',
        updatedBy: 'pilot-7',
        amenities: { oxygen: true },
      });

      expect(response.status).toBe(200);
      expect(response.data.data.outcome).toBe('merged');
      expect(response.data.data.record.name).toBe('Harbor Field Aviation');
      expect(response.data.data.record.amenities.oxygen).toBe(true);
      expect(response.data.data.record.isVerified).toBe(true);
    });

    it('answers 409 when the name belongs to another user', async () => {
      await http.post('/api/v1/facilities/KXMP', { name: 'Pilot Shack', updatedBy: 'pilot-7' });
      const response = await http.post('/api/v1/facilities/KXMP', { name: 'PILOT SHACK', updatedBy: 'pilot-9' });

      expect(response.status).toBe(409);
      expect(response.data.code).toBe('DUPLICATE_FACILITY');
    });

    it('rejects edits claiming the import label', async () => {
      const response = await http.post('/api/v1/facilities/KXMP', { name: 'Pilot Shack', updatedBy: 'baseline-import' });

      expect(response.status).toBe(400);
      expect(response.data.details).toEqual([
        { field: 'updatedBy', message: '"baseline-import" is reserved for the baseline importer' },
      ]);
    });

    it('protects verified records from deletion', async () => {
      const [verified] = container.catalog.getRecords('KXMP');
      const response = await http.delete(`/api/v1/facilities/KXMP/${verified.id}`);

      expect(response.status).toBe(409);
      expect(response.data.code).toBe('PROTECTED_RECORD');
      expect(container.catalog.getRecords('KXMP')).toHaveLength(3);
    });

    it('deletes an unverified record with 204', async () => {
      const created = await http.post('/api/v1/facilities/KXMP', { name: 'Pilot Shack', updatedBy: 'pilot-7' });
      const response = await http.delete(`/api/v1/facilities/KXMP/${created.data.data.record.id}`);

      expect(response.status).toBe(204);
      expect(container.catalog.getRecords('KXMP')).toHaveLength(3);
    });

    it('answers 404 for an unknown facility', async () => {
      const response = await http.delete('/api/v1/facilities/KXMP/missing');

      expect(response.status).toBe(404);
      expect(response.data.code).toBe('FACILITY_NOT_FOUND');
    });

    it('serves local data when no remote store is configured', async () => {
      const response = await http.post('/api/v1/facilities/KQRT/sync');

      expect(response.status).toBe(200);
      expect(response.data.data).toMatchObject({ locationCode: 'KQRT', outcome: 'offline', fetched: 0 });
      expect(response.data.data.records).toHaveLength(2);
    });

    it('reports sync status', async () => {
      await http.post('/api/v1/facilities/KQRT/sync');
      const response = await http.get('/api/v1/facilities/KQRT/status');

      expect(response.status).toBe(200);
      expect(response.data.data).toMatchObject({
        locationCode: 'KQRT',
        lastSyncedAt: NOW.toISOString(),
        lastSyncOutcome: 'offline',
        recordCount: 2,
      });
    });
  });

  // ============================================================================
  // Health and fallbacks
  // ============================================================================

  it('reports readiness of the local store', async () => {
    const response = await http.get('/health/ready');

    expect(response.status).toBe(200);
    expect(response.data.status).toBe('ready');
    expect(response.data.checks).toMatchObject({ store: 'healthy', driver: 'memory' });
  });

  it('tags each response with a generated request id', async () => {
    const response = await http.get('/health/ready');

    expect(response.headers['x-request-id']).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  it('echoes a request id supplied by the caller', async () => {
    const response = await http.get('/health/ready', { headers: { 'X-Request-ID': 'req-test-1' } });

    expect(response.headers['x-request-id']).toBe('req-test-1');
  });

  it('answers unknown routes with ROUTE_NOT_FOUND', async () => {
    const response = await http.get('/api/v1/nothing-here');

    expect(response.status).toBe(404);
    expect(response.data.code).toBe('ROUTE_NOT_FOUND');
  });
});
