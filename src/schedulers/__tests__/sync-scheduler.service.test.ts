import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeRemoteStore, immediateExecutor, makeRecord, unavailable } from '../../__tests__/fixtures';
import { FacilityRepository } from '../../services/store/facility.repository';
import { MemoryFacilityStore } from '../../services/store/memoryFacility.store';
import { FacilitySyncService } from '../../services/sync/facilitySync.service';
import { KeyedMutex } from '../../services/sync/keyedMutex';
import { OutboxDispatcher } from '../../services/sync/outbox.dispatcher';
import logger from '../../utils/logger';
import { SyncScheduler } from '../sync-scheduler.service';

describe('SyncScheduler', () => {
  let repository: FacilityRepository;
  let remote: FakeRemoteStore;
  let outbox: OutboxDispatcher;
  let scheduler: SyncScheduler;

  beforeEach(() => {
    repository = new FacilityRepository(new MemoryFacilityStore());
    remote = new FakeRemoteStore();
    const locks = new KeyedMutex();
    outbox = new OutboxDispatcher(repository, remote, locks, { executor: immediateExecutor() });
    const sync = new FacilitySyncService(repository, remote, locks, outbox);
    scheduler = new SyncScheduler(repository, sync, outbox);
  });

  afterEach(async () => {
    scheduler.stop();
    await outbox.whenIdle();
    vi.restoreAllMocks();
  });

  it('rejects invalid and duplicate schedules', () => {
    expect(() => scheduler.scheduleJob('bad', 'not a cron', async () => {})).toThrow(
      "Job 'bad' has an invalid schedule: not a cron",
    );

    scheduler.scheduleLocationSync('*/15 * * * *');
    expect(() => scheduler.scheduleLocationSync('*/5 * * * *')).toThrow("Job 'facility-sync' already exists");
  });

  it('logs a failing job instead of throwing', async () => {
    const errorSpy = vi.spyOn(logger, 'error');

    await expect(
      scheduler.runJob('broken', async () => {
        throw new Error('boom');
      }),
    ).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith('✖ broken failed', { error: 'boom' });
  });

  it('syncs every known location and reports offline ones', async () => {
    await repository.commit('KXMP', [makeRecord({ locationCode: 'KXMP' })]);
    await repository.commit('KQRT', [makeRecord({ locationCode: 'KQRT', name: 'Summit Air Services' })]);
    remote.queryFailure = unavailable();
    const warnSpy = vi.spyOn(logger, 'warn');

    await scheduler.syncAllLocations();

    expect(remote.queryCalls).toBe(2);
    expect(warnSpy).toHaveBeenCalledWith('2/2 locations served from local data');
  });
});
