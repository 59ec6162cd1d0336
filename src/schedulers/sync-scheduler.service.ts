import cron, { ScheduledTask } from "node-cron";
import type { FacilityRepository } from "../services/store/facility.repository";
import type { FacilitySyncService } from "../services/sync/facilitySync.service";
import type { OutboxDispatcher } from "../services/sync/outbox.dispatcher";
import logger, { getErrorMessage } from "../utils/logger";

export class SyncScheduler {
  private jobs: Map<string, ScheduledTask> = new Map();

  constructor(
    private readonly repository: FacilityRepository,
    private readonly syncService: FacilitySyncService,
    private readonly outbox: OutboxDispatcher,
  ) {}

  // ----------------------
  // Job Scheduling
  // ----------------------
  public scheduleJob(name: string, schedule: string, task: () => Promise<void>): void {
    if (this.jobs.has(name)) throw new Error(`Job '${name}' already exists`);
    if (!cron.validate(schedule)) throw new Error(`Job '${name}' has an invalid schedule: ${schedule}`);

    const job = cron.schedule(schedule, () => this.runJob(name, task), { scheduled: false, timezone: "UTC" });

    this.jobs.set(name, job);
    logger.info(`Scheduled '${name}' -> ${schedule}`);
  }

  /**
   * Runs one job tick; failures are logged and never stop the schedule
   */
  public async runJob(name: string, task: () => Promise<void>): Promise<void> {
    const startedAt = Date.now();
    logger.debug(`▶ ${name} started`);
    try {
      await task();
      logger.info(`✔ ${name} finished in ${Date.now() - startedAt}ms`);
    } catch (err) {
      logger.error(`✖ ${name} failed`, { error: getErrorMessage(err) });
    }
  }

  public scheduleLocationSync(schedule: string): void {
    this.scheduleJob("facility-sync", schedule, () => this.syncAllLocations());
  }

  public scheduleOutboxFlush(schedule: string): void {
    this.scheduleJob("outbox-flush", schedule, () => this.outbox.scheduleAll());
  }

  /**
   * One location at a time to keep load on the backend flat
   */
  public async syncAllLocations(): Promise<void> {
    let offline = 0;
    const locations = this.repository.locations();
    for (const locationCode of locations) {
      const result = await this.syncService.syncLocation(locationCode);
      if (result.outcome === "offline") offline++;
    }
    if (offline > 0) {
      logger.warn(`${offline}/${locations.length} locations served from local data`);
    }
  }

  // ----------------------
  // Lifecycle
  // ----------------------
  public start(): void {
    this.jobs.forEach((job) => job.start());
    logger.info("--- Scheduler started ---", { jobs: [...this.jobs.keys()] });
  }

  public stop(): void {
    logger.info("Stopping scheduler...");
    this.jobs.forEach((job) => job.stop());
  }
}
