import { config as defaultConfig, AppConfig } from "./config/config";
import { ConfigManager } from "./config/config.manager";
import type { MergeOptions } from "./models/merge-policy.model";
import { FacilityCatalogService } from "./services/facility/facilityCatalog.service";
import { BaselineImportService } from "./services/import/baselineImport.service";
import { HttpRemoteFacilityStore } from "./services/remote/httpRemoteFacility.store";
import type { RemoteFacilityStore } from "./services/remote/remoteFacility.store";
import { FacilityRepository } from "./services/store/facility.repository";
import type { FacilityStore } from "./services/store/facility.store";
import { MemoryFacilityStore } from "./services/store/memoryFacility.store";
import { PostgresFacilityStore } from "./services/store/postgresFacility.store";
import { FacilitySyncService } from "./services/sync/facilitySync.service";
import { KeyedMutex } from "./services/sync/keyedMutex";
import { OutboxDispatcher } from "./services/sync/outbox.dispatcher";
import logger from "./utils/logger";

export interface ServiceContainer {
  settings: ConfigManager;
  storeDriver: AppConfig["STORE_DRIVER"];
  store: FacilityStore;
  repository: FacilityRepository;
  locks: KeyedMutex;
  remote: RemoteFacilityStore | null;
  outbox: OutboxDispatcher;
  syncService: FacilitySyncService;
  catalog: FacilityCatalogService;
  importService: BaselineImportService;
}

export interface ContainerOverrides {
  store?: FacilityStore;
  remote?: RemoteFacilityStore | null;
  now?: () => Date;
}

const createStore = (env: AppConfig): FacilityStore =>
  env.STORE_DRIVER === "postgres" ? new PostgresFacilityStore() : new MemoryFacilityStore();

const createRemote = (settings: ConfigManager): RemoteFacilityStore | null => {
  const { baseUrl, apiKey, timeoutMs } = settings.remote;
  return baseUrl ? new HttpRemoteFacilityStore({ baseUrl, apiKey, timeoutMs }) : null;
};

/**
 * Wires every service around one store, one remote client and one lock table
 */
export const createContainer = (
  env: AppConfig = defaultConfig,
  overrides: ContainerOverrides = {},
): ServiceContainer => {
  const settings = env === defaultConfig ? ConfigManager.getInstance() : ConfigManager.fromConfig(env);
  settings.validate();

  const mergeOptions: MergeOptions = { contactPrecedence: settings.sync.contactPrecedence };
  const store = overrides.store ?? createStore(env);
  const remote = overrides.remote !== undefined ? overrides.remote : createRemote(settings);
  const repository = new FacilityRepository(store);
  const locks = new KeyedMutex();

  const outbox = new OutboxDispatcher(repository, remote, locks, { mergeOptions });
  const syncService = new FacilitySyncService(repository, remote, locks, outbox, {
    mergeOptions,
    now: overrides.now,
  });
  const catalog = new FacilityCatalogService(repository, syncService, outbox, locks, {
    mergeOptions,
    now: overrides.now,
  });
  const importService = new BaselineImportService(repository, locks, {
    csvPath: settings.baseline.csvPath,
    datasetVersion: settings.baseline.datasetVersion,
    datasetDate: settings.baseline.datasetDate,
    mergeOptions,
    now: overrides.now,
  });

  return {
    settings,
    storeDriver: env.STORE_DRIVER,
    store,
    repository,
    locks,
    remote,
    outbox,
    syncService,
    catalog,
    importService,
  };
};

/**
 * Schema, mirror, then the bundled baseline if the stored version is behind
 */
export const initializeContainer = async (container: ServiceContainer): Promise<void> => {
  if (container.store instanceof PostgresFacilityStore) {
    await container.store.ensureSchema();
  }
  await container.repository.hydrate();

  const result = await container.importService.runIfOutdated();
  logger.info(`Baseline dataset ${result.status}`, { datasetVersion: result.datasetVersion });
};
