/**
 * Configuration Manager - Groups parsed environment settings by concern
 */

import path from "path";
import { ContactPrecedence } from "../models/merge-policy.model";
import logger from "../utils/logger";
import { AppConfig, config } from "./config";

export class ConfigManager {
  private static instance: ConfigManager;

  /**
   * Sync configuration
   * Access: ConfigManager.getInstance().sync
   */
  public readonly sync: {
    schedule?: string;
    outboxSchedule?: string;
    contactPrecedence: ContactPrecedence;
  };

  /**
   * Collaborative backend configuration
   * Access: ConfigManager.getInstance().remote
   */
  public readonly remote: {
    baseUrl?: string;
    apiKey?: string;
    timeoutMs: number;
  };

  /**
   * Bundled baseline configuration
   * Access: ConfigManager.getInstance().baseline
   */
  public readonly baseline: {
    csvPath: string;
    datasetVersion: number;
    datasetDate: Date;
  };

  /**
   * Private constructor (Singleton)
   */
  private constructor(env: AppConfig) {
    this.sync = {
      schedule: env.SYNC_SCHEDULE,
      outboxSchedule: env.OUTBOX_SCHEDULE,
      contactPrecedence: env.CONTACT_PRECEDENCE,
    };

    this.remote = {
      baseUrl: env.REMOTE_STORE_URL,
      apiKey: env.REMOTE_STORE_API_KEY,
      timeoutMs: env.REMOTE_TIMEOUT_MS,
    };

    this.baseline = {
      csvPath: path.resolve(env.BASELINE_CSV_PATH),
      datasetVersion: env.BASELINE_DATASET_VERSION,
      datasetDate: env.BASELINE_DATASET_DATE,
    };

    this.logConfiguration();
  }

  /**
   * Get singleton instance
   */
  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager(config);
    }
    return ConfigManager.instance;
  }

  /**
   * Build an instance from explicit settings (tests, scripts)
   */
  public static fromConfig(env: AppConfig): ConfigManager {
    return new ConfigManager(env);
  }

  /**
   * Log configuration (no secrets)
   */
  private logConfiguration(): void {
    if (this.remote.baseUrl) {
      logger.info(`Remote store: ${this.remote.baseUrl}`);
    } else {
      logger.info("No remote store configured - running on local data only");
    }
  }

  /**
   * Validate configuration
   */
  public validate(): void {
    const errors: string[] = [];

    if (this.remote.apiKey && !this.remote.baseUrl) {
      errors.push("REMOTE_STORE_API_KEY is set but REMOTE_STORE_URL is not");
    }

    if (this.baseline.datasetVersion < 1) {
      errors.push("BASELINE_DATASET_VERSION must be >= 1 to import the bundled dataset");
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed: ${errors.join(", ")}`);
    }
  }
}
