import axios, { AxiosError, AxiosInstance } from "axios";
import axiosRetry from "axios-retry";
import { ZodError, ZodType, ZodTypeDef } from "zod";
import { RemoteStoreError } from "../../errors/facility.errors";
import type { FacilityRecord } from "../../types/facility.types";
import logger from "../../utils/logger";
import type { RemoteFacilityStore } from "./remoteFacility.store";
import { queryResponseSchema, saveResponseSchema, toRemotePayload } from "./remoteFacility.schemas";

export interface HttpRemoteStoreConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  /** GET retries handled by axios-retry; writes are retried by the outbox */
  readRetries?: number;
}

export class HttpRemoteFacilityStore implements RemoteFacilityStore {
  private readonly http: AxiosInstance;

  constructor(config: HttpRemoteStoreConfig) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        "Content-Type": "application/json",
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
      },
    });

    // Automatic retries for idempotent reads only
    axiosRetry(this.http, {
      retries: config.readRetries ?? 2,
      retryDelay: axiosRetry.exponentialDelay,
      retryCondition: (error: AxiosError) =>
        error.config?.method === "get" &&
        (axiosRetry.isNetworkError(error) || (error.response?.status ?? 0) >= 500),
    });
  }

  async queryByLocation(locationCode: string, signal?: AbortSignal): Promise<FacilityRecord[]> {
    const body = await this.request("Query facilities", () =>
      this.http.get("/facilities", { params: { locationCode }, signal }),
    );
    return this.parse("Query facilities", queryResponseSchema, body).facilities;
  }

  async save(record: FacilityRecord): Promise<string> {
    const body = await this.request("Save facility", () =>
      this.http.post("/facilities", toRemotePayload(record)),
    );
    return this.parse("Save facility", saveResponseSchema, body).remoteId;
  }

  async update(remoteIdentifier: string, record: FacilityRecord): Promise<void> {
    await this.request("Update facility", () =>
      this.http.put(`/facilities/${encodeURIComponent(remoteIdentifier)}`, toRemotePayload(record)),
    );
  }

  async delete(remoteIdentifier: string): Promise<void> {
    try {
      await this.http.delete(`/facilities/${encodeURIComponent(remoteIdentifier)}`);
    } catch (error) {
      // Already gone remotely counts as deleted
      if (axios.isAxiosError(error) && error.response?.status === 404) return;
      throw this.toRemoteError(error, "Delete facility");
    }
  }

  // ----------------------
  // Helpers
  // ----------------------
  private async request(context: string, call: () => Promise<{ data: unknown }>): Promise<unknown> {
    try {
      const response = await call();
      return response.data;
    } catch (error) {
      throw this.toRemoteError(error, context);
    }
  }

  private parse<T>(context: string, schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
    try {
      return schema.parse(body);
    } catch (error) {
      if (error instanceof ZodError) {
        logger.warn(`[${context}] Malformed remote response`, {
          issues: error.issues.slice(0, 5).map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
        throw new RemoteStoreError(`${context} failed: malformed response`, undefined, error);
      }
      throw error;
    }
  }

  private toRemoteError(error: unknown, context: string): RemoteStoreError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      return new RemoteStoreError(
        `${context} failed${status ? ` (HTTP ${status})` : ""}: ${error.message}`,
        status,
        error,
      );
    }
    if (error instanceof RemoteStoreError) return error;
    return new RemoteStoreError(
      `${context} failed: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      error,
    );
  }
}
