import dotenv from "dotenv";
import { z } from "zod";
import { ContactPrecedence } from "../models/merge-policy.model";

dotenv.config();

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
    PORT: z.coerce.number().int().positive().default(3000),

    // Local store
    STORE_DRIVER: z.enum(["postgres", "memory"]).default("memory"),
    DB_HOST: z.string().optional(),
    DB_NAME: z.string().optional(),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
    DB_SSL: z
      .enum(["true", "false"])
      .default("false")
      .transform((value) => value === "true"),

    // Collaborative backend
    REMOTE_STORE_URL: z.string().url().optional(),
    REMOTE_STORE_API_KEY: z.string().optional(),
    REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

    // Bundled baseline
    BASELINE_CSV_PATH: z.string().default("data/fbo-baseline.csv"),
    BASELINE_DATASET_VERSION: z.coerce.number().int().nonnegative().default(1),
    BASELINE_DATASET_DATE: z.coerce.date().default(new Date("2024-04-01T00:00:00Z")),

    // Scheduling and merge policy
    SYNC_SCHEDULE: z.string().optional(),
    OUTBOX_SCHEDULE: z.string().optional(),
    CONTACT_PRECEDENCE: z
      .nativeEnum(ContactPrecedence)
      .default(ContactPrecedence.LATEST_UPDATE),

    // Logging
    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER !== "postgres") return;
    for (const key of ["DB_HOST", "DB_NAME", "DB_USER", "DB_PASSWORD"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when STORE_DRIVER=postgres`,
        });
      }
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export const parseEnv = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  try {
    return envSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missing = error.issues
        .map((issue) => issue.path.join("."))
        .join(", ");

      throw new Error(`Missing or invalid environment variables: ${missing}`);
    }
    throw error;
  }
};

export const config = parseEnv();
