import { Pool, PoolConfig, PoolClient, QueryResultRow } from "pg";
import logger from "../utils/logger";
import { config } from "./config";

let pool: Pool | null = null;
let poolClosed = false;

// ═══════════════════════════════════════════════════════════════
// Pool Configuration
// ═══════════════════════════════════════════════════════════════
const buildPoolConfig = (): PoolConfig => ({
  host: config.DB_HOST,
  port: config.DB_PORT,
  database: config.DB_NAME,
  user: config.DB_USER,
  password: config.DB_PASSWORD,
  max: config.DB_MAX_CONNECTIONS,
  idleTimeoutMillis: 15000,
  connectionTimeoutMillis: 15000,
  ssl: config.DB_SSL ? { rejectUnauthorized: false } : undefined,
});

// ═══════════════════════════════════════════════════════════════
// Pool Instance (created on first use so the memory driver never opens one)
// ═══════════════════════════════════════════════════════════════
export const getPool = (): Pool => {
  if (pool) return pool;

  const poolConfig = buildPoolConfig();
  if (config.NODE_ENV === "development") {
    logger.debug("Database pool configuration:", {
      ...poolConfig,
      password: "***HIDDEN***",
    });
  }

  pool = new Pool(poolConfig);
  poolClosed = false;

  pool.on("error", (err) => {
    logger.error("Unexpected error on idle client", { error: err.message });
  });

  pool.on("connect", () => {
    logger.info("New database connection established");
  });

  return pool;
};

// ═══════════════════════════════════════════════════════════════
// query() - Returns rows array directly
// ═══════════════════════════════════════════════════════════════
export const query = async <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<T[]> => {
  const start = Date.now();
  try {
    const res = await getPool().query<T>(text, params);
    const duration = Date.now() - start;

    logger.debug("Query executed", {
      duration: `${duration}ms`,
      rows: res.rowCount,
      query: text.substring(0, 100),
    });

    return res.rows;
  } catch (error) {
    const duration = Date.now() - start;
    logger.error("Database query error:", {
      error: error instanceof Error ? error.message : error,
      query: text.substring(0, 200),
      duration: `${duration}ms`,
    });
    throw error;
  }
};

// ═══════════════════════════════════════════════════════════════
// transaction() - Execute queries in a transaction
// Use when: Multiple queries must succeed or fail together
// ═══════════════════════════════════════════════════════════════
export const transaction = async <T>(
  callback: (client: PoolClient) => Promise<T>,
): Promise<T> => {
  const client = await getPool().connect();
  const startTime = Date.now();

  // Warn if client is held too long
  const leakTimer = setTimeout(() => {
    logger.warn("Client checkout exceeded 5 seconds", {
      duration: `${Date.now() - startTime}ms`,
    });
  }, 5000);

  try {
    await client.query("BEGIN");
    const result = await callback(client);
    await client.query("COMMIT");

    logger.debug("Transaction committed", {
      duration: `${Date.now() - startTime}ms`,
    });
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    logger.error("Transaction rolled back", {
      error: error instanceof Error ? error.message : error,
      duration: `${Date.now() - startTime}ms`,
    });
    throw error;
  } finally {
    clearTimeout(leakTimer);
    client.release();
  }
};

// ═══════════════════════════════════════════════════════════════
// Utility Functions
// ═══════════════════════════════════════════════════════════════

/**
 * Get current pool statistics
 */
export const getPoolStats = () => {
  if (!pool) return { total: 0, idle: 0, waiting: 0 };
  return {
    total: pool.totalCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount,
  };
};

/**
 * Execute raw SQL (schema bootstrap)
 */
export const executeSql = async (sql: string): Promise<void> => {
  const client = await getPool().connect();
  try {
    await client.query(sql);
    logger.info("SQL executed successfully");
  } catch (error) {
    logger.error("Error executing SQL:", {
      error: error instanceof Error ? error.message : error,
    });
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Gracefully close the pool
 */
export const closePool = async (): Promise<void> => {
  if (!pool || poolClosed) {
    return;
  }

  try {
    logger.info("Closing database pool...", getPoolStats());
    await pool.end();
    poolClosed = true;
    pool = null;
    logger.info("Database pool closed successfully");
  } catch (error) {
    logger.error("Error closing database pool:", {
      error: error instanceof Error ? error.message : error,
    });
    throw error;
  }
};
