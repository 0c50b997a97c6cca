/**
 * PostgreSQL connection pool shared by the pgvector store and the ingestion
 * state repository.
 */
import type { AppConfig } from "@config/index";
import { logger } from "@infra/logging/Logger";
import { Pool } from "pg";

export type SqlRow = Record<string, unknown>;

/** The slice of pg's Pool the repositories use. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: SqlRow[]; rowCount?: number | null }>;
}

export function createPool(config: AppConfig["db"]): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.max,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });

  pool.on("error", (err) => {
    logger.log("error", "Unexpected PG pool error", { message: err.message });
  });

  return pool;
}

const CONNECTION_ERROR_CLASSES = ["08", "28", "53", "57"];

/** Connection, auth, resource and shutdown failures; worth retrying later. */
export function isConnectionError(error: unknown): boolean {
  if (error === null || typeof error !== "object") {
    return false;
  }
  const code = "code" in error ? String(error.code) : "";
  return (
    CONNECTION_ERROR_CLASSES.some((prefix) => code.startsWith(prefix)) ||
    ["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"].includes(code) ||
    (error instanceof Error && /connection|timeout/i.test(error.message))
  );
}
