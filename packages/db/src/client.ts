import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_POOL_MAX = 10;

/**
 * Drizzle client plus a `close` that drains the underlying connection pool.
 */
export function createDatabase(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_POOL_MAX,
    idle_timeout: 30,
    connect_timeout: 10,
    onnotice: () => undefined,
  });

  return {
    db: drizzle(connection, { schema }),
    close: () => connection.end({ timeout: 5 }),
  };
}

export function createDbClient(options: DbClientOptions) {
  return createDatabase(options).db;
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = ReturnType<typeof createDatabase>;
