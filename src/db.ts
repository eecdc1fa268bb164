import pg from "pg";
import type { Logger } from "./logger.js";
import { formatError } from "./util/error-format.js";

export type Db = {
  database: string;
  pool: pg.Pool;
};

export type QueryRow = Record<string, unknown>;

export type SslMode = "disable" | "require" | "verify-full";

export type DbConnectionOptions = {
  host: string;
  port: number;
  user: string;
  password: string;
  sslMode: SslMode;
  connectionTimeoutMs: number;
  statementTimeoutMs: number;
  maxPerDatabase: number;
  idleTimeoutMs: number;
  logger?: Logger;
};

/**
 * Read-only query access to every database of one server.
 *
 * The precheck talks to many databases on the same host; each gets its own small
 * pool, opened on first use and torn down by `closeAll`.
 */
export interface DbRegistry {
  query(database: string, sql: string, params?: readonly unknown[]): Promise<QueryRow[]>;
  openDatabases(): string[];
  closeAll(): Promise<void>;
}

export function sslConfig(mode: SslMode): pg.PoolConfig["ssl"] {
  if (mode === "disable") return false;
  // psql's sslmode=require encrypts without verifying the certificate chain.
  if (mode === "require") return { rejectUnauthorized: false };
  return { rejectUnauthorized: true };
}

export function createDb(database: string, opts: DbConnectionOptions): Db {
  const pool = new pg.Pool({
    host: opts.host,
    port: opts.port,
    user: opts.user,
    password: opts.password,
    database,
    ssl: sslConfig(opts.sslMode),
    max: opts.maxPerDatabase,
    idleTimeoutMillis: opts.idleTimeoutMs,
    connectionTimeoutMillis: opts.connectionTimeoutMs,
    statement_timeout: opts.statementTimeoutMs,
    query_timeout: opts.statementTimeoutMs + 1_000,
    application_name: "pg-upgrade-precheck",
    options: "-c default_transaction_read_only=on",
  });
  // An idle client dropped by the server must not crash the process.
  pool.on("error", (err) => {
    opts.logger?.warn({ database, err: formatError(err) }, "idle connection error");
  });
  return { database, pool };
}

export async function withClient<T>(db: Db, fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await db.pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

export async function closeDb(db: Db): Promise<void> {
  await db.pool.end();
}

export function createDbRegistry(opts: DbConnectionOptions): DbRegistry {
  const dbs = new Map<string, Db>();

  const dbFor = (database: string): Db => {
    const hit = dbs.get(database);
    if (hit) return hit;
    const db = createDb(database, opts);
    dbs.set(database, db);
    return db;
  };

  return {
    async query(database: string, sql: string, params: readonly unknown[] = []): Promise<QueryRow[]> {
      const r = await withClient(dbFor(database), (client) => client.query<QueryRow>(sql, [...params]));
      return r.rows;
    },

    openDatabases(): string[] {
      return [...dbs.keys()];
    },

    async closeAll(): Promise<void> {
      const open = [...dbs.values()];
      dbs.clear();
      const results = await Promise.allSettled(open.map((db) => closeDb(db)));
      for (const [i, r] of results.entries()) {
        if (r.status === "rejected") {
          opts.logger?.warn({ database: open[i]?.database, err: formatError(r.reason) }, "failed to close pool");
        }
      }
    },
  };
}
