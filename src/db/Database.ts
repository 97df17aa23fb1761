// src/db/Database.ts
/**
 * Purpose:
 * - Owns the Postgres pool for the life of the process.
 *
 * Invariants:
 * - connect() must succeed before the HTTP listener exists (Lifecycle enforces).
 * - close() ends the pool exactly once; later calls await the same promise.
 * - Request code queries the pool but never closes it.
 */

import fs from "node:fs";
import path from "node:path";
import { Pool } from "pg";
import type { Logger } from "../utils/logger";

/** Resource the Lifecycle owns and releases on every exit path. */
export interface ResourcePool {
  connect(): Promise<void>;
  close(): Promise<void>;
}

/** The slice of pg.Pool this class drives. */
export interface PgPoolLike {
  connect(): Promise<{ query(text: string): Promise<unknown>; release(): void }>;
  query(text: string): Promise<unknown>;
  end(): Promise<void>;
  on(event: "error", listener: (err: Error) => void): unknown;
}

// src/db → ../../sql ; dist/src/db → ../../../sql
const SCHEMA_CANDIDATES = [
  path.resolve(__dirname, "../../sql/schema.sql"),
  path.resolve(__dirname, "../../../sql/schema.sql"),
];

export function readSchemaSql(candidates: string[] = SCHEMA_CANDIDATES): string {
  for (const p of candidates) {
    if (fs.existsSync(p)) return fs.readFileSync(p, "utf8");
  }
  throw new Error(`schema.sql not found. Looked in: ${candidates.join(", ")}`);
}

export function createPgPool(cfg: {
  databaseUrl: string;
  databasePoolMax: number;
}): Pool {
  return new Pool({
    connectionString: cfg.databaseUrl,
    max: cfg.databasePoolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
}

export class Database implements ResourcePool {
  private readonly pool: PgPoolLike;
  private readonly log: Logger;
  private closing: Promise<void> | null = null;

  constructor(opts: { pool: PgPoolLike; log: Logger }) {
    this.pool = opts.pool;
    this.log = opts.log.child({ component: "db" });

    // pg emits idle-client errors on the pool; without a listener they crash the process.
    this.pool.on("error", (err) => {
      this.log.error({ err }, "idle database client error");
    });
  }

  /** Acquire one client to prove connectivity and ensure the schema exists. */
  async connect(): Promise<void> {
    this.log.info("connecting to database");
    const client = await this.pool.connect();
    try {
      await client.query(readSchemaSql());
    } finally {
      client.release();
    }
    this.log.info("database connected");
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.log.info("closing database pool");
      this.closing = this.pool.end();
    }
    return this.closing;
  }
}
