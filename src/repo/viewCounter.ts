// src/repo/viewCounter.ts
/**
 * Live per-(service, user) view counter.
 *
 * One atomic upsert per badge hit: the row is created at 1 or incremented, and
 * the new value comes back in the same round trip.
 */

export interface ViewCounter {
  /** Records one view and returns the total after it. */
  increment(service: string, user: string): Promise<number>;
}

export const INCREMENT_VIEWS_SQL = `
INSERT INTO profile_views (service, username, count, updated_at)
VALUES ($1, $2, 1, now())
ON CONFLICT (service, username)
DO UPDATE SET count = profile_views.count + 1, updated_at = now()
RETURNING count`;

export type CountRow = { count: string | number };

/** The one call the counter makes; pg.Pool fits. */
export interface Queryable {
  query(text: string, values: unknown[]): Promise<{ rows: CountRow[] }>;
}

export class PgViewCounter implements ViewCounter {
  constructor(private readonly pool: Queryable) {}

  async increment(service: string, user: string): Promise<number> {
    const res = await this.pool.query(INCREMENT_VIEWS_SQL, [
      service,
      user,
    ]);
    const row = res.rows[0];
    if (!row) {
      throw new Error(`view counter returned no row for ${service}/${user}`);
    }
    // BIGINT arrives as a string from pg.
    const n = Number(row.count);
    if (!Number.isSafeInteger(n) || n < 1) {
      throw new Error(`view counter returned invalid count "${row.count}"`);
    }
    return n;
  }
}
