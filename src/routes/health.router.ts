// src/routes/health.router.ts

/**
 * Why:
 * - Liveness answers "is the process up?" and touches nothing outside it.
 * - Readiness answers "can this instance take traffic?" with fast, bounded
 *   checks only.
 *
 * Notes:
 * - Readiness always pings the database. DEEP_PING=1 also HEADs the renderer
 *   (500ms timeout); any HTTP status counts as reachable.
 */

import express from "express";
import axios from "axios";
import { SERVICE_NAME } from "../config";

export type CheckResult = { ok: true } | { ok: false; error: string };

export type ReadinessProbe = () => Promise<void>;

type Options = {
  probes: Record<string, ReadinessProbe>;
};

function errorText(err: unknown): string {
  if (axios.isAxiosError(err)) return err.code || err.message;
  return err instanceof Error ? err.message : String(err);
}

/** HEAD the renderer; resolves on any HTTP answer, rejects on network failure. */
export function rendererProbe(url: string, timeoutMs = 500): ReadinessProbe {
  return async () => {
    await axios.head(url, { timeout: timeoutMs, validateStatus: () => true });
  };
}

export async function runProbes(
  probes: Record<string, ReadinessProbe>
): Promise<Record<string, CheckResult>> {
  const entries = await Promise.all(
    Object.entries(probes).map(async ([name, probe]) => {
      try {
        await probe();
        return [name, { ok: true }] as const;
      } catch (err) {
        return [name, { ok: false, error: errorText(err) }] as const;
      }
    })
  );
  return Object.fromEntries(entries);
}

export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const liveness = (_req: express.Request, res: express.Response) => {
    res.json({ status: "ok", service: SERVICE_NAME });
  };

  router.get("/healthz", liveness);
  router.head("/healthz", liveness);

  router.get("/readyz", (_req, res, next) => {
    runProbes(opts.probes)
      .then((checks) => {
        const ready = Object.values(checks).every((c) => c.ok);
        res
          .status(ready ? 200 : 503)
          .json({ status: ready ? "ready" : "not_ready", checks });
      })
      .catch(next);
  });

  return router;
}
