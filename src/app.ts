// src/app.ts
/**
 * Purpose:
 * - Assemble the express app. No listening here; Lifecycle owns the server.
 *
 * Order:
 *   request logging → health → badge route → 404 → error funnel
 *
 * Invariants:
 * - The route table is built once, here.
 * - Every dependency arrives through `AppDeps`; nothing is read from env.
 */

import express, { type Express } from "express";
import type { UpstreamTarget } from "./proxy/director";
import type { BadgeTransport } from "./proxy/transport";
import type { ViewCounter } from "./repo/viewCounter";
import type { Logger } from "./utils/logger";
import { makeHttpLogger } from "./middleware/httpLogger";
import {
  errorProblemJson,
  notFoundProblemJson,
} from "./middleware/problemJson";
import { createHealthRouter, type ReadinessProbe } from "./routes/health.router";
import { createStatsRouter } from "./routes/stats.router";

export type AppDeps = {
  log: Logger;
  target: UpstreamTarget;
  transport: BadgeTransport;
  views: ViewCounter;
  services: ReadonlyMap<string, string>;
  badge: { label: string; color: string };
  probes?: Record<string, ReadinessProbe>;
};

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(makeHttpLogger(deps.log));

  app.use(createHealthRouter({ probes: deps.probes ?? {} }));

  app.use(
    createStatsRouter({
      target: deps.target,
      transport: deps.transport,
      views: deps.views,
      services: deps.services,
      badge: deps.badge,
      log: deps.log,
    })
  );

  app.use(notFoundProblemJson());
  app.use(errorProblemJson(deps.log));

  return app;
}
