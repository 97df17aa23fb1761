// src/routes/stats.router.ts
/**
 * One route, one method. Every other method on the badge path is a 405 with
 * `Allow: GET` and never reaches the renderer. Express would otherwise answer
 * HEAD through the GET handler, so HEAD is claimed explicitly first.
 */

import express from "express";
import { createBadgeHandler, type BadgeControllerDeps } from "../controllers/badge.controller";
import { methodNotAllowed } from "../middleware/problemJson";

export const BADGE_ROUTE = "/stats/:service/:user/count.svg";

export function createStatsRouter(deps: BadgeControllerDeps): express.Router {
  const router = express.Router();
  const onlyGet = methodNotAllowed(["GET"]);

  router
    .route(BADGE_ROUTE)
    .head(onlyGet)
    .get(createBadgeHandler(deps))
    .all(onlyGet);

  return router;
}
