// src/controllers/badge.controller.ts
/**
 * Purpose:
 * - GET /stats/:service/:user/count.svg
 *   resolve display name → record the view → direct a copy of the request at
 *   the renderer → stream the renderer's answer back untouched.
 *
 * Invariants:
 * - The inbound Request is only read. The director works on a snapshot copy.
 * - Exactly one upstream attempt per inbound request.
 * - Upstream failures map to 502 (504 on timeout) and are logged at warn.
 *   They are expected operational noise, never fatal.
 */

import type { Request, RequestHandler, Response } from "express";
import {
  CountUnavailableError,
  UnknownServiceError,
  UpstreamTimeoutError,
  isErrnoException,
} from "../errors";
import { sendProblem } from "../middleware/problemJson";
import { buildBadgeQuery } from "../proxy/badgeQuery";
import {
  createDirector,
  isHopByHop,
  snapshotInbound,
  toOutbound,
  type UpstreamTarget,
} from "../proxy/director";
import type { BadgeTransport, UpstreamResponse } from "../proxy/transport";
import type { ViewCounter } from "../repo/viewCounter";
import type { Logger } from "../utils/logger";

export interface BadgeControllerDeps {
  target: UpstreamTarget;
  transport: BadgeTransport;
  views: ViewCounter;
  services: ReadonlyMap<string, string>;
  badge: { label: string; color: string };
  log: Logger;
}

export function createBadgeHandler(deps: BadgeControllerDeps): RequestHandler {
  const direct = createDirector(deps.target);
  const log = deps.log.child({ component: "badge" });

  async function handle(req: Request, res: Response): Promise<void> {
    const service = String(req.params.service).toLowerCase();
    const user = String(req.params.user);

    const displayName = deps.services.get(service);
    if (!displayName) throw new UnknownServiceError(service);

    let count: number;
    try {
      count = await deps.views.increment(service, user);
    } catch (err) {
      log.error({ err, service, user }, "failed to record profile view");
      throw new CountUnavailableError(err);
    }

    const inbound = snapshotInbound(req);
    const out = toOutbound(inbound, deps.target);
    direct(
      out,
      inbound,
      buildBadgeQuery({
        displayName,
        count,
        defaults: deps.badge,
        query: req.query,
      })
    );

    // Caller went away before we answered: stop waiting on the renderer.
    const abort = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) abort.abort();
    };
    res.once("close", onClose);

    log.debug(
      { reqId: req.id, service, user, count, target: out.url.href },
      "proxy enter"
    );

    let upstream: UpstreamResponse;
    try {
      upstream = await deps.transport.execute(out, abort.signal);
    } catch (err) {
      res.removeListener("close", onClose);
      if (abort.signal.aborted) {
        log.debug({ reqId: req.id, service, user }, "caller disconnected");
        return;
      }
      const timeout = err instanceof UpstreamTimeoutError;
      log.warn(
        {
          reqId: req.id,
          service,
          user,
          target: out.url.href,
          code: isErrnoException(err) ? err.code : undefined,
          err,
        },
        "proxy error"
      );
      sendProblem(req, res, {
        title: timeout ? "Gateway Timeout" : "Bad Gateway",
        status: timeout ? 504 : 502,
        detail: err instanceof Error ? err.message : "Upstream error",
      });
      return;
    }

    relay(upstream, res, () => {
      log.debug(
        { reqId: req.id, service, user, status: upstream.status },
        "proxy exit"
      );
    });
  }

  function relay(
    upstream: UpstreamResponse,
    res: Response,
    onEnd: () => void
  ): void {
    for (const [k, v] of Object.entries(upstream.headers)) {
      if (v === undefined || isHopByHop(k)) continue;
      res.setHeader(k, v);
    }
    res.status(upstream.status);

    upstream.body.once("end", onEnd);
    upstream.body.once("error", (err) => {
      log.warn({ err }, "upstream body stream failed");
      res.destroy(err);
    });
    upstream.body.pipe(res);
  }

  return (req, res, next) => {
    handle(req, res).catch(next);
  };
}
