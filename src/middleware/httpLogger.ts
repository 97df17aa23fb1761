// src/middleware/httpLogger.ts

/**
 * Why:
 * - One structured line per request, correlated by `reqId`.
 * - Telemetry only. It must never block a request.
 *
 * Notes:
 * - Severity: 5xx/error=error, 404/405=info (routing misses are normal client
 *   behaviour), other 4xx=warn, everything else info.
 * - Health probes are not auto-logged.
 * - An incoming `x-request-id` / `x-correlation-id` is reused; otherwise a
 *   UUID is minted. The id is always echoed back in `x-request-id`.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { Logger } from "../utils/logger";

type SerializedReq = {
  id?: unknown;
  method?: string;
  url?: string;
  headers?: Record<string, unknown>;
};

const QUIET_PATHS = new Set(["/healthz", "/readyz", "/favicon.ico"]);

function headerValue(v: string | string[] | undefined): string | undefined {
  const s = Array.isArray(v) ? v[0] : v;
  return s && s.trim() ? s.trim() : undefined;
}

export function requestIdFor(req: IncomingMessage): string {
  return (
    headerValue(req.headers["x-request-id"]) ||
    headerValue(req.headers["x-correlation-id"]) ||
    randomUUID()
  );
}

export function levelFor(
  res: ServerResponse,
  err?: Error
): "error" | "warn" | "info" {
  if (err) return "error";
  const s = res.statusCode;
  if (s >= 500) return "error";
  if (s === 404 || s === 405) return "info";
  if (s >= 400) return "warn";
  return "info";
}

export function makeHttpLogger(logger: Logger) {
  return pinoHttp({
    logger,

    genReqId: (req, res) => {
      const id = requestIdFor(req);
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (_req, res, err) => levelFor(res, err),

    autoLogging: {
      ignore: (req) => QUIET_PATHS.has((req.url ?? "").split("?")[0]),
    },

    // pino-http hands these the std-serialized request, which already
    // prefers originalUrl over the (rewritable) url.
    serializers: {
      req(req: SerializedReq) {
        return {
          id: req.id,
          method: req.method,
          url: req.url,
          host: req.headers?.host,
        };
      },
      res(res: { statusCode?: number }) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
