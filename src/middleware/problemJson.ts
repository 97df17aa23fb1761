// src/middleware/problemJson.ts

/**
 * Why:
 * - Every non-2xx answer from this service is RFC 7807 Problem+JSON so callers
 *   and tests can rely on one shape.
 *
 * Notes:
 * - Transport-level formatting only.
 * - HttpError subclasses are expected outcomes; they are not logged here.
 *   Anything else is an unexpected 500 and is logged at error.
 */

import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import { HttpError, MethodNotAllowedError } from "../errors";
import type { Logger } from "../utils/logger";

export type ProblemJson = {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
};

function requestId(req: Request): string | undefined {
  return typeof req.id === "string" ? req.id : undefined;
}

export function sendProblem(
  req: Request,
  res: Response,
  p: Omit<ProblemJson, "type" | "instance">
): void {
  const body: ProblemJson = {
    type: "about:blank",
    title: p.title,
    status: p.status,
    detail: p.detail,
    instance: requestId(req),
  };
  res.status(p.status).type("application/problem+json").json(body);
}

/** Tail 404 for anything no router claimed. */
export function notFoundProblemJson(): RequestHandler {
  return (req, res) => {
    sendProblem(req, res, {
      title: "Not Found",
      status: 404,
      detail: "Route not found",
    });
  };
}

/** Mounted with `.all()` on routes that exist but only accept `allow`. */
export function methodNotAllowed(allow: string[]): RequestHandler {
  return (req, _res, next) => {
    next(new MethodNotAllowedError(req.method, allow));
  };
}

export function errorProblemJson(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      // Too late for a problem body; let express tear the socket down.
      next(err);
      return;
    }

    if (err instanceof MethodNotAllowedError) {
      res.setHeader("Allow", err.allow.join(", "));
    }

    if (err instanceof HttpError) {
      sendProblem(req, res, {
        title: err.title,
        status: err.status,
        detail: err.message,
      });
      return;
    }

    log.error(
      { err, method: req.method, path: req.originalUrl, reqId: req.id },
      "unhandled error in request pipeline"
    );
    sendProblem(req, res, {
      title: "Internal Server Error",
      status: 500,
      detail: "An unexpected error occurred.",
    });
  };
}
