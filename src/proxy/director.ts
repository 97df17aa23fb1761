// src/proxy/director.ts
/**
 * Purpose:
 * - Turn an inbound badge request into the outbound request the renderer
 *   understands.
 *
 * Invariants:
 * - The inbound express Request is never touched. `snapshotInbound()` takes a
 *   copy and the director mutates only that copy.
 * - The upstream target is parsed once at startup and frozen; a bad target is a
 *   startup failure, never a per-request one.
 * - Director steps run in this order: X-Forwarded-Host, X-Origin-Host,
 *   Cache-Control, URL, Host.
 */

import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http";
import { ConfigError } from "../errors";

export interface UpstreamTarget {
  readonly protocol: "http:" | "https:";
  /** host[:port], exactly what goes into the Host header. */
  readonly host: string;
  readonly pathname: string;
  readonly href: string;
}

export interface InboundSnapshot {
  readonly method: string;
  /** Original Host header ("" when the caller sent none). */
  readonly host: string;
  readonly headers: IncomingHttpHeaders;
  readonly remoteAddress?: string;
}

export interface OutboundRequest {
  method: string;
  url: URL;
  headers: OutgoingHttpHeaders;
}

export interface BadgeQuery {
  label: string;
  message: string;
  color: string;
  style?: string;
}

export type Director = (
  out: OutboundRequest,
  inbound: InboundSnapshot,
  badge?: BadgeQuery
) => void;

// RFC 7230 hop-by-hop headers plus the ones we never hand to a third party.
const DROPPED_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
  "host",
  "cookie",
  "authorization",
]);

export function isHopByHop(name: string): boolean {
  return DROPPED_HEADERS.has(name.toLowerCase());
}

export function parseUpstreamTarget(raw: string): UpstreamTarget {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError([`BADGE_RENDERER_URL "${raw}" is not a valid URL`]);
  }
  const protocol = url.protocol;
  if (protocol !== "http:" && protocol !== "https:") {
    throw new ConfigError([
      `BADGE_RENDERER_URL must be http or https, got "${protocol}"`,
    ]);
  }
  // Query and fragment of the configured URL are ignored; the director owns the query.
  return Object.freeze({
    protocol,
    host: url.host,
    pathname: url.pathname,
    href: `${protocol}//${url.host}${url.pathname}`,
  });
}

/** Appends, like a multi-valued header set; never drops a caller's value. */
export function addHeader(
  headers: OutgoingHttpHeaders,
  name: string,
  value: string
): void {
  const key = name.toLowerCase();
  const existing = headers[key];
  if (existing === undefined) {
    headers[key] = value;
  } else if (Array.isArray(existing)) {
    headers[key] = [...existing, value];
  } else {
    headers[key] = [String(existing), value];
  }
}

function mergeForwardedFor(
  existing: string | string[] | undefined,
  addr?: string
): string {
  const xs = Array.isArray(existing) ? existing.join(", ") : existing || "";
  if (!addr) return xs;
  return xs ? `${xs}, ${addr}` : addr;
}

export function snapshotInbound(req: {
  method: string;
  headers: IncomingHttpHeaders;
  socket?: { remoteAddress?: string };
}): InboundSnapshot {
  const headers: IncomingHttpHeaders = {};
  for (const [k, v] of Object.entries(req.headers)) {
    if (v === undefined) continue;
    headers[k] = Array.isArray(v) ? [...v] : v;
  }
  return Object.freeze({
    method: req.method,
    host: req.headers.host ?? "",
    headers: Object.freeze(headers),
    remoteAddress: req.socket?.remoteAddress,
  });
}

/** Forwardable copy of an inbound snapshot, before the director runs. */
export function toOutbound(
  inbound: InboundSnapshot,
  target: UpstreamTarget
): OutboundRequest {
  const headers: OutgoingHttpHeaders = {};
  for (const [k, v] of Object.entries(inbound.headers)) {
    if (v === undefined || isHopByHop(k)) continue;
    headers[k] = Array.isArray(v) ? [...v] : v;
  }
  const xff = mergeForwardedFor(
    inbound.headers["x-forwarded-for"],
    inbound.remoteAddress
  );
  if (xff) headers["x-forwarded-for"] = xff;

  return {
    method: inbound.method,
    url: new URL(target.href),
    headers,
  };
}

export function encodeBadgeQuery(badge: BadgeQuery): string {
  const pairs: Array<[string, string]> = [
    ["label", badge.label],
    ["message", badge.message],
    ["color", badge.color],
  ];
  if (badge.style) pairs.push(["style", badge.style]);
  return pairs
    .map(([k, v]) => `${encodeURIComponent(k)}=${encodeURIComponent(v)}`)
    .join("&");
}

export function createDirector(target: UpstreamTarget): Director {
  return (out, inbound, badge) => {
    addHeader(out.headers, "X-Forwarded-Host", inbound.host);
    addHeader(out.headers, "X-Origin-Host", target.host);
    addHeader(out.headers, "Cache-Control", "no-cache");

    const next = new URL(target.href);
    next.search = badge ? encodeBadgeQuery(badge) : "";
    out.url = next;

    out.headers.host = target.host;
  };
}
