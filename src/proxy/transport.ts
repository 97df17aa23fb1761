// src/proxy/transport.ts
/**
 * Purpose:
 * - Pooled outbound client dedicated to the badge renderer.
 *
 * Invariants:
 * - One attempt per inbound request. No retries.
 * - Pool sizing is fixed at construction and never mutated.
 * - Idle keep-alive sockets are recycled by the agent `timeout`.
 * - An in-flight exchange has one deadline, `requestTimeoutMs`, that runs until
 *   the upstream body closes. Past it, the request (before headers) or the
 *   response body (after) is destroyed with UpstreamTimeoutError. Either way
 *   the socket is destroyed and its agent slot freed.
 */

import http, { type IncomingHttpHeaders } from "node:http";
import https from "node:https";
import type { Readable } from "node:stream";
import { UpstreamTimeoutError } from "../errors";
import type { OutboundRequest } from "./director";

export interface TransportConfig {
  readonly maxIdleConnsPerHost: number;
  readonly maxConnsPerHost: number;
  readonly idleConnTimeoutMs: number;
  readonly requestTimeoutMs: number;
}

export const DEFAULT_TRANSPORT_CONFIG: TransportConfig = Object.freeze({
  maxIdleConnsPerHost: 20,
  maxConnsPerHost: 20,
  idleConnTimeoutMs: 12 * 60 * 60 * 1000,
  requestTimeoutMs: 5000,
});

export interface UpstreamResponse {
  status: number;
  headers: IncomingHttpHeaders;
  body: Readable;
}

export interface BadgeTransport {
  execute(out: OutboundRequest, signal?: AbortSignal): Promise<UpstreamResponse>;
  /** Destroys pooled sockets. Safe to call more than once. */
  close(): void;
}

export class AgentTransport implements BadgeTransport {
  public readonly config: TransportConfig;
  public readonly httpAgent: http.Agent;
  public readonly httpsAgent: https.Agent;

  constructor(config: Partial<TransportConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_TRANSPORT_CONFIG, ...config });

    const agentOpts: http.AgentOptions = {
      keepAlive: true,
      maxSockets: this.config.maxConnsPerHost,
      maxFreeSockets: this.config.maxIdleConnsPerHost,
      timeout: this.config.idleConnTimeoutMs,
      scheduling: "lifo",
    };
    this.httpAgent = new http.Agent(agentOpts);
    this.httpsAgent = new https.Agent(agentOpts);
  }

  execute(out: OutboundRequest, signal?: AbortSignal): Promise<UpstreamResponse> {
    const isHttps = out.url.protocol === "https:";
    const timeoutMs = this.config.requestTimeoutMs;

    return new Promise<UpstreamResponse>((resolve, reject) => {
      const opts: http.RequestOptions = {
        method: out.method,
        headers: out.headers,
        agent: isHttps ? this.httpsAgent : this.httpAgent,
        signal,
      };
      let response: http.IncomingMessage | undefined;

      // One deadline for the whole exchange, headers and body alike.
      const deadline = setTimeout(() => {
        const err = new UpstreamTimeoutError(timeoutMs);
        if (response) response.destroy(err);
        else req.destroy(err);
      }, timeoutMs);

      const onResponse = (res: http.IncomingMessage) => {
        response = res;
        res.once("close", () => clearTimeout(deadline));
        resolve({
          status: res.statusCode ?? 502,
          headers: res.headers,
          body: res,
        });
      };

      const req = isHttps
        ? https.request(out.url, opts, onResponse)
        : http.request(out.url, opts, onResponse);

      req.on("error", (err) => {
        clearTimeout(deadline);
        reject(err);
      });
      req.end();
    });
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
