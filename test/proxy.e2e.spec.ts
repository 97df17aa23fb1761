// test/proxy.e2e.spec.ts
// Full path with the real transport: supertest → app → AgentTransport → loopback renderer.
import http from "node:http";
import type { AddressInfo } from "node:net";
import express from "express";
import pino from "pino";
import request from "supertest";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createApp } from "../src/app";
import { parseUpstreamTarget } from "../src/proxy/director";
import { AgentTransport } from "../src/proxy/transport";
import { silentLogger } from "../src/utils/logger";
import { StubViewCounter } from "./helpers/stubs";
import { startUpstream } from "./helpers/upstream";

describe("badge proxy against a loopback renderer", () => {
  let up: Awaited<ReturnType<typeof startUpstream>>;
  let transport: AgentTransport;

  beforeEach(async () => {
    up = await startUpstream();
    transport = new AgentTransport({ requestTimeoutMs: 1000 });
  });

  afterEach(async () => {
    transport.close();
    await up.close();
  });

  function app(views = new StubViewCounter(42)) {
    return createApp({
      log: silentLogger(),
      target: parseUpstreamTarget(`http://127.0.0.1:${up.port}/static/v1`),
      transport,
      views,
      services: new Map([["github", "GitHub"]]),
      badge: { label: "profile views", color: "blue" },
    });
  }

  it("delivers the rewritten request and streams the svg back", async () => {
    const res = await request(app())
      .get("/stats/github/alice/count.svg")
      .set("Host", "profile.example.com")
      .buffer(true);

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("image/svg+xml;charset=utf-8");
    expect(Buffer.isBuffer(res.body) ? res.body.toString("utf8") : res.text).toBe(
      "<svg>...</svg>"
    );

    expect(up.seen).toHaveLength(1);
    const seen = up.seen[0];
    expect(seen.method).toBe("GET");
    expect(seen.url).toBe(
      "/static/v1?label=GitHub%20profile%20views&message=42&color=blue"
    );
    expect(seen.headers.host).toBe(`127.0.0.1:${up.port}`);
    expect(seen.headers["x-forwarded-host"]).toBe("profile.example.com");
    expect(seen.headers["x-origin-host"]).toBe(`127.0.0.1:${up.port}`);
    expect(seen.headers["cache-control"]).toBe("no-cache");
  });

  it("answers 502 once the renderer is gone", async () => {
    await up.close();

    const res = await request(app()).get("/stats/github/alice/count.svg");

    expect(res.status).toBe(502);
    expect(res.body.title).toBe("Bad Gateway");
  });

  it("stops waiting on the renderer when the caller disconnects", async () => {
    // renderer that accepts the request and never answers
    let upstreamClosed = false;
    await up.close();
    up = await startUpstream((req) => {
      req.socket.once("close", () => {
        upstreamClosed = true;
      });
    });

    const lines: Array<{ level: number; msg: string }> = [];
    const log = pino(
      { level: "debug" },
      { write: (line: string) => lines.push(JSON.parse(line)) }
    );

    let badgeRes: express.Response | undefined;
    const outer = express();
    outer.use((_req, res, next) => {
      badgeRes = res;
      next();
    });
    outer.use(
      createApp({
        log,
        target: parseUpstreamTarget(`http://127.0.0.1:${up.port}/static/v1`),
        transport,
        views: new StubViewCounter(42),
        services: new Map([["github", "GitHub"]]),
        badge: { label: "profile views", color: "blue" },
      })
    );
    const server = outer.listen(0, "127.0.0.1");
    await new Promise<void>((r) => server.once("listening", r));
    const { port } = server.address() as AddressInfo;

    try {
      const caller = http.get({
        host: "127.0.0.1",
        port,
        path: "/stats/github/alice/count.svg",
        agent: false,
      });
      caller.on("error", () => {
        // the disconnect below is deliberate
      });

      await vi.waitFor(() => {
        expect(up.seen).toHaveLength(1);
      });
      caller.destroy();

      await vi.waitFor(() => {
        expect(upstreamClosed).toBe(true);
      });
      await vi.waitFor(() => {
        expect(lines.some((l) => l.msg === "caller disconnected")).toBe(true);
      });

      expect(badgeRes?.headersSent).toBe(false);
      expect(lines.filter((l) => l.level === 40)).toEqual([]);
      expect(lines.some((l) => l.msg === "proxy error")).toBe(false);
    } finally {
      server.closeAllConnections();
      await new Promise((r) => server.close(r));
    }
  });
});
