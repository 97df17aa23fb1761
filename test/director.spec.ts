// test/director.spec.ts
import { describe, it, expect } from "vitest";
import { ConfigError } from "../src/errors";
import {
  addHeader,
  createDirector,
  encodeBadgeQuery,
  isHopByHop,
  parseUpstreamTarget,
  snapshotInbound,
  toOutbound,
} from "../src/proxy/director";

const target = parseUpstreamTarget("https://img.shields.io/static/v1");

function inboundReq() {
  return {
    method: "GET",
    headers: {
      host: "profile.example.com",
      "user-agent": "test-agent",
      connection: "keep-alive",
      cookie: "session=test-secret",
      "x-forwarded-for": "203.0.113.9",
    },
    socket: { remoteAddress: "10.0.0.5" },
  };
}

describe("parseUpstreamTarget", () => {
  it("keeps scheme, host and path and drops the query", () => {
    expect(
      parseUpstreamTarget("http://127.0.0.1:8080/static/v1?x=1#frag")
    ).toEqual({
      protocol: "http:",
      host: "127.0.0.1:8080",
      pathname: "/static/v1",
      href: "http://127.0.0.1:8080/static/v1",
    });
  });

  it("rejects an unparsable URL", () => {
    expect(() => parseUpstreamTarget("not a url")).toThrow(ConfigError);
  });

  it("rejects non-http schemes", () => {
    expect(() => parseUpstreamTarget("ftp://img.shields.io/static/v1")).toThrow(
      'BADGE_RENDERER_URL must be http or https, got "ftp:"'
    );
  });
});

describe("addHeader", () => {
  it("appends instead of replacing", () => {
    const h: Record<string, string | string[] | number | undefined> = {};
    addHeader(h, "X-Forwarded-Host", "a.example");
    addHeader(h, "x-forwarded-host", "b.example");
    addHeader(h, "X-Forwarded-Host", "c.example");
    expect(h["x-forwarded-host"]).toEqual(["a.example", "b.example", "c.example"]);
  });
});

describe("isHopByHop", () => {
  it.each(["Connection", "keep-alive", "Transfer-Encoding", "host", "Cookie", "authorization"])(
    "drops %s",
    (name) => {
      expect(isHopByHop(name)).toBe(true);
    }
  );

  it("keeps end-to-end headers", () => {
    expect(isHopByHop("content-type")).toBe(false);
    expect(isHopByHop("user-agent")).toBe(false);
  });
});

describe("snapshotInbound / toOutbound", () => {
  it("copies the inbound request without sharing header objects", () => {
    const req = inboundReq();
    const snap = snapshotInbound(req);

    expect(snap.host).toBe("profile.example.com");
    expect(snap.remoteAddress).toBe("10.0.0.5");
    expect(snap.headers).not.toBe(req.headers);
    expect(Object.isFrozen(snap)).toBe(true);
  });

  it("forwards end-to-end headers and extends x-forwarded-for", () => {
    const out = toOutbound(snapshotInbound(inboundReq()), target);

    expect(out.method).toBe("GET");
    expect(out.url.href).toBe("https://img.shields.io/static/v1");
    expect(out.headers).toEqual({
      "user-agent": "test-agent",
      "x-forwarded-for": "203.0.113.9, 10.0.0.5",
    });
  });

  it("uses an empty host when the caller sent none", () => {
    const snap = snapshotInbound({ method: "GET", headers: {} });
    expect(snap.host).toBe("");
    expect(toOutbound(snap, target).headers).toEqual({});
  });
});

describe("encodeBadgeQuery", () => {
  it("encodes label, message and color, and style only when set", () => {
    expect(
      encodeBadgeQuery({ label: "GitHub profile views", message: "7", color: "#4c1" })
    ).toBe("label=GitHub%20profile%20views&message=7&color=%234c1");
    expect(
      encodeBadgeQuery({ label: "a&b", message: "1", color: "blue", style: "flat" })
    ).toBe("label=a%26b&message=1&color=blue&style=flat");
  });
});

describe("createDirector", () => {
  const direct = createDirector(target);

  it("rewrites a copy in the documented order", () => {
    const req = inboundReq();
    const inbound = snapshotInbound(req);
    const out = toOutbound(inbound, target);
    out.url = new URL("http://profile.example.com/stats/github/alice/count.svg?x=1");

    direct(out, inbound, {
      label: "GitHub profile views",
      message: "7",
      color: "brightgreen",
    });

    expect(out.url.href).toBe(
      "https://img.shields.io/static/v1?label=GitHub%20profile%20views&message=7&color=brightgreen"
    );
    expect(Object.keys(out.headers)).toEqual([
      "user-agent",
      "x-forwarded-for",
      "x-forwarded-host",
      "x-origin-host",
      "cache-control",
      "host",
    ]);
    expect(out.headers["x-forwarded-host"]).toBe("profile.example.com");
    expect(out.headers["x-origin-host"]).toBe("img.shields.io");
    expect(out.headers["cache-control"]).toBe("no-cache");
    expect(out.headers.host).toBe("img.shields.io");

    // the inbound request is untouched
    expect(req.headers.host).toBe("profile.example.com");
    expect(req.headers.cookie).toBe("session=test-secret");
    expect(inbound.headers["x-forwarded-host"]).toBeUndefined();
  });

  it("discards the inbound path and query when no badge is given", () => {
    const inbound = snapshotInbound(inboundReq());
    const out = toOutbound(inbound, target);
    out.url = new URL("https://elsewhere.example/anything?q=1");

    direct(out, inbound);

    expect(out.url.href).toBe("https://img.shields.io/static/v1");
  });

  it("keeps a caller-supplied X-Forwarded-Host and appends the original host", () => {
    const inbound = snapshotInbound({
      method: "GET",
      headers: { host: "edge.example", "x-forwarded-host": "profile.example.com" },
    });
    const out = toOutbound(inbound, target);

    direct(out, inbound);

    expect(out.headers["x-forwarded-host"]).toEqual([
      "profile.example.com",
      "edge.example",
    ]);
  });
});
