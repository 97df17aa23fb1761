// src/config.ts
/**
 * Purpose:
 * - Turn a raw env record into a validated, frozen AppConfig.
 * - Nothing here reads `process.env` directly; the entrypoint passes it in so
 *   tests can hand over a plain object.
 *
 * Invariants:
 * - DATABASE_URL and SERVICE_USER_MAP are required; everything else defaults.
 * - SERVICE_USER_MAP keys are lower-cased; lookups must lower-case the route param.
 */

import { z } from "zod";
import { ConfigError } from "./errors";

export const SERVICE_NAME = "profile-views-badge" as const;

export const DEFAULT_RENDERER_URL = "https://img.shields.io/static/v1";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Parses `github:GitHub,gitlab:GitLab` into a map.
 * Display names may contain spaces; only the first ":" splits a pair.
 */
export function parseServiceMap(raw: string): Map<string, string> {
  const out = new Map<string, string>();
  for (const pair of raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)) {
    const idx = pair.indexOf(":");
    if (idx <= 0) {
      throw new ConfigError([
        `SERVICE_USER_MAP entry "${pair}" must look like service:Display Name`,
      ]);
    }
    const key = pair.slice(0, idx).trim().toLowerCase();
    const value = pair.slice(idx + 1).trim();
    if (!key || !value) {
      throw new ConfigError([
        `SERVICE_USER_MAP entry "${pair}" has an empty service or display name`,
      ]);
    }
    out.set(key, value);
  }
  if (out.size === 0) {
    throw new ConfigError(["SERVICE_USER_MAP must contain at least one entry"]);
  }
  return out;
}

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .optional()
  .transform((v) => v === "1" || v === "true");

const EnvSchema = z.object({
  NODE_ENV: z.enum(["dev", "test", "docker", "production"]).default("dev"),
  PORT: z.coerce.number().int().min(0).max(65535).default(9000),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  DATABASE_URL: z
    .string({ required_error: "DATABASE_URL is required" })
    .trim()
    .min(1, "DATABASE_URL is required"),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
  SERVICE_USER_MAP: z
    .string({ required_error: "SERVICE_USER_MAP is required" })
    .trim()
    .min(1, "SERVICE_USER_MAP is required"),
  BADGE_RENDERER_URL: z.string().trim().url().default(DEFAULT_RENDERER_URL),
  BADGE_LABEL: z.string().trim().min(1).default("profile views"),
  BADGE_COLOR: z.string().trim().min(1).default("brightgreen"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(10_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  DEEP_PING: flag,
});

export interface AppConfig {
  readonly env: "dev" | "test" | "docker" | "production";
  readonly port: number;
  readonly host: string;
  readonly databaseUrl: string;
  readonly databasePoolMax: number;
  readonly services: ReadonlyMap<string, string>;
  readonly rendererUrl: string;
  readonly badge: { readonly label: string; readonly color: string };
  readonly upstreamTimeoutMs: number;
  readonly shutdownGraceMs: number;
  readonly logLevel: LogLevel;
  readonly deepPing: boolean;
}

type EnvLike = Record<string, string | undefined>;

export function loadConfig(env: EnvLike): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) =>
        i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message
      )
    );
  }
  const e = parsed.data;

  return Object.freeze({
    env: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    databaseUrl: e.DATABASE_URL,
    databasePoolMax: e.DATABASE_POOL_MAX,
    services: parseServiceMap(e.SERVICE_USER_MAP),
    rendererUrl: e.BADGE_RENDERER_URL,
    badge: Object.freeze({ label: e.BADGE_LABEL, color: e.BADGE_COLOR }),
    upstreamTimeoutMs: e.UPSTREAM_TIMEOUT_MS,
    shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
    logLevel: e.LOG_LEVEL,
    deepPing: e.DEEP_PING,
  });
}
