// test/bootstrap.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { envFileCandidates, loadEnvFiles } from "../src/bootstrap";

const KEYS = [
  "BADGE_TEST_MODE",
  "BADGE_TEST_BASE",
  "BADGE_TEST_URL",
  "BADGE_TEST_PRESET",
];

describe("env file loading", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "badge-env-"));
    for (const k of KEYS) delete process.env[k];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    for (const k of KEYS) delete process.env[k];
  });

  it("looks for .env.<mode> before .env", () => {
    expect(envFileCandidates("/srv/app", "test")).toEqual([
      path.resolve("/srv/app", ".env.test"),
      path.resolve("/srv/app", ".env"),
    ]);
    expect(envFileCandidates("/srv/app", " ")).toEqual([
      path.resolve("/srv/app", ".env"),
    ]);
  });

  it("loads nothing when no file exists", () => {
    expect(loadEnvFiles(dir, "test")).toEqual([]);
  });

  it("mode file wins over .env, and real env wins over both", () => {
    fs.writeFileSync(
      path.join(dir, ".env.test"),
      "BADGE_TEST_MODE=test\nBADGE_TEST_PRESET=from-file\n"
    );
    fs.writeFileSync(path.join(dir, ".env"), "BADGE_TEST_MODE=base\n");
    process.env.BADGE_TEST_PRESET = "from-env";

    const loaded = loadEnvFiles(dir, "test");

    expect(loaded).toEqual([
      path.join(dir, ".env.test"),
      path.join(dir, ".env"),
    ]);
    expect(process.env.BADGE_TEST_MODE).toBe("test");
    expect(process.env.BADGE_TEST_PRESET).toBe("from-env");
  });

  it("expands references between variables", () => {
    fs.writeFileSync(
      path.join(dir, ".env"),
      "BADGE_TEST_BASE=http://renderer.local\nBADGE_TEST_URL=${BADGE_TEST_BASE}/static/v1\n"
    );

    loadEnvFiles(dir, "test");

    expect(process.env.BADGE_TEST_URL).toBe("http://renderer.local/static/v1");
  });
});
