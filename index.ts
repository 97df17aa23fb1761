// index.ts
/**
 * Entrypoint.
 *
 * Order:
 *   env files → config → logger → upstream target → pool/transport/counter →
 *   app → Lifecycle.run() → process.exit(code)
 *
 * Anything that fails before Lifecycle takes over is fatal: exit 1, nothing
 * ever listens.
 */

import { loadEnvFiles } from "./src/bootstrap";
import { loadConfig, type AppConfig } from "./src/config";
import { ConfigError } from "./src/errors";
import { createLogger } from "./src/utils/logger";
import { parseUpstreamTarget } from "./src/proxy/director";
import { AgentTransport } from "./src/proxy/transport";
import { Database, createPgPool } from "./src/db/Database";
import { PgViewCounter } from "./src/repo/viewCounter";
import { createApp } from "./src/app";
import { Lifecycle } from "./src/lifecycle/Lifecycle";
import { rendererProbe, type ReadinessProbe } from "./src/routes/health.router";

async function main(): Promise<number> {
  loadEnvFiles();

  let config: AppConfig;
  try {
    config = loadConfig(process.env);
  } catch (err) {
    // No logger yet: its level comes from the config that just failed.
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  const log = createLogger({ level: config.logLevel, env: config.env });

  try {
    const target = parseUpstreamTarget(config.rendererUrl);
    const transport = new AgentTransport({
      requestTimeoutMs: config.upstreamTimeoutMs,
    });
    const pool = createPgPool(config);
    const db = new Database({ pool, log });

    const probes: Record<string, ReadinessProbe> = {
      database: () => db.ping(),
    };
    if (config.deepPing) probes.renderer = rendererProbe(target.href);

    const app = createApp({
      log,
      target,
      transport,
      views: new PgViewCounter(pool),
      services: config.services,
      badge: config.badge,
      probes,
    });

    log.info(
      { target: target.href, services: [...config.services.keys()] },
      "starting"
    );

    return await new Lifecycle({
      port: config.port,
      host: config.host,
      handler: app,
      pool: db,
      transport,
      log,
      shutdownGraceMs: config.shutdownGraceMs,
    }).run();
  } catch (err) {
    log.fatal({ err }, "startup failed");
    return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
