// src/lifecycle/Lifecycle.ts

/**
 * Purpose:
 * - Own process-level start, the shutdown race, and ordered teardown.
 *
 * States:
 *   initializing → running → shuttingDown → stopped
 *   initializing → shuttingDown → stopped   (bind failure, or a signal while
 *                                            the pool connects)
 *   initializing → stopped                  (pool connect failure)
 *
 * Invariants:
 * - pool.connect() completes before the server is even created. If it fails
 *   nothing ever listens.
 * - The first trigger wins: an OS signal or a server error. The loser is
 *   detached and ignored.
 * - run() attaches the signal listeners before pool.connect(). A signal that
 *   lands during connect skips the bind.
 * - shutdown() runs once; repeat calls return the same promise.
 * - The pool is closed exactly once, after the listener stops accepting, on
 *   every exit path including a failed start.
 *
 * Drain:
 * - server.close() + closeIdleConnections(), then in-flight requests get
 *   `shutdownGraceMs` before closeAllConnections().
 */

import http from "node:http";
import type { AddressInfo } from "node:net";
import type { ResourcePool } from "../db/Database";
import type { BadgeTransport } from "../proxy/transport";
import type { Logger } from "../utils/logger";
import {
  onFirstSignal,
  type ShutdownTrigger,
  type SignalEmitter,
  type SignalWait,
} from "./signals";

export type LifecycleState =
  | "initializing"
  | "running"
  | "shuttingDown"
  | "stopped";

export interface LifecycleOptions {
  port: number;
  host: string;
  handler: http.RequestListener;
  pool: ResourcePool;
  transport?: Pick<BadgeTransport, "close">;
  log: Logger;
  signals?: SignalEmitter;
  shutdownGraceMs?: number;
  createServer?: (handler: http.RequestListener) => http.Server;
}

const DEFAULT_GRACE_MS = 10_000;

export class Lifecycle {
  private _state: LifecycleState = "initializing";
  private _server: http.Server | undefined;
  private readonly log: Logger;
  private readonly signals: SignalEmitter;
  private readonly graceMs: number;
  private readonly createServer: (handler: http.RequestListener) => http.Server;

  private serveError: Error | undefined;
  private signalWait: SignalWait | undefined;
  private receivedSignal: NodeJS.Signals | undefined;
  private onServeError: ((err: Error) => void) | undefined;
  private shutdownPromise: Promise<void> | undefined;

  constructor(private readonly opts: LifecycleOptions) {
    this.log = opts.log.child({ component: "lifecycle" });
    this.signals = opts.signals ?? process;
    this.graceMs = opts.shutdownGraceMs ?? DEFAULT_GRACE_MS;
    this.createServer = opts.createServer ?? ((h) => http.createServer(h));
  }

  get state(): LifecycleState {
    return this._state;
  }

  get server(): http.Server | undefined {
    return this._server;
  }

  /** Bound address once listening; port 0 in tests resolves here. */
  address(): AddressInfo | undefined {
    const a = this._server?.address();
    return a && typeof a === "object" ? a : undefined;
  }

  /**
   * Connects the pool, then binds. Rejects only if the pool cannot connect.
   * A bind failure is not thrown; it becomes the serve-error trigger.
   */
  async start(): Promise<void> {
    if (this._state !== "initializing") {
      throw new Error(`start() called in state "${this._state}"`);
    }

    await this.opts.pool.connect();

    if (this.receivedSignal) {
      this.log.info(
        { signal: this.receivedSignal },
        "signal received during startup; not binding"
      );
      return;
    }

    const server = this.createServer(this.opts.handler);
    this._server = server;
    server.on("error", (err) => this.recordServeError(err));

    await new Promise<void>((resolve) => {
      const settle = () => {
        server.removeListener("listening", settle);
        server.removeListener("error", settle);
        resolve();
      };
      server.once("listening", settle);
      server.once("error", settle);
      server.listen(this.opts.port, this.opts.host);
    });

    if (server.listening) {
      this._state = "running";
      this.log.info(
        { host: this.opts.host, port: this.address()?.port ?? this.opts.port },
        "listening"
      );
    }
  }

  /** Attaches the shutdown signal listeners once; later calls reuse them. */
  armSignals(): SignalWait {
    if (!this.signalWait) {
      const wait = onFirstSignal(this.signals);
      void wait.signal.then((sig) => {
        this.receivedSignal = sig;
      });
      this.signalWait = wait;
    }
    return this.signalWait;
  }

  private disarmSignals(): void {
    this.signalWait?.cancel();
    this.signalWait = undefined;
  }

  /** Single-consumer race between the first shutdown signal and the first serve error. */
  async waitForTrigger(): Promise<ShutdownTrigger> {
    if (this.serveError) {
      this.disarmSignals();
      return { kind: "serveError", err: this.serveError };
    }

    const sig = this.armSignals();
    const failed = new Promise<Error>((resolve) => {
      this.onServeError = resolve;
    });

    try {
      return await Promise.race<ShutdownTrigger>([
        sig.signal.then((signal): ShutdownTrigger => ({ kind: "signal", signal })),
        failed.then((err): ShutdownTrigger => ({ kind: "serveError", err })),
      ]);
    } finally {
      this.disarmSignals();
      this.onServeError = undefined;
    }
  }

  shutdown(trigger: ShutdownTrigger): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.teardown(trigger);
    }
    return this.shutdownPromise;
  }

  /** start → wait → shutdown. Resolves with the process exit code. */
  async run(): Promise<number> {
    this.armSignals();
    try {
      await this.start();
    } catch (err) {
      this.disarmSignals();
      this.log.fatal({ err }, "startup failed; not serving");
      await this.releaseResources();
      this._state = "stopped";
      return 1;
    }

    const trigger = await this.waitForTrigger();
    await this.shutdown(trigger);
    return trigger.kind === "signal" ? 0 : 1;
  }

  private recordServeError(err: Error): void {
    if (this._state === "shuttingDown" || this._state === "stopped") {
      this.log.warn({ err }, "server error during shutdown");
      return;
    }
    if (this.serveError) return;
    this.serveError = err;
    this.onServeError?.(err);
  }

  private async teardown(trigger: ShutdownTrigger): Promise<void> {
    this._state = "shuttingDown";
    if (trigger.kind === "signal") {
      this.log.info({ signal: trigger.signal }, "shutdown signal received");
    } else {
      this.log.error({ err: trigger.err }, "server failed; shutting down");
    }

    await this.drain();
    await this.releaseResources();

    this._state = "stopped";
    this.log.info({ trigger: trigger.kind }, "shutdown complete");
  }

  private drain(): Promise<void> {
    const server = this._server;
    if (!server || !server.listening) return Promise.resolve();

    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.log.warn(
          { graceMs: this.graceMs },
          "grace period elapsed; closing remaining connections"
        );
        server.closeAllConnections();
      }, this.graceMs);
      timer.unref();

      server.close((err) => {
        clearTimeout(timer);
        if (err) this.log.warn({ err }, "server close reported an error");
        resolve();
      });
      server.closeIdleConnections();
    });
  }

  private async releaseResources(): Promise<void> {
    this.opts.transport?.close();
    try {
      await this.opts.pool.close();
    } catch (err) {
      this.log.error({ err }, "failed to close resource pool");
    }
  }
}
