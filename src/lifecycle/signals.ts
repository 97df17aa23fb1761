// src/lifecycle/signals.ts

/** All four are handled identically: one graceful shutdown. */
export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGINT",
  "SIGTERM",
  "SIGHUP",
  "SIGABRT",
];

/** The part of `process` the Lifecycle listens on. Tests pass an EventEmitter. */
export interface SignalEmitter {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

export type ShutdownTrigger =
  | { kind: "signal"; signal: NodeJS.Signals }
  | { kind: "serveError"; err: Error };

export type SignalWait = {
  signal: Promise<NodeJS.Signals>;
  cancel: () => void;
};

/**
 * Resolves on the first of SHUTDOWN_SIGNALS, then detaches from all of them.
 * `cancel()` detaches without resolving (the other side of the race won).
 */
export function onFirstSignal(emitter: SignalEmitter): SignalWait {
  const attached: Array<[NodeJS.Signals, () => void]> = [];
  const cancel = () => {
    for (const [sig, fn] of attached) emitter.removeListener(sig, fn);
    attached.length = 0;
  };

  const signal = new Promise<NodeJS.Signals>((resolve) => {
    for (const sig of SHUTDOWN_SIGNALS) {
      const fn = () => {
        cancel();
        resolve(sig);
      };
      attached.push([sig, fn]);
      emitter.once(sig, fn);
    }
  });

  return { signal, cancel };
}
