/**
 * Fixed-rate polling loop.
 *
 * Runs `tick` every `1000 / hz` ms (60 Hz → 16 ms) until it returns false,
 * throws, or `stop()` is called. Each tick should drain whatever input is
 * pending and redraw; nothing inside a tick waits on I/O.
 */

import { frameIntervalMs } from "../../config.js";

/** Why a loop finished: the tick asked to end, or stop() was called. */
export type LoopExit = "ended" | "stopped";

export interface PollingLoop {
  readonly running: boolean;
  /** Resolves when the loop finishes; rejects with the error a tick threw. */
  readonly done: Promise<LoopExit>;
  stop(): void;
}

export interface PollingLoopOptions {
  hz:   number;
  tick: () => boolean;
}

export function startPollingLoop(options: PollingLoopOptions): PollingLoop {
  let intervalId: NodeJS.Timeout | null = null;
  let settle: ((exit: LoopExit) => void) | null = null;
  let fail:   ((err: unknown) => void)   | null = null;

  const done = new Promise<LoopExit>((resolve, reject) => {
    settle = resolve;
    fail   = reject;
  });

  function finish(): boolean {
    if (!intervalId) return false;
    clearInterval(intervalId);
    intervalId = null;
    return true;
  }

  const loop: PollingLoop = {
    get running() {
      return intervalId !== null;
    },
    done,
    stop() {
      if (finish()) settle?.("stopped");
    },
  };

  intervalId = setInterval(() => {
    let keepGoing: boolean;
    try {
      keepGoing = options.tick();
    } catch (err) {
      if (finish()) fail?.(err);
      return;
    }
    if (!keepGoing && finish()) settle?.("ended");
  }, frameIntervalMs(options.hz));

  return loop;
}

/**
 * Stops the loop on SIGINT / SIGTERM. Returns a function that removes the
 * signal handlers again.
 *
 * The handlers stay attached until that function runs: signal-exit (pulled
 * in by log-update's cursor handling) re-raises a signal when it finds itself
 * the only listener left, which would kill the process before cleanup.
 */
export function stopOnSignals(loop: PollingLoop): () => void {
  const shutdown = () => loop.stop();
  process.on("SIGINT",  shutdown);
  process.on("SIGTERM", shutdown);
  return () => {
    process.off("SIGINT",  shutdown);
    process.off("SIGTERM", shutdown);
  };
}
