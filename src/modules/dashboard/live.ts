/**
 * live.ts — Full-screen, in-place redraw of dashboard frames
 *
 * Switches the terminal to its alternate screen on start() and restores it
 * on stop(), so the shell scrollback is untouched when the dashboard exits.
 */

import { createLogUpdate } from "log-update";
import ansiEscapes from "ansi-escapes";

export interface LiveView {
  start(): void;
  update(frame: string): void;
  /** Restores the terminal. Safe to call more than once. */
  stop(): void;
}

export function createLiveView(stream: NodeJS.WritableStream = process.stdout): LiveView {
  const render = createLogUpdate(stream, { showCursor: false });
  let active = false;

  return {
    start() {
      if (active) return;
      active = true;
      stream.write(ansiEscapes.enterAlternativeScreen);
    },

    update(frame: string) {
      if (!active) return;
      render(frame);
    },

    stop() {
      if (!active) return;
      active = false;
      render.done();
      stream.write(ansiEscapes.exitAlternativeScreen);
    },
  };
}
