/**
 * poll.ts — Minimal poller
 *
 * Opens one joystick, drains its events every frame and shows the raw value
 * of every tracked button and axis by identifier. With `events`, prints one
 * line per stored event instead of redrawing a table.
 *
 * Returns the process exit code: 0 on Ctrl+C, 1 if the device was missing
 * or went away.
 */

import type { ReaderOptions } from "../config.js";
import { createInputState, applyEvent } from "../modules/joystick/index.js";
import {
  createLiveView,
  formatEventLine,
  renderHeader,
  renderRawDashboard,
} from "../modules/dashboard/index.js";
import { startPollingLoop, stopOnSignals, type LoopExit } from "../modules/loop/index.js";
import { resolveIO, openOrReport, type CommandIO } from "./io.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "poll" });

export interface PollOptions extends ReaderOptions {
  events: boolean;
}

export async function runPoll(options: PollOptions, io: Partial<CommandIO> = {}): Promise<number> {
  const resolved = resolveIO(io);
  const { out, color } = resolved;

  const device = await openOrReport(resolved, options, log);
  if (!device) return 1;
  log.info({ path: device.info.path }, `Successfully opened joystick: ${device.info.name}`);

  const state = createInputState(options.numAxes, options.numButtons);
  const view  = options.events ? null : createLiveView(out);
  const header = renderHeader("SIMPLE JOYSTICK DASHBOARD", { color });

  let exit: LoopExit;
  try {
    view?.start();

    const loop = startPollingLoop({
      hz: options.refreshHz,
      tick: () => {
        for (const event of device.poll()) {
          if (applyEvent(state, event) && options.events) {
            out.write(`${formatEventLine(event)}\n`);
          }
        }
        view?.update(`${header}\n\n${renderRawDashboard(state.axes, state.buttons, { color })}`);
        return device.connected;
      },
    });

    const unbind = stopOnSignals(loop);
    try {
      exit = await loop.done;
    } finally {
      unbind();
    }
  } finally {
    view?.stop();
    device.close();
  }

  if (exit === "ended") {
    log.warn({ path: device.info.path }, "Joystick disconnected");
    return 1;
  }
  log.info("Exiting poller");
  return 0;
}
