/**
 * dashboard.ts — Grouped live dashboard
 *
 * Wraps the device in a Joystick and redraws its grouped views (face
 * buttons, D-pad, sticks, shoulders, back grips) once per frame.
 *
 * Returns the process exit code: 0 on Ctrl+C, 1 if the device was missing
 * or went away.
 */

import type { ReaderOptions } from "../config.js";
import { Joystick } from "../modules/joystick/index.js";
import {
  createLiveView,
  renderGroupedDashboard,
  renderHeader,
} from "../modules/dashboard/index.js";
import { startPollingLoop, stopOnSignals, type LoopExit } from "../modules/loop/index.js";
import { resolveIO, openOrReport, type CommandIO } from "./io.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "dashboard" });

export async function runDashboard(options: ReaderOptions, io: Partial<CommandIO> = {}): Promise<number> {
  const resolved = resolveIO(io);
  const { out, color } = resolved;

  const device = await openOrReport(resolved, options, log);
  if (!device) return 1;

  const joystick = new Joystick(device, options);
  log.info(`Opened: ${joystick.name}`);

  const view   = createLiveView(out);
  const header = renderHeader(`STEAM DECK INPUT: ${joystick.name}`, { color });

  let exit: LoopExit;
  try {
    view.start();

    const loop = startPollingLoop({
      hz: options.refreshHz,
      tick: () => {
        const alive = joystick.update();
        view.update(`${header}\n\n${renderGroupedDashboard(joystick, { color })}`);
        return alive;
      },
    });

    const unbind = stopOnSignals(loop);
    try {
      exit = await loop.done;
    } finally {
      unbind();
    }
  } finally {
    view.stop();
    joystick.close();
  }

  if (exit === "ended") {
    log.warn("Joystick disconnected");
    return 1;
  }
  return 0;
}
