import { supportsColor } from "chalk";
import type { Logger } from "pino";
import type { ReaderOptions } from "../config.js";
import {
  findJoystickDevice,
  openJoystickDevice,
  JoystickNotFoundError,
  JoystickOpenError,
  type JoystickDevice,
} from "../modules/joystick/index.js";

/**
 * What a command touches outside its own state. Tests swap in a fake device
 * and an in-memory stream.
 */
export interface CommandIO {
  out:        NodeJS.WritableStream;
  color:      boolean;
  openDevice: (options: ReaderOptions) => Promise<JoystickDevice>;
}

export function resolveIO(io: Partial<CommandIO> = {}): CommandIO {
  return {
    out:        io.out ?? process.stdout,
    color:      io.color ?? supportsColor !== false,
    openDevice: io.openDevice ?? ((options) =>
      openJoystickDevice(findJoystickDevice(options.index, options))),
  };
}

/** Expected start-up failures: reported, not thrown. */
export function isDeviceError(err: unknown): err is JoystickNotFoundError | JoystickOpenError {
  return err instanceof JoystickNotFoundError || err instanceof JoystickOpenError;
}

/**
 * Opens the configured device. Device-not-found and open failures are logged
 * and yield null; anything else propagates.
 */
export async function openOrReport(
  io: CommandIO,
  options: ReaderOptions,
  log: Logger
): Promise<JoystickDevice | null> {
  try {
    return await io.openDevice(options);
  } catch (err) {
    if (!isDeviceError(err)) throw err;
    log.error(err.message);
    return null;
  }
}
