import { listJoystickDevices, type DeviceDirs } from "../modules/joystick/index.js";
import { resolveIO, type CommandIO } from "./io.js";

/**
 * Prints one line per joystick node, in the order `--index` counts them:
 *
 *   0  /dev/input/js0  Steam Deck
 *
 * Returns 1 when no joystick is connected.
 */
export function runList(dirs: DeviceDirs, io: Partial<Pick<CommandIO, "out">> = {}): number {
  const { out } = resolveIO(io);
  const devices = listJoystickDevices(dirs);

  if (devices.length === 0) {
    out.write("No joystick found.\n");
    return 1;
  }
  devices.forEach((device, index) => {
    out.write(`${index}  ${device.path}  ${device.name}\n`);
  });
  return 0;
}
