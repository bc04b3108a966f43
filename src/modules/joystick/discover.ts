/**
 * discover.ts — Enumerate joystick devices exposed by the Linux joystick API
 *
 * Devices appear as /dev/input/jsN; the human-readable name lives in sysfs
 * at /sys/class/input/jsN/device/name. Both roots are injectable so tests
 * can point them at a temporary tree.
 */

import { readdirSync, readFileSync, existsSync } from "fs";
import { join } from "path";
import type { JoystickDeviceInfo } from "./index.js";
import { JoystickNotFoundError } from "./errors.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "discover" });

export interface DeviceDirs {
  devDir: string;
  sysDir: string;
}

export const DEFAULT_DEVICE_DIRS: Readonly<DeviceDirs> = {
  devDir: "/dev/input",
  sysDir: "/sys/class/input",
};

const JS_NODE = /^js(\d+)$/;

function readDeviceName(sysDir: string, node: string): string {
  const namePath = join(sysDir, node, "device", "name");
  if (!existsSync(namePath)) return "Unknown joystick";
  return readFileSync(namePath, "utf-8").trim() || "Unknown joystick";
}

/**
 * Lists jsN nodes sorted by N (js2 before js10).
 * A missing device directory yields an empty list.
 */
export function listJoystickDevices(
  dirs: DeviceDirs = DEFAULT_DEVICE_DIRS
): JoystickDeviceInfo[] {
  if (!existsSync(dirs.devDir)) {
    log.debug({ devDir: dirs.devDir }, "Device directory does not exist");
    return [];
  }

  const devices: JoystickDeviceInfo[] = [];
  for (const entry of readdirSync(dirs.devDir)) {
    const match = JS_NODE.exec(entry);
    if (!match) continue;
    devices.push({
      id:   Number(match[1]),
      path: join(dirs.devDir, entry),
      name: readDeviceName(dirs.sysDir, entry),
    });
  }

  return devices.sort((a, b) => a.id - b.id);
}

/**
 * Returns the device at position `index` of the sorted list.
 *
 * Throws JoystickNotFoundError if no joystick is present, or if `index`
 * is past the end of the list.
 */
export function findJoystickDevice(
  index: number,
  dirs: DeviceDirs = DEFAULT_DEVICE_DIRS
): JoystickDeviceInfo {
  const devices = listJoystickDevices(dirs);
  if (devices.length === 0) throw new JoystickNotFoundError();

  const device = devices[index];
  if (!device) {
    throw new JoystickNotFoundError(
      `Joystick index ${index} out of range (${devices.length} connected)`
    );
  }
  return device;
}
