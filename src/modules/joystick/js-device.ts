/**
 * js-device.ts — Read handle on a /dev/input/jsN node
 *
 * Usage:
 *   const device = await openJoystickDevice(findJoystickDevice(0));
 *   // once per frame:
 *   for (const event of device.poll()) { ... }
 *   // ...
 *   device.close();
 *
 * Notes:
 *   • The node is read as a stream; records are decoded as they arrive and
 *     queued until the next poll().
 *   • End of stream or a read error (ENODEV on unplug) marks the device
 *     disconnected and emits "disconnect" once. Queued events stay pollable.
 *   • close() does not emit "disconnect".
 */

import { createReadStream } from "fs";
import { once, EventEmitter } from "events";
import type {
  JoystickDevice,
  JoystickDeviceInfo,
  JoystickEvent,
  DisconnectHandler,
} from "./index.js";
import { decodeJsEvents, JS_EVENT_SIZE } from "./js-event.js";
import { JoystickOpenError } from "./errors.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "js-device" });

/**
 * Opens the device node and resolves once it is readable.
 * Rejects with JoystickOpenError (missing node, permission denied, ...).
 */
export async function openJoystickDevice(
  info: JoystickDeviceInfo
): Promise<JoystickDevice> {
  const stream = createReadStream(info.path, {
    highWaterMark: JS_EVENT_SIZE * 64,
  });

  try {
    await once(stream, "ready");
  } catch (err) {
    stream.destroy();
    throw new JoystickOpenError(info.path, err);
  }

  const emitter = new EventEmitter();
  let queue: JoystickEvent[] = [];
  let carry: Buffer = Buffer.alloc(0);
  let connected = true;
  let closed = false;

  function disconnect(err?: Error): void {
    if (!connected) return;
    connected = false;
    if (closed) return;
    // debug only: a live dashboard may still own the terminal here
    log.debug({ err, path: info.path }, err ? "Joystick read failed" : "Joystick stream ended");
    emitter.emit("disconnect", err);
  }

  stream.on("data", (chunk: Buffer | string) => {
    if (typeof chunk === "string") return;
    const { events, rest } = decodeJsEvents(chunk, carry);
    carry = rest;
    queue.push(...events);
  });
  stream.on("end",   () => disconnect());
  stream.on("error", (err: Error) => disconnect(err));

  log.debug({ path: info.path, name: info.name }, "Joystick device opened");

  return {
    info,

    get connected() {
      return connected;
    },

    poll() {
      const drained = queue;
      queue = [];
      return drained;
    },

    on(_event: "disconnect", handler: DisconnectHandler) {
      emitter.on("disconnect", handler);
    },

    off(_event: "disconnect", handler: DisconnectHandler) {
      emitter.off("disconnect", handler);
    },

    close() {
      if (closed) return;
      closed = true;
      connected = false;
      stream.destroy();
      emitter.removeAllListeners();
      log.debug({ path: info.path }, "Joystick device closed");
    },
  };
}
