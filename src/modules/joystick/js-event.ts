/**
 * js-event.ts — Linux joystick API (/dev/input/jsN) record codec
 *
 * Pure module — no device access, fully unit-testable.
 *
 * Each record is 8 bytes, little-endian:
 *
 *   offset  size  field
 *   0       u32   timestamp (ms)
 *   4       s16   value      axis: -32768..32767, button: 0 / 1
 *   6       u8    type       0x01 button, 0x02 axis, | 0x80 for initial state
 *   7       u8    number     axis or button identifier
 */

import type { JoystickEvent } from "./index.js";

// ── Constants ────────────────────────────────────────────────────────────

export const JS_EVENT_SIZE = 8;

export const JS_EVENT_BUTTON = 0x01;
export const JS_EVENT_AXIS   = 0x02;
export const JS_EVENT_INIT   = 0x80;

// ── Decoding ──────────────────────────────────────────────────────────────

/**
 * Decode one record at `offset`. Returns null for record types other than
 * button and axis.
 */
export function decodeJsEvent(buf: Buffer, offset = 0): JoystickEvent | null {
  const timestamp = buf.readUInt32LE(offset);
  const value     = buf.readInt16LE(offset + 4);
  const rawType   = buf.readUInt8(offset + 6);
  const number    = buf.readUInt8(offset + 7);

  const initial = (rawType & JS_EVENT_INIT) !== 0;
  const type    = rawType & ~JS_EVENT_INIT;

  if (type === JS_EVENT_BUTTON) {
    return { type: "button", button: number, pressed: value !== 0, timestamp, initial };
  }
  if (type === JS_EVENT_AXIS) {
    return { type: "axis", axis: number, value, timestamp, initial };
  }
  return null;
}

/**
 * Split a read chunk into events. `carry` holds the partial record left over
 * from the previous chunk; the new leftover is returned as `rest`.
 */
export function decodeJsEvents(
  chunk: Buffer,
  carry: Buffer = Buffer.alloc(0)
): { events: JoystickEvent[]; rest: Buffer } {
  const buf = carry.length > 0 ? Buffer.concat([carry, chunk]) : chunk;
  const events: JoystickEvent[] = [];

  let offset = 0;
  for (; offset + JS_EVENT_SIZE <= buf.length; offset += JS_EVENT_SIZE) {
    const event = decodeJsEvent(buf, offset);
    if (event) events.push(event);
  }

  return { events, rest: Buffer.from(buf.subarray(offset)) };
}

// ── Encoding ──────────────────────────────────────────────────────────────

export function encodeJsEvent(event: JoystickEvent): Buffer {
  const buf  = Buffer.alloc(JS_EVENT_SIZE);
  const init = event.initial ? JS_EVENT_INIT : 0;

  buf.writeUInt32LE(event.timestamp >>> 0, 0);
  if (event.type === "button") {
    buf.writeInt16LE(event.pressed ? 1 : 0, 4);
    buf.writeUInt8(JS_EVENT_BUTTON | init, 6);
    buf.writeUInt8(event.button, 7);
  } else {
    buf.writeInt16LE(event.value, 4);
    buf.writeUInt8(JS_EVENT_AXIS | init, 6);
    buf.writeUInt8(event.axis, 7);
  }
  return buf;
}
