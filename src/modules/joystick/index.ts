// Joystick input — device discovery, event decoding and the latest-value state record

export type JoystickEvent =
  | {
      type:      "axis";
      axis:      number;
      /** Native signed 16-bit range: -32768..32767. */
      value:     number;
      timestamp: number;
      /** True for the synthetic state the kernel reports right after open. */
      initial:   boolean;
    }
  | {
      type:      "button";
      button:    number;
      pressed:   boolean;
      timestamp: number;
      initial:   boolean;
    };

export interface JoystickDeviceInfo {
  /** N in /dev/input/jsN. */
  id:   number;
  path: string;
  name: string;
}

export type DisconnectHandler = (err?: Error) => void;

/**
 * An open joystick handle. Events accumulate in an internal queue as the OS
 * delivers them; `poll()` drains that queue without waiting.
 */
export interface JoystickDevice {
  readonly info:      JoystickDeviceInfo;
  readonly connected: boolean;
  poll(): JoystickEvent[];
  on(event: "disconnect", handler: DisconnectHandler): void;
  off(event: "disconnect", handler: DisconnectHandler): void;
  close(): void;
}

export { JoystickNotFoundError, JoystickOpenError } from "./errors.js";
export { decodeJsEvent, decodeJsEvents, encodeJsEvent, JS_EVENT_SIZE } from "./js-event.js";
export { listJoystickDevices, findJoystickDevice, DEFAULT_DEVICE_DIRS } from "./discover.js";
export type { DeviceDirs } from "./discover.js";
export { openJoystickDevice } from "./js-device.js";
export { createInputState, applyEvent } from "./state.js";
export type { InputState } from "./state.js";
export { DECK_BUTTONS, DECK_AXES } from "./layout.js";
export { Joystick } from "./joystick.js";
export type {
  FaceButtons,
  DpadState,
  ShoulderState,
  StickState,
  BackButtons,
  FullState,
  JoystickOptions,
} from "./joystick.js";
