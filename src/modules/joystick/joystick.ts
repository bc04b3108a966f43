/**
 * joystick.ts — Stateful wrapper around one joystick device
 *
 * Holds the single mutable state record and exposes grouped, read-only
 * views of it for the Steam Deck layout.
 *
 * Usage:
 *   const joystick = await Joystick.open({ index: 0 });
 *   // once per frame:
 *   if (!joystick.update()) stop();
 *   console.log(joystick.faceButtons.A);
 *   // ...
 *   joystick.close();
 */

import type { JoystickDevice, JoystickEvent } from "./index.js";
import { createInputState, applyEvent, type InputState } from "./state.js";
import { findJoystickDevice, DEFAULT_DEVICE_DIRS, type DeviceDirs } from "./discover.js";
import { openJoystickDevice } from "./js-device.js";
import { DECK_BUTTONS, DECK_AXES } from "./layout.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "joystick" });

// ── Types ─────────────────────────────────────────────────────────────────

export interface JoystickOptions {
  numAxes?:    number;
  numButtons?: number;
}

export type FaceButtons = {
  readonly A: boolean;
  readonly B: boolean;
  readonly X: boolean;
  readonly Y: boolean;
};

export type DpadState = {
  readonly Up:    boolean;
  readonly Down:  boolean;
  readonly Left:  boolean;
  readonly Right: boolean;
};

/** Bumpers are buttons; the triggers are analog axes. */
export type ShoulderState = {
  readonly L1: boolean;
  readonly R1: boolean;
  readonly L2: number;
  readonly R2: number;
};

/** Both sticks: their axes and click buttons. */
export type StickState = {
  readonly LX: number;
  readonly LY: number;
  readonly RX: number;
  readonly RY: number;
  readonly L3: boolean;
  readonly R3: boolean;
};

export type BackButtons = {
  readonly L4: boolean;
  readonly R4: boolean;
  readonly L5: boolean;
  readonly R5: boolean;
};

export interface FullState {
  axes:    number[];
  buttons: boolean[];
}

const DEFAULT_AXES    = 6;
const DEFAULT_BUTTONS = 20;

// ── Class ─────────────────────────────────────────────────────────────────

export class Joystick {
  private readonly device: JoystickDevice;
  private readonly state:  InputState;
  private closed = false;

  constructor(device: JoystickDevice, options: JoystickOptions = {}) {
    this.device = device;
    this.state  = createInputState(
      options.numAxes    ?? DEFAULT_AXES,
      options.numButtons ?? DEFAULT_BUTTONS
    );
  }

  /**
   * Finds the joystick at `index` (0 is the first one found) and opens it.
   * Throws JoystickNotFoundError or JoystickOpenError.
   */
  static async open(
    options: JoystickOptions & { index?: number; dirs?: DeviceDirs } = {}
  ): Promise<Joystick> {
    const info   = findJoystickDevice(options.index ?? 0, options.dirs ?? DEFAULT_DEVICE_DIRS);
    const device = await openJoystickDevice(info);
    log.info({ name: info.name, path: info.path }, `Opened: ${info.name}`);
    return new Joystick(device, options);
  }

  get name(): string {
    return this.device.info.name;
  }

  get connected(): boolean {
    return this.device.connected;
  }

  /**
   * Drains every pending event into the state record. Call once per frame.
   * Returns false once the device is gone; queued events are still applied.
   */
  update(): boolean {
    for (const event of this.device.poll()) {
      this.apply(event);
    }
    return this.device.connected;
  }

  /** Stores one event. Returns false for an untracked identifier. */
  apply(event: JoystickEvent): boolean {
    return applyEvent(this.state, event);
  }

  /** Latest state of button `id`; false when untracked or never seen. */
  button(id: number): boolean {
    return this.state.buttons[id] ?? false;
  }

  /** Latest value of axis `id`; 0 when untracked or never seen. */
  axis(id: number): number {
    return this.state.axes[id] ?? 0;
  }

  // ── Grouped views ───────────────────────────────────────────────────────

  get faceButtons(): FaceButtons {
    return {
      A: this.button(DECK_BUTTONS.A),
      B: this.button(DECK_BUTTONS.B),
      X: this.button(DECK_BUTTONS.X),
      Y: this.button(DECK_BUTTONS.Y),
    };
  }

  /** The Deck reports the D-pad as four buttons, not a hat. */
  get dpadState(): DpadState {
    return {
      Up:    this.button(DECK_BUTTONS.Up),
      Down:  this.button(DECK_BUTTONS.Down),
      Left:  this.button(DECK_BUTTONS.Left),
      Right: this.button(DECK_BUTTONS.Right),
    };
  }

  get shoulderState(): ShoulderState {
    return {
      L1: this.button(DECK_BUTTONS.L1),
      R1: this.button(DECK_BUTTONS.R1),
      L2: this.axis(DECK_AXES.L2),
      R2: this.axis(DECK_AXES.R2),
    };
  }

  get joystickState(): StickState {
    return {
      LX: this.axis(DECK_AXES.LX),
      LY: this.axis(DECK_AXES.LY),
      RX: this.axis(DECK_AXES.RX),
      RY: this.axis(DECK_AXES.RY),
      L3: this.button(DECK_BUTTONS.L3),
      R3: this.button(DECK_BUTTONS.R3),
    };
  }

  get backButtons(): BackButtons {
    return {
      L4: this.button(DECK_BUTTONS.L4),
      R4: this.button(DECK_BUTTONS.R4),
      L5: this.button(DECK_BUTTONS.L5),
      R5: this.button(DECK_BUTTONS.R5),
    };
  }

  /** Copies of every tracked axis and button. */
  get fullState(): FullState {
    return {
      axes:    [...this.state.axes],
      buttons: [...this.state.buttons],
    };
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  /** Releases the device. Safe to call more than once. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.device.close();
    log.info("Joystick closed and device released");
  }
}
