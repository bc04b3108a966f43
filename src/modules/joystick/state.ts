import type { JoystickEvent } from "./index.js";

/**
 * Latest-known value per tracked identifier. Buttons start released and axes
 * at zero; entries are overwritten in place, last write wins.
 */
export interface InputState {
  readonly axes:    number[];
  readonly buttons: boolean[];
}

export function createInputState(numAxes: number, numButtons: number): InputState {
  return {
    axes:    new Array<number>(numAxes).fill(0),
    buttons: new Array<boolean>(numButtons).fill(false),
  };
}

/**
 * Store one event. Identifiers outside the tracked range are ignored.
 * Returns whether the event was stored.
 */
export function applyEvent(state: InputState, event: JoystickEvent): boolean {
  if (event.type === "axis") {
    if (event.axis >= state.axes.length) return false;
    state.axes[event.axis] = event.value;
    return true;
  }
  if (event.button >= state.buttons.length) return false;
  state.buttons[event.button] = event.pressed;
  return true;
}
