/**
 * format.ts — Plain-text formatting of joystick values
 *
 * Pure module — no terminal access, fully unit-testable.
 */

import type { JoystickEvent } from "../joystick/index.js";

/** Axis magnitude beyond which a value is shown as deflected. */
export const AXIS_HIGHLIGHT = 1000;

export type AxisTone = "positive" | "negative" | "neutral";

/**
 * Sign-prefixed, right-aligned in 6 columns.
 *   12040 → "+12040",  0 → "    +0",  -256 → "  -256"
 */
export function formatAxis(value: number): string {
  const sign = value < 0 ? "-" : "+";
  return `${sign}${Math.abs(value)}`.padStart(6);
}

export function axisTone(value: number): AxisTone {
  if (value > AXIS_HIGHLIGHT)  return "positive";
  if (value < -AXIS_HIGHLIGHT) return "negative";
  return "neutral";
}

/**
 * "raw" is the ID table wording (Pressed / Released),
 * "grouped" the panel wording (Pressed / Off).
 */
export function formatButton(pressed: boolean, style: "raw" | "grouped" = "raw"): string {
  if (pressed) return "Pressed";
  return style === "raw" ? "Released" : "Off";
}

/**
 * One line per event, identifiers padded to 2 columns:
 *   "Button  3: Pressed"
 *   "Axis    0: +12040"
 */
export function formatEventLine(event: JoystickEvent): string {
  const id = event.type === "axis" ? event.axis : event.button;
  const label = event.type === "axis" ? "Axis  " : "Button";
  const value = event.type === "axis" ? formatAxis(event.value) : formatButton(event.pressed);
  return `${label} ${String(id).padStart(2)}: ${value}`;
}
