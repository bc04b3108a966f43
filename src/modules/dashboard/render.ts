/**
 * render.ts — Dashboard frames as terminal tables
 *
 * Builds strings only; redrawing them is live.ts's job.
 *
 * Two layouts:
 *   • raw     — "Buttons" (ID → state) and "Axes" (ID → value) side by side
 *   • grouped — Face Buttons, D-Pad, Joysticks, Shoulders, Back Grips panels
 *
 * In grouped panels the value's type decides how it is shown: booleans are
 * buttons, numbers are axes.
 */

import Table from "cli-table3";
import { Chalk, type ChalkInstance } from "chalk";
import { formatAxis, formatButton, axisTone } from "./format.js";
import type {
  FaceButtons,
  DpadState,
  ShoulderState,
  StickState,
  BackButtons,
} from "../joystick/index.js";

// ── Types ─────────────────────────────────────────────────────────────────

export interface RenderOptions {
  /** Emit ANSI colors. Defaults to true. */
  color?: boolean;
}

/** The grouped views a dashboard frame is built from (a Joystick satisfies this). */
export interface GroupedInputView {
  readonly faceButtons:   FaceButtons;
  readonly dpadState:     DpadState;
  readonly shoulderState: ShoulderState;
  readonly joystickState: StickState;
  readonly backButtons:   BackButtons;
}

type PanelEntries = Readonly<Record<string, boolean | number>>;

// ── Helpers ───────────────────────────────────────────────────────────────

const NO_BORDER = {
  "top": "", "top-mid": "", "top-left": "", "top-right": "",
  "bottom": "", "bottom-mid": "", "bottom-left": "", "bottom-right": "",
  "left": "", "left-mid": "", "mid": "", "mid-mid": "",
  "right": "", "right-mid": "", "middle": " ",
};

function palette(options: RenderOptions): ChalkInstance {
  return new Chalk({ level: options.color === false ? 0 : 1 });
}

function colorAxis(c: ChalkInstance, value: number): string {
  const text = formatAxis(value);
  switch (axisTone(value)) {
    case "positive": return c.green(text);
    case "negative": return c.red(text);
    default:         return c.white(text);
  }
}

function colorButton(c: ChalkInstance, pressed: boolean, style: "raw" | "grouped"): string {
  const text = formatButton(pressed, style);
  return pressed ? c.bold.green(text) : c.red(text);
}

/** Lays rendered blocks out left to right. */
function columns(blocks: string[]): string {
  const outer = new Table({
    chars: NO_BORDER,
    style: { "padding-left": 0, "padding-right": 1, head: [], border: [] },
  });
  outer.push(blocks);
  return outer.toString();
}

function panel(c: ChalkInstance, title: string, entries: PanelEntries): string {
  const table = new Table({
    colAligns: ["left", "right"],
    style: { head: [], border: [] },
  });
  table.push([{ content: c.bold.cyan(title), colSpan: 2, hAlign: "center" }]);

  for (const [item, value] of Object.entries(entries)) {
    const shown = typeof value === "boolean"
      ? colorButton(c, value, "grouped")
      : colorAxis(c, value);
    table.push([c.cyan(item), shown]);
  }
  return table.toString();
}

// ── Public API ────────────────────────────────────────────────────────────

/**
 * Frame for the minimal poller: every tracked button and axis by raw ID.
 */
export function renderRawDashboard(
  axes: readonly number[],
  buttons: readonly boolean[],
  options: RenderOptions = {}
): string {
  const c = palette(options);

  const buttonTable = new Table({
    head: [c.cyan("ID"), c.magenta("State")],
    colAligns: ["right", "left"],
    style: { head: [], border: [] },
  });
  buttons.forEach((pressed, id) => {
    buttonTable.push([c.cyan(String(id)), colorButton(c, pressed, "raw")]);
  });

  const axisTable = new Table({
    head: [c.cyan("ID"), c.magenta("Value")],
    colAligns: ["right", "right"],
    style: { head: [], border: [] },
  });
  axes.forEach((value, id) => {
    axisTable.push([c.cyan(String(id)), colorAxis(c, value)]);
  });

  return columns([
    `${c.bold.cyan("Buttons")}\n${buttonTable.toString()}`,
    `${c.bold.cyan("Axes")}\n${axisTable.toString()}`,
  ]);
}

/**
 * Frame for the grouped dashboard:
 *   [Face Buttons, D-Pad]  [Joysticks]  [Shoulders, Back Grips]
 */
export function renderGroupedDashboard(
  view: GroupedInputView,
  options: RenderOptions = {}
): string {
  const c = palette(options);

  return columns([
    columns([
      panel(c, "Face Buttons", view.faceButtons),
      panel(c, "D-Pad", view.dpadState),
    ]),
    panel(c, "Joysticks", view.joystickState),
    columns([
      panel(c, "Shoulders", view.shoulderState),
      panel(c, "Back Grips", view.backButtons),
    ]),
  ]);
}

/** Header line shown above every frame. */
export function renderHeader(title: string, options: RenderOptions = {}): string {
  const c = palette(options);
  return `${c.bold(title)} ${c.dim("(Press Ctrl+C to quit)")}`;
}
