// Terminal dashboard — value formatting, table frames and live redraw

export { formatAxis, formatButton, formatEventLine, axisTone, AXIS_HIGHLIGHT } from "./format.js";
export type { AxisTone } from "./format.js";
export { renderRawDashboard, renderGroupedDashboard, renderHeader } from "./render.js";
export type { RenderOptions, GroupedInputView } from "./render.js";
export { createLiveView } from "./live.js";
export type { LiveView } from "./live.js";
