export * from "./modules/joystick/index.js";
export * from "./modules/dashboard/index.js";
export * from "./modules/loop/index.js";
export { resolveReaderOptions, ReaderOptionsSchema, frameIntervalMs } from "./config.js";
export type { ReaderOptions, ReaderOptionsInput } from "./config.js";
