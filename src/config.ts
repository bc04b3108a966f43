import { z } from "zod";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** A whole, non-negative count or index. Strings from the environment are coerced. */
const Count = z.coerce.number().int().min(0);

/**
 * Validates a device directory: must be a non-empty absolute Unix path.
 */
export const AbsolutePath = z
  .string()
  .min(1, "Path must not be empty")
  .refine((p) => p.startsWith("/"), {
    message: "Directory must be an absolute path starting with /",
  });

export const ReaderOptionsSchema = z.object({
  /** Position in the sorted device list; 0 is the first joystick found. */
  index: Count.default(0),
  /** Steam Deck reports 6 axes: two sticks and two triggers. */
  numAxes: Count.default(6),
  /** Covers the back grips, which sit at 16-19. */
  numButtons: Count.default(20),
  refreshHz: z.coerce.number().int().min(1).max(1000).default(60),
  devDir: AbsolutePath.default("/dev/input"),
  sysDir: AbsolutePath.default("/sys/class/input"),
});

export type ReaderOptions = z.infer<typeof ReaderOptionsSchema>;
export type ReaderOptionsInput = z.input<typeof ReaderOptionsSchema>;

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

const OPTION_KEYS = [
  "index",
  "numAxes",
  "numButtons",
  "refreshHz",
  "devDir",
  "sysDir",
] as const satisfies readonly (keyof ReaderOptions)[];

type OptionKey = (typeof OPTION_KEYS)[number];

export const ENV_KEYS: Readonly<Record<OptionKey, string>> = {
  index:      "DECK_INPUT_INDEX",
  numAxes:    "DECK_INPUT_AXES",
  numButtons: "DECK_INPUT_BUTTONS",
  refreshHz:  "DECK_INPUT_HZ",
  devDir:     "DECK_INPUT_DEV_DIR",
  sysDir:     "DECK_INPUT_SYS_DIR",
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Resolves reader options: defaults, then DECK_INPUT_* environment variables,
 * then CLI flags. Flags left undefined do not override the environment.
 * Throws a ZodError naming the offending field on invalid input.
 */
export function resolveReaderOptions(
  flags: ReaderOptionsInput = {},
  env: NodeJS.ProcessEnv = process.env
): ReaderOptions {
  const raw: Record<string, unknown> = {};
  for (const key of OPTION_KEYS) {
    const fromEnv = env[ENV_KEYS[key]];
    if (fromEnv !== undefined && fromEnv !== "") raw[key] = fromEnv;
    const fromFlag = flags[key];
    if (fromFlag !== undefined) raw[key] = fromFlag;
  }
  return ReaderOptionsSchema.parse(raw);
}

/** Milliseconds between frames for a refresh rate (60 Hz → 16 ms). */
export function frameIntervalMs(hz: number): number {
  return Math.max(1, Math.floor(1000 / hz));
}
