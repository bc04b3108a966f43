/**
 * config.test.ts — Option resolution: defaults, environment, flags
 *
 * The environment is passed in explicitly; process.env is never touched.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { resolveReaderOptions, ReaderOptionsSchema, frameIntervalMs, AbsolutePath } from "./config.js";

describe("ReaderOptionsSchema — defaults", () => {
  it("parses an empty object with all defaults", () => {
    assert.deepEqual(ReaderOptionsSchema.parse({}), {
      index: 0,
      numAxes: 6,
      numButtons: 20,
      refreshHz: 60,
      devDir: "/dev/input",
      sysDir: "/sys/class/input",
    });
  });
});

describe("resolveReaderOptions — precedence", () => {
  it("reads DECK_INPUT_* variables and coerces numbers", () => {
    const options = resolveReaderOptions({}, {
      DECK_INPUT_INDEX: "1",
      DECK_INPUT_AXES: "8",
      DECK_INPUT_HZ: "30",
      DECK_INPUT_DEV_DIR: "/tmp/dev",
    });
    assert.equal(options.index, 1);
    assert.equal(options.numAxes, 8);
    assert.equal(options.refreshHz, 30);
    assert.equal(options.devDir, "/tmp/dev");
    assert.equal(options.numButtons, 20);
  });

  it("flags override the environment", () => {
    const options = resolveReaderOptions({ index: 2 }, { DECK_INPUT_INDEX: "1" });
    assert.equal(options.index, 2);
  });

  it("undefined flags leave the environment value in place", () => {
    const options = resolveReaderOptions({ index: undefined }, { DECK_INPUT_INDEX: "1" });
    assert.equal(options.index, 1);
  });

  it("ignores empty environment values", () => {
    const options = resolveReaderOptions({}, { DECK_INPUT_BUTTONS: "" });
    assert.equal(options.numButtons, 20);
  });
});

describe("resolveReaderOptions — validation", () => {
  it("rejects a negative index", () => {
    assert.throws(() => resolveReaderOptions({ index: -1 }, {}), /index/);
  });

  it("rejects a non-numeric refresh rate from the environment", () => {
    assert.throws(() => resolveReaderOptions({}, { DECK_INPUT_HZ: "fast" }), /refreshHz/);
  });

  it("rejects a zero refresh rate", () => {
    assert.throws(() => resolveReaderOptions({ refreshHz: 0 }, {}), /refreshHz/);
  });

  it("rejects a relative device directory", () => {
    assert.throws(() => AbsolutePath.parse("dev/input"), /absolute/i);
  });
});

describe("frameIntervalMs", () => {
  it("60 Hz is 16 ms", () => {
    assert.equal(frameIntervalMs(60), 16);
  });

  it("never drops below 1 ms", () => {
    assert.equal(frameIntervalMs(1000), 1);
  });
});
