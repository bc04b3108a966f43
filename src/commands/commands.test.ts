/**
 * commands.test.ts — poll, dashboard and list end to end
 *
 * A FakeJoystickDevice replaces the device node and a PassThrough replaces
 * stdout. Most runs start with the device already disconnected, so they drain
 * the queued events on their first frame and end with exit code 1. The rest
 * stay connected and are stopped through the bound SIGINT handler, or by a
 * device whose poll() throws.
 */

import { describe, it, after } from "node:test";
import assert from "node:assert/strict";
import ansiEscapes from "ansi-escapes";
import { runPoll } from "./poll.js";
import { runDashboard } from "./dashboard.js";
import { runList } from "./list.js";
import { ReaderOptionsSchema } from "../config.js";
import { JoystickNotFoundError } from "../modules/joystick/index.js";
import {
  FakeJoystickDevice,
  axisEvent,
  buttonEvent,
  captureStream,
  flush,
  makeInputTree,
} from "../tests/helpers/index.js";

const options = ReaderOptionsSchema.parse({ refreshHz: 1000 });

/** Calls the SIGINT handler a running command bound, once it has drawn a few frames. */
async function interrupt(listenersBefore: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, 30));
  const handler = process.listeners("SIGINT")[listenersBefore];
  assert.ok(handler, "command did not bind a SIGINT handler");
  handler("SIGINT");
}

class FailingDevice extends FakeJoystickDevice {
  override poll(): never {
    throw new Error("read failed");
  }
}

function unpluggedDevice(): FakeJoystickDevice {
  const device = new FakeJoystickDevice({ name: "Steam Deck" });
  device.push(
    buttonEvent(3, true),
    axisEvent(0, 12040),
    buttonEvent(25, true),
    buttonEvent(3, false)
  );
  device.disconnect();
  return device;
}

describe("runPoll --events", () => {
  it("prints one line per stored event and skips untracked ones", async () => {
    const device = unpluggedDevice();
    const { stream, text } = captureStream();

    const code = await runPoll(
      { ...options, events: true },
      { out: stream, color: false, openDevice: async () => device }
    );

    await flush();
    assert.equal(code, 1);
    assert.equal(text(), "Button  3: Pressed\nAxis    0: +12040\nButton  3: Released\n");
    assert.equal(device.closeCount, 1);
  });
});

describe("runPoll — table mode", () => {
  it("redraws the raw Buttons / Axes tables", async () => {
    const device = unpluggedDevice();
    const { stream, text } = captureStream();

    const code = await runPoll(
      { ...options, events: false },
      { out: stream, color: false, openDevice: async () => device }
    );

    await flush();
    assert.equal(code, 1);
    const out = text();
    assert.ok(out.includes("SIMPLE JOYSTICK DASHBOARD (Press Ctrl+C to quit)"));
    assert.match(out, /│ +0 │ \+12040 │/);
    assert.match(out, /│ +3 │ Released │/);
    assert.equal(device.closeCount, 1);
  });
});

describe("runPoll — no device", () => {
  it("returns 1 when no joystick is found", async () => {
    const code = await runPoll(
      { ...options, events: true },
      { openDevice: async () => { throw new JoystickNotFoundError(); } }
    );
    assert.equal(code, 1);
  });

  it("lets unexpected errors propagate", async () => {
    await assert.rejects(
      runPoll(
        { ...options, events: true },
        { openDevice: async () => { throw new TypeError("boom"); } }
      ),
      TypeError
    );
  });
});

describe("runDashboard", () => {
  it("renders the grouped panels and releases the device", async () => {
    const device = unpluggedDevice();
    const { stream, text } = captureStream();

    const code = await runDashboard(options, {
      out: stream,
      color: false,
      openDevice: async () => device,
    });

    await flush();
    assert.equal(code, 1);
    const out = text();
    assert.ok(out.includes("STEAM DECK INPUT: Steam Deck (Press Ctrl+C to quit)"));
    assert.match(out, /│ LX +│ +\+12040 │/);
    assert.match(out, /│ Y +│ +Off │/);
    assert.equal(device.closeCount, 1);
  });
});

describe("runPoll / runDashboard — Ctrl+C", () => {
  it("poll table mode returns 0, restores the screen and closes the device", async () => {
    const device = new FakeJoystickDevice().push(buttonEvent(1, true));
    const { stream, text } = captureStream();
    const before = process.listenerCount("SIGINT");

    const running = runPoll(
      { ...options, events: false },
      { out: stream, color: false, openDevice: async () => device }
    );
    await interrupt(before);

    assert.equal(await running, 0);
    await flush();
    assert.ok(text().endsWith(ansiEscapes.exitAlternativeScreen));
    assert.equal(device.closeCount, 1);
    assert.equal(process.listenerCount("SIGINT"), before);
  });

  it("dashboard returns 0, restores the screen and closes the device", async () => {
    const device = new FakeJoystickDevice().push(axisEvent(2, -32768));
    const { stream, text } = captureStream();
    const before = process.listenerCount("SIGINT");

    const running = runDashboard(options, {
      out: stream,
      color: false,
      openDevice: async () => device,
    });
    await interrupt(before);

    assert.equal(await running, 0);
    await flush();
    const out = text();
    assert.match(out, /│ RX +│ +-32768 │/);
    assert.ok(out.endsWith(ansiEscapes.exitAlternativeScreen));
    assert.equal(device.closeCount, 1);
    assert.equal(process.listenerCount("SIGINT"), before);
  });
});

describe("runPoll / runDashboard — failing frame", () => {
  it("dashboard restores the screen and closes the device before the error propagates", async () => {
    const device = new FailingDevice();
    const { stream, text } = captureStream();
    const before = process.listenerCount("SIGINT");

    await assert.rejects(
      runDashboard(options, { out: stream, color: false, openDevice: async () => device }),
      /read failed/
    );
    await flush();
    assert.equal(text(), ansiEscapes.enterAlternativeScreen + ansiEscapes.exitAlternativeScreen);
    assert.equal(device.closeCount, 1);
    assert.equal(process.listenerCount("SIGINT"), before);
  });

  it("poll closes the device before the error propagates", async () => {
    const device = new FailingDevice();

    await assert.rejects(
      runPoll({ ...options, events: true }, { openDevice: async () => device }),
      /read failed/
    );
    assert.equal(device.closeCount, 1);
  });
});

describe("runList", () => {
  const tree  = makeInputTree({ js1: "Second Pad", js0: "Steam Deck" });
  const empty = makeInputTree({});
  after(() => {
    tree.cleanup();
    empty.cleanup();
  });

  it("prints devices in --index order", async () => {
    const { stream, text } = captureStream();
    assert.equal(runList(tree, { out: stream }), 0);
    await flush();
    assert.equal(
      text(),
      `0  ${tree.devDir}/js0  Steam Deck\n1  ${tree.devDir}/js1  Second Pad\n`
    );
  });

  it("reports when nothing is connected", async () => {
    const { stream, text } = captureStream();
    assert.equal(runList(empty, { out: stream }), 1);
    await flush();
    assert.equal(text(), "No joystick found.\n");
  });
});
