#!/usr/bin/env node
import { command, subcommands, run, option, flag, optional, number, boolean } from "cmd-ts";
import { ZodError } from "zod";
import { resolveReaderOptions } from "./config.js";
import { runPoll } from "./commands/poll.js";
import { runDashboard } from "./commands/dashboard.js";
import { runList } from "./commands/list.js";
import { logger } from "./logger.js";

const readerArgs = {
  index: option({
    long: "index",
    short: "i",
    type: optional(number),
    description: "Joystick to open, 0 is the first one found [env DECK_INPUT_INDEX]",
  }),
  numAxes: option({
    long: "axes",
    type: optional(number),
    description: "Number of axes to track [env DECK_INPUT_AXES, default 6]",
  }),
  numButtons: option({
    long: "buttons",
    type: optional(number),
    description: "Number of buttons to track [env DECK_INPUT_BUTTONS, default 20]",
  }),
  refreshHz: option({
    long: "hz",
    type: optional(number),
    description: "Refresh rate [env DECK_INPUT_HZ, default 60]",
  }),
};

/** Runs a command body, turning invalid options into exit code 1. */
async function exitWith(body: () => Promise<number> | number): Promise<void> {
  let code: number;
  try {
    code = await body();
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    for (const issue of err.issues) {
      logger.error(`Invalid option ${issue.path.join(".")}: ${issue.message}`);
    }
    code = 1;
  }
  // A blocked read on the device node can keep the event loop alive after close.
  process.exit(code);
}

const app = subcommands({
  name: "deck-input",
  description: "Read Steam Deck joystick input and show it in the terminal",
  cmds: {
    poll: command({
      name: "poll",
      description: "Show raw button and axis values by identifier",
      args: {
        ...readerArgs,
        events: flag({
          long: "events",
          type: boolean,
          description: "Print one line per event instead of redrawing a table",
        }),
      },
      handler: ({ events, ...flags }) =>
        exitWith(() => runPoll({ ...resolveReaderOptions(flags), events })),
    }),
    dashboard: command({
      name: "dashboard",
      description: "Live grouped view: face buttons, D-pad, sticks, shoulders, back grips",
      args: readerArgs,
      handler: (flags) => exitWith(() => runDashboard(resolveReaderOptions(flags))),
    }),
    list: command({
      name: "list",
      description: "List connected joysticks",
      args: {},
      handler: () => exitWith(() => runList(resolveReaderOptions())),
    }),
  },
});

run(app, process.argv.slice(2)).catch((err: unknown) => {
  logger.fatal({ err }, "Unexpected error");
  process.exit(1);
});
