#!/usr/bin/env -S tsx
import { Board, RateEntry, SetupSession, SimulationDriver } from "@lifegrid/core";
import { isQuitKey, rateInputForKey, setupCommandForKey } from "./keys.js";
import { computeLayout } from "./layout.js";
import { createTermkitScreen, enterTerminal, exitTerminal, term } from "./terminal.js";
import { TerminalView } from "./terminal-view.js";

const SETUP_PROMPT = "Use arrow keys and spacebar to set tiles. Then press enter to continue.";
const RATE_PROMPT = "Now type the desired ticks/sec and press enter to confirm: ";

let keyHandler: (name: string) => void = () => {};

/**
 * Route key presses to `handle` until it returns something other than null.
 */
function readKeys<T>(handle: (name: string) => T | null): Promise<T> {
  return new Promise((resolve) => {
    keyHandler = (name) => {
      const result = handle(name);
      if (result === null) return;
      keyHandler = () => {};
      resolve(result);
    };
  });
}

/** Resolves with the number of ticks run, or null if the user quit early. */
async function main(): Promise<number | null> {
  const layout = computeLayout(term.width, term.height);

  enterTerminal(term);
  term.on("key", (name: string) => {
    if (name === "CTRL_C") {
      exitTerminal(term);
      process.exit(130);
    }
    keyHandler(name);
  });

  const view = new TerminalView(createTermkitScreen(term), layout);
  view.drawFrame();

  // 1. Paint the initial generation
  const session = new SetupSession(new Board(layout.rows, layout.cols), view);
  view.prompt(SETUP_PROMPT);
  view.placeCursor(session.cursor);

  const setup = await readKeys((name) => {
    const command = setupCommandForKey(name);
    if (!command) return null;
    const step = session.handle(command);
    if (step.kind === "continue") {
      view.placeCursor(session.cursor);
      return null;
    }
    return step;
  });
  if (setup.kind === "cancelled") return null;

  // 2. Ask for the rate
  const entry = new RateEntry();
  view.prompt(RATE_PROMPT);

  const rate = await readKeys((name) => {
    const input = rateInputForKey(name);
    if (!input) return null;
    const step = entry.handle(input);
    switch (step.kind) {
      case "editing":
        view.prompt(RATE_PROMPT + step.text);
        return null;
      case "invalid":
        view.prompt(`${RATE_PROMPT}Invalid value`);
        return null;
      default:
        return step;
    }
  });
  if (rate.kind === "cancelled") return null;

  // 3. Run until nothing changes, then wait for q
  term.hideCursor();
  const driver = new SimulationDriver({ view });
  const total = await driver.run(setup.board, rate.ticksPerSecond);

  await readKeys((name) => (isQuitKey(name) ? true : null));
  return total;
}

main().then(
  (total) => {
    exitTerminal(term);
    console.log(total === null ? "Quit before the simulation started." : `Terminated after ${total} ticks.`);
    process.exit(0);
  },
  (error: unknown) => {
    exitTerminal(term);
    console.error("[lifegrid] fatal error:", error);
    process.exit(1);
  },
);
