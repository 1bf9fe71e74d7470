import termKit from "terminal-kit";
import type { Screen } from "./terminal-view.js";

export type Term = typeof termKit.terminal;

export const term: Term = termKit.terminal;

export function createTermkitScreen(t: Term): Screen {
  return {
    write(x, y, text) {
      t.moveTo(x, y);
      t.white(text);
    },
    moveCursor(x, y) {
      t.moveTo(x, y);
    },
  };
}

export function enterTerminal(t: Term): void {
  t.fullscreen(true);
  t.grabInput(true);
}

/** Leave fullscreen and give the keyboard back. Safe to call more than once. */
export function exitTerminal(t: Term): void {
  t.hideCursor(false);
  t.grabInput(false);
  t.fullscreen(false);
}
