import type { RateInput, SetupCommand } from "@lifegrid/core";

// terminal-kit key names
const SETUP_KEYS: Record<string, SetupCommand> = {
  UP: "move-up",
  DOWN: "move-down",
  LEFT: "move-left",
  RIGHT: "move-right",
  " ": "toggle-cell",
  ENTER: "confirm",
  KP_ENTER: "confirm",
  q: "quit",
};

export function setupCommandForKey(name: string): SetupCommand | null {
  return Object.hasOwn(SETUP_KEYS, name) ? SETUP_KEYS[name] : null;
}

export function rateInputForKey(name: string): RateInput | null {
  if (/^[0-9]$/.test(name)) return { type: "digit", char: name };

  switch (name) {
    case "BACKSPACE":
      return { type: "backspace" };
    case "ENTER":
    case "KP_ENTER":
      return { type: "confirm" };
    case "ESCAPE":
      return { type: "cancel" };
    default:
      return null;
  }
}

export const isQuitKey = (name: string): boolean => name === "q";
