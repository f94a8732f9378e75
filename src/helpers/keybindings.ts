import type { Key } from "ink";
import type { BrowserCommand } from "../types.js";

const COMMAND_BY_KEY: Readonly<Record<string, BrowserCommand>> = Object.freeze({
  q: "quit",
  escape: "quit",
  "ctrl+c": "quit",
  up: "move-up",
  k: "move-up",
  down: "move-down",
  j: "move-down",
  pageup: "page-up",
  pagedown: "page-down",
  g: "first",
  "shift+g": "last",
  enter: "activate",
  right: "activate",
  l: "activate",
  left: "back",
  backspace: "back",
  h: "back",
  tab: "focus-next",
  "shift+tab": "focus-prev",
  r: "refresh",
  d: "toggle-detail",
  "shift+j": "scroll-detail-down",
  "shift+k": "scroll-detail-up",
  "?": "toggle-help",
});

export function resolveBrowserCommand(key: string): BrowserCommand | undefined {
  return COMMAND_BY_KEY[key];
}

/**
 * Names an Ink key event the way the binding table spells it:
 * `up`, `shift+tab`, `ctrl+c`, `shift+g`, or the typed character.
 */
export function keyName(input: string, key: Partial<Key>): string {
  if (key.upArrow) return "up";
  if (key.downArrow) return "down";
  if (key.leftArrow) return "left";
  if (key.rightArrow) return "right";
  if (key.pageUp) return "pageup";
  if (key.pageDown) return "pagedown";
  if (key.return) return "enter";
  if (key.escape) return "escape";
  if (key.tab) return key.shift ? "shift+tab" : "tab";
  // Most terminals send DEL for the backspace key, which Ink reports as delete.
  if (key.backspace || key.delete) return "backspace";
  if (key.ctrl) return `ctrl+${input.toLowerCase()}`;
  if (input.length === 1 && input !== input.toLowerCase()) return `shift+${input.toLowerCase()}`;
  return input;
}
