// Keyboard input: arrow keys and WASD become direction commands
import { emitKeypressEvents } from "node:readline";
import type { Direction } from "../shared/types.js";

export interface KeyPress {
  name?: string;
  ctrl?: boolean;
}

const KEYMAP: Record<string, Direction> = {
  up: "up",
  w: "up",
  down: "down",
  s: "down",
  left: "left",
  a: "left",
  right: "right",
  d: "right",
};

export function directionForKey(key: KeyPress): Direction | null {
  if (!key.name) return null;
  return KEYMAP[key.name] ?? null;
}

export function isQuitKey(key: KeyPress): boolean {
  return key.name === "q" || (key.ctrl === true && key.name === "c");
}

/** A readable key source; process.stdin in practice. */
export interface KeyboardInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface InputHandlers {
  onDirection(direction: Direction): void;
  onQuit(): void;
}

/** Listen for key presses on `input`; returns a function that stops listening. */
export function registerKeyboard(input: KeyboardInput, handlers: InputHandlers): () => void {
  emitKeypressEvents(input);
  if (input.isTTY) input.setRawMode?.(true);
  const onKey = (_str: string | undefined, key: KeyPress | undefined): void => {
    if (!key) return;
    if (isQuitKey(key)) {
      handlers.onQuit();
      return;
    }
    const direction = directionForKey(key);
    if (direction) handlers.onDirection(direction);
  };
  input.on("keypress", onKey);
  input.resume();
  return () => {
    input.off("keypress", onKey);
    if (input.isTTY) input.setRawMode?.(false);
    input.pause();
  };
}
