import { describe, expect, it } from "vitest";

import type { SnakeRecord } from "../../shared/types.js";
import { render } from "../render.js";
import type { WorldSnapshot } from "../state.js";

function snake(id: number, name: string, score: number, extra: Partial<SnakeRecord> = {}): SnakeRecord {
  return {
    SnakeId: id,
    Name: name,
    Body: [],
    Direction: { X: 0, Y: -1 },
    Score: score,
    Died: false,
    Alive: true,
    Disconnected: false,
    Joined: false,
    ...extra,
  };
}

function world(snakes: SnakeRecord[]): WorldSnapshot {
  return { width: 2000, height: 2000, snakes, walls: [], powerUps: [] };
}

describe("render.scoreboard", () => {
  it("ranks live players by score and marks the local one", () => {
    const out = render.scoreboard(
      world([snake(1, "bob", 3), snake(7, "Alice", 9), snake(2, "", 3, { Alive: false })]),
      7,
    );

    expect(out.split("\n")).toEqual([
      "world 2000x2000 | snakes 3 | power-ups 0 | walls 0",
      "* 1. Alice 9",
      "  2. bob 3",
      "  3. anon 3 (dead)",
    ]);
  });

  it("leaves out disconnected snakes and respects the limit", () => {
    const out = render.scoreboard(
      world([snake(1, "a", 1), snake(2, "b", 2, { Disconnected: true }), snake(3, "c", 3)]),
      null,
      1,
    );

    expect(out.split("\n")).toEqual(["world 2000x2000 | snakes 3 | power-ups 0 | walls 0", "  1. c 3"]);
  });
});
