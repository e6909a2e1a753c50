// Client-side world model shared by the receive loop and the renderer
import { LockReentryError } from "../shared/errors.js";
import type { ServerMessage } from "../shared/protocol.js";
import type { PowerUpRecord, SnakeRecord, WallRecord } from "../shared/types.js";

export interface WorldFields {
  width: number;
  height: number;
  snakes: Map<number, SnakeRecord>;
  walls: Map<number, WallRecord>;
  powerUps: Map<number, PowerUpRecord>;
}

export interface WorldSnapshot {
  width: number;
  height: number;
  snakes: SnakeRecord[];
  walls: WallRecord[];
  powerUps: PowerUpRecord[];
}

/**
 * Entities keyed by their own ids behind one lock.
 *
 * The lock is a synchronous critical section: callbacks passed to
 * {@link update} and {@link read} cannot await, so nothing else on the event
 * loop runs while they hold it. Acquiring it again from inside a callback
 * throws.
 */
export class WorldState {
  private readonly fields: WorldFields = {
    width: 0,
    height: 0,
    snakes: new Map(),
    walls: new Map(),
    powerUps: new Map(),
  };
  private locked = false;

  update<T>(fn: (world: WorldFields) => T): T {
    if (this.locked) throw new LockReentryError();
    this.locked = true;
    try {
      return fn(this.fields);
    } finally {
      this.locked = false;
    }
  }

  read<T>(fn: (world: Readonly<WorldFields>) => T): T {
    return this.update(fn);
  }

  /** Fold one decoded server message into the world. */
  apply(message: ServerMessage): void {
    switch (message.kind) {
      case "worldSize":
        this.setSize(message.size);
        return;
      case "snake":
        this.upsertSnake(message.snake);
        return;
      case "wall":
        this.upsertWall(message.wall);
        return;
      case "power":
        this.applyPowerUp(message.power);
        return;
      case "ignored":
        return;
    }
  }

  // Worlds are square: one number sets both sides.
  setSize(size: number): void {
    this.update((w) => {
      w.width = size;
      w.height = size;
    });
  }

  upsertSnake(snake: SnakeRecord): void {
    this.update((w) => w.snakes.set(snake.SnakeId, snake));
  }

  upsertWall(wall: WallRecord): void {
    this.update((w) => w.walls.set(wall.WallId, wall));
  }

  applyPowerUp(power: PowerUpRecord): void {
    this.update((w) => {
      if (power.IsActive) w.powerUps.delete(power.PowerId);
      else w.powerUps.set(power.PowerId, power);
    });
  }

  snapshot(): WorldSnapshot {
    return this.read((w) => ({
      width: w.width,
      height: w.height,
      snakes: Array.from(w.snakes.values()),
      walls: Array.from(w.walls.values()),
      powerUps: Array.from(w.powerUps.values()),
    }));
  }
}
