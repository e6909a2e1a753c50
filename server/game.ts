// Server-side snake simulation
import { DIRECTIONS, type Direction, type Point, type PowerUpRecord, type SnakeRecord, type WallRecord } from "../src/shared/types.js";

export const SNAKE_SPEED = 6;
const START_SEGMENTS = 20;
const GROWTH_PER_POWERUP = 8;
const EAT_RADIUS = 10;
const HIT_RADIUS = 5;
const WALL_THICKNESS = 50;
const RESPAWN_TICKS = 40;
const SPAWN_MARGIN = 200;

const VECTORS: Record<Direction, Point> = {
  up: { X: 0, Y: -1 },
  down: { X: 0, Y: 1 },
  left: { X: -1, Y: 0 },
  right: { X: 1, Y: 0 },
};

interface ServerSnake {
  id: number;
  name: string;
  body: Point[];
  dir: Point;
  pendingDir: Point | null;
  score: number;
  alive: boolean;
  diedThisTick: boolean;
  growth: number;
  respawnIn: number;
  joined: boolean;
  disconnected: boolean;
}

interface ServerPowerUp {
  id: number;
  location: Point;
  eaten: boolean;
}

export interface SpawnPoint {
  head: Point;
  direction: Direction;
}

export interface GameOptions {
  worldSize: number;
  maxPowerUps: number;
  random?: () => number;
}

export interface TickResult {
  snakes: SnakeRecord[];
  powerUps: PowerUpRecord[];
}

function distance2(a: Point, b: Point): number {
  const dx = a.X - b.X;
  const dy = a.Y - b.Y;
  return dx * dx + dy * dy;
}

export class SnakeGame {
  readonly worldSize: number;
  private readonly maxPowerUps: number;
  private readonly random: () => number;
  private readonly snakes = new Map<number, ServerSnake>();
  private readonly powerUps = new Map<number, ServerPowerUp>();
  private nextSnakeId = 0;
  private nextPowerId = 0;

  constructor(options: GameOptions) {
    this.worldSize = options.worldSize;
    this.maxPowerUps = options.maxPowerUps;
    this.random = options.random ?? Math.random;
  }

  get playerCount(): number {
    return this.snakes.size;
  }

  /** Border walls; the world spans -size/2..size/2 on both axes. */
  walls(): WallRecord[] {
    const h = this.worldSize / 2;
    return [
      { WallId: 0, P1: { X: -h, Y: -h }, P2: { X: h, Y: -h } },
      { WallId: 1, P1: { X: h, Y: -h }, P2: { X: h, Y: h } },
      { WallId: 2, P1: { X: h, Y: h }, P2: { X: -h, Y: h } },
      { WallId: 3, P1: { X: -h, Y: h }, P2: { X: -h, Y: -h } },
    ];
  }

  join(name: string, spawn?: SpawnPoint): number {
    const id = this.nextSnakeId++;
    const snake: ServerSnake = {
      id,
      name: name.slice(0, 16) || "anon",
      body: [],
      dir: VECTORS.right,
      pendingDir: null,
      score: 0,
      alive: true,
      diedThisTick: false,
      growth: 0,
      respawnIn: 0,
      joined: true,
      disconnected: false,
    };
    this.place(snake, spawn ?? this.randomSpawn());
    this.snakes.set(id, snake);
    return id;
  }

  /** Marks the snake gone; it is broadcast once more as disconnected, then dropped. */
  leave(id: number): void {
    const snake = this.snakes.get(id);
    if (!snake) return;
    snake.disconnected = true;
    snake.alive = false;
  }

  steer(id: number, direction: Direction): void {
    const snake = this.snakes.get(id);
    if (!snake || !snake.alive) return;
    const next = VECTORS[direction];
    // No turning back onto the body.
    if (next.X === -snake.dir.X && next.Y === -snake.dir.Y) return;
    snake.pendingDir = next;
  }

  addPowerUp(location?: Point): number {
    const id = this.nextPowerId++;
    this.powerUps.set(id, { id, location: location ?? this.randomPoint(), eaten: false });
    return id;
  }

  tick(): TickResult {
    for (const snake of this.snakes.values()) {
      if (snake.disconnected) continue;
      if (!snake.alive && --snake.respawnIn <= 0) this.respawn(snake);
    }
    for (const snake of this.snakes.values()) {
      if (snake.alive) this.move(snake);
    }
    this.collide();
    this.eat();

    const snakes = Array.from(this.snakes.values(), (s) => this.record(s));
    const powerUps = Array.from(this.powerUps.values(), (p) => ({
      PowerId: p.id,
      Location: { ...p.location },
      IsActive: p.eaten,
    }));

    for (const snake of this.snakes.values()) {
      snake.joined = false;
      snake.diedThisTick = false;
      if (snake.disconnected) this.snakes.delete(snake.id);
    }
    for (const power of this.powerUps.values()) {
      if (power.eaten) this.powerUps.delete(power.id);
    }
    while (this.powerUps.size < this.maxPowerUps) this.addPowerUp();

    return { snakes, powerUps };
  }

  private move(snake: ServerSnake): void {
    if (snake.pendingDir) {
      snake.dir = snake.pendingDir;
      snake.pendingDir = null;
    }
    const head = snake.body[snake.body.length - 1];
    snake.body.push({ X: head.X + snake.dir.X * SNAKE_SPEED, Y: head.Y + snake.dir.Y * SNAKE_SPEED });
    if (snake.growth > 0) snake.growth--;
    else snake.body.shift();
  }

  private collide(): void {
    const limit = this.worldSize / 2 - WALL_THICKNESS / 2;
    const dead: ServerSnake[] = [];
    for (const snake of this.snakes.values()) {
      if (!snake.alive) continue;
      const head = snake.body[snake.body.length - 1];
      if (Math.abs(head.X) >= limit || Math.abs(head.Y) >= limit) {
        dead.push(snake);
        continue;
      }
      for (const other of this.snakes.values()) {
        if (other === snake || !other.alive) continue;
        if (other.body.some((p) => distance2(p, head) < HIT_RADIUS * HIT_RADIUS)) {
          dead.push(snake);
          break;
        }
      }
    }
    for (const snake of dead) {
      snake.alive = false;
      snake.diedThisTick = true;
      snake.respawnIn = RESPAWN_TICKS;
    }
  }

  private eat(): void {
    for (const snake of this.snakes.values()) {
      if (!snake.alive) continue;
      const head = snake.body[snake.body.length - 1];
      for (const power of this.powerUps.values()) {
        if (power.eaten || distance2(power.location, head) > EAT_RADIUS * EAT_RADIUS) continue;
        power.eaten = true;
        snake.score += 1;
        snake.growth += GROWTH_PER_POWERUP;
      }
    }
  }

  private respawn(snake: ServerSnake): void {
    snake.alive = true;
    snake.score = 0;
    snake.growth = 0;
    snake.pendingDir = null;
    this.place(snake, this.randomSpawn());
  }

  private place(snake: ServerSnake, spawn: SpawnPoint): void {
    const dir = VECTORS[spawn.direction];
    snake.dir = dir;
    snake.body = [];
    for (let i = START_SEGMENTS - 1; i >= 0; i--) {
      snake.body.push({ X: spawn.head.X - dir.X * SNAKE_SPEED * i, Y: spawn.head.Y - dir.Y * SNAKE_SPEED * i });
    }
  }

  private record(snake: ServerSnake): SnakeRecord {
    return {
      SnakeId: snake.id,
      Name: snake.name,
      Body: snake.body.map((p) => ({ ...p })),
      Direction: { ...snake.dir },
      Score: snake.score,
      Died: snake.diedThisTick,
      Alive: snake.alive,
      Disconnected: snake.disconnected,
      Joined: snake.joined,
    };
  }

  private randomSpawn(): SpawnPoint {
    const direction = DIRECTIONS[Math.floor(this.random() * DIRECTIONS.length)] ?? "right";
    return { head: this.randomPoint(), direction };
  }

  private randomPoint(): Point {
    const span = this.worldSize / 2 - SPAWN_MARGIN;
    return {
      X: Math.round((this.random() * 2 - 1) * span),
      Y: Math.round((this.random() * 2 - 1) * span),
    };
  }
}
