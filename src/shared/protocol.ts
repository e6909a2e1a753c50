// Wire protocol: line classification and encoders for both directions
import { z } from "zod";
import { MessageParseError } from "./errors.js";
import {
  DIRECTIONS,
  type Direction,
  type PowerUpRecord,
  type SnakeRecord,
  type WallRecord,
} from "./types.js";

const point = z.object({
  X: z.number(),
  Y: z.number(),
});

const id = z.number().int();

export const snakeSchema = z.object({
  SnakeId: id,
  Name: z.string().default(""),
  Body: z.array(point).default([]),
  Direction: point.default({ X: 0, Y: 0 }),
  Score: z.number().int(),
  Died: z.boolean().default(false),
  Alive: z.boolean().default(true),
  Disconnected: z.boolean().default(false),
  Joined: z.boolean().default(false),
});

export const wallSchema = z.object({
  WallId: id,
  P1: point,
  P2: point,
});

export const powerUpSchema = z.object({
  PowerId: id,
  Location: point.default({ X: 0, Y: 0 }),
  IsActive: z.boolean().default(false),
});

const commandSchema = z.object({ moving: z.enum(DIRECTIONS) });

export type ServerMessage =
  | { kind: "worldSize"; size: number }
  | { kind: "snake"; snake: SnakeRecord }
  | { kind: "wall"; wall: WallRecord }
  | { kind: "power"; power: PowerUpRecord }
  | { kind: "ignored" };

const INTEGER = /^\s*[+-]?\d+\s*$/;

export function parseInteger(line: string): number | null {
  if (!INTEGER.test(line)) return null;
  const n = Number(line);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Classify one server line. Bare integers are world-size announcements;
 * objects are routed by their discriminating key. Lines that match no kind
 * come back as `ignored`. Throws MessageParseError when a line looks like a
 * record but cannot be decoded as one.
 */
export function decodeServerLine(line: string): ServerMessage {
  const size = parseInteger(line);
  if (size !== null) return { kind: "worldSize", size };

  const trimmed = line.trimStart();
  if (!trimmed.startsWith("{")) return { kind: "ignored" };

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch (err) {
    throw new MessageParseError(line, "invalid JSON", err);
  }
  if (!isRecord(value)) return { kind: "ignored" };

  // An object carrying more than one tag is routed by the first of snake, wall, power.
  if ("snake" in value) return { kind: "snake", snake: decodeRecord(line, "snake", snakeSchema, value.snake) };
  if ("wall" in value) return { kind: "wall", wall: decodeRecord(line, "wall", wallSchema, value.wall) };
  if ("power" in value) return { kind: "power", power: decodeRecord(line, "power", powerUpSchema, value.power) };
  return { kind: "ignored" };
}

function decodeRecord<T extends z.ZodTypeAny>(line: string, tag: string, schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new MessageParseError(line, `bad ${tag} record${where}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function encodeSnake(snake: SnakeRecord): string {
  return JSON.stringify({ snake });
}

export function encodeWall(wall: WallRecord): string {
  return JSON.stringify({ wall });
}

export function encodePowerUp(power: PowerUpRecord): string {
  return JSON.stringify({ power });
}

export function encodeCommand(direction: Direction): string {
  return JSON.stringify({ moving: direction });
}

/** Decode a client command line; null when it is not a valid command. */
export function decodeCommand(line: string): Direction | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const result = commandSchema.safeParse(value);
  return result.success ? result.data.moving : null;
}
