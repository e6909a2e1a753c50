// Shared game record types (wire records use the server's PascalCase field names)

export interface Point {
  X: number;
  Y: number;
}

export const DIRECTIONS = ["up", "down", "left", "right"] as const;
export type Direction = (typeof DIRECTIONS)[number];

export interface SnakeRecord {
  SnakeId: number;
  Name: string;
  Body: Point[]; // tail first, head last
  Direction: Point;
  Score: number;
  Died: boolean;
  Alive: boolean;
  Disconnected: boolean;
  Joined: boolean;
}

export interface WallRecord {
  WallId: number;
  P1: Point;
  P2: Point;
}

export interface PowerUpRecord {
  PowerId: number;
  Location: Point;
  // true means the power-up was eaten and must be dropped
  IsActive: boolean;
}

export interface GameRow {
  id: number;
  startTime: string;
  endTime: string | null;
}

export interface PlayerRow {
  playerId: number;
  gameId: number;
  name: string;
  maxScore: number;
  enterTime: string;
  leaveTime: string | null;
}
