// Game and player score persistence
import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { GameRow, PlayerRow } from "./types.js";

/** What a client session reports about the players it sees. */
export interface ScoreSink {
  snakeUpdated(playerId: number, name: string, score: number): Promise<void>;
  sessionEnded(leftAt: Date): Promise<void>;
}

export interface NewPlayer {
  playerId: number;
  gameId: number;
  name: string;
  maxScore: number;
  enterTime: Date;
}

export interface GameDetails {
  game: GameRow;
  players: PlayerRow[];
}

export interface ScoreStore {
  addGame(startTime: Date): Promise<number>;
  endGame(gameId: number, endTime: Date): Promise<void>;
  addPlayer(player: NewPlayer): Promise<void>;
  updatePlayerScore(playerId: number, gameId: number, maxScore: number): Promise<void>;
  updatePlayerLeaveTime(playerId: number, gameId: number, leaveTime: Date): Promise<void>;
  listGames(): Promise<GameRow[]>;
  getGame(gameId: number): Promise<GameDetails | null>;
}

const storeFileSchema = z.object({
  nextGameId: z.number().int().min(1),
  games: z.array(
    z.object({
      id: z.number().int(),
      startTime: z.string(),
      endTime: z.string().nullable(),
    }),
  ),
  players: z.array(
    z.object({
      playerId: z.number().int(),
      gameId: z.number().int(),
      name: z.string(),
      maxScore: z.number().int(),
      enterTime: z.string(),
      leaveTime: z.string().nullable(),
    }),
  ),
});

export type StoreData = z.infer<typeof storeFileSchema>;

function emptyData(): StoreData {
  return { nextGameId: 1, games: [], players: [] };
}

export class MemoryScoreStore implements ScoreStore {
  constructor(protected readonly data: StoreData = emptyData()) {}

  toData(): StoreData {
    return structuredClone(this.data);
  }

  async addGame(startTime: Date): Promise<number> {
    const id = this.data.nextGameId++;
    this.data.games.push({ id, startTime: startTime.toISOString(), endTime: null });
    return id;
  }

  async endGame(gameId: number, endTime: Date): Promise<void> {
    const game = this.data.games.find((g) => g.id === gameId);
    if (game) game.endTime = endTime.toISOString();
  }

  async addPlayer(player: NewPlayer): Promise<void> {
    const row: PlayerRow = {
      playerId: player.playerId,
      gameId: player.gameId,
      name: player.name,
      maxScore: player.maxScore,
      enterTime: player.enterTime.toISOString(),
      leaveTime: null,
    };
    const existing = this.findPlayer(player.playerId, player.gameId);
    if (existing) Object.assign(existing, row);
    else this.data.players.push(row);
  }

  async updatePlayerScore(playerId: number, gameId: number, maxScore: number): Promise<void> {
    const player = this.findPlayer(playerId, gameId);
    if (player) player.maxScore = maxScore;
  }

  async updatePlayerLeaveTime(playerId: number, gameId: number, leaveTime: Date): Promise<void> {
    const player = this.findPlayer(playerId, gameId);
    if (player) player.leaveTime = leaveTime.toISOString();
  }

  async listGames(): Promise<GameRow[]> {
    return this.data.games.map((g) => ({ ...g }));
  }

  async getGame(gameId: number): Promise<GameDetails | null> {
    const game = this.data.games.find((g) => g.id === gameId);
    if (!game) return null;
    return {
      game: { ...game },
      players: this.data.players.filter((p) => p.gameId === gameId).map((p) => ({ ...p })),
    };
  }

  private findPlayer(playerId: number, gameId: number): PlayerRow | undefined {
    return this.data.players.find((p) => p.playerId === playerId && p.gameId === gameId);
  }
}

/**
 * A JSON file shared between the client that records scores and the report
 * server that reads them. Every call re-reads the file; writes from this
 * process run one at a time.
 */
export class JsonFileScoreStore implements ScoreStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly file: string) {}

  addGame(startTime: Date): Promise<number> {
    return this.mutate((store) => store.addGame(startTime));
  }

  endGame(gameId: number, endTime: Date): Promise<void> {
    return this.mutate((store) => store.endGame(gameId, endTime));
  }

  addPlayer(player: NewPlayer): Promise<void> {
    return this.mutate((store) => store.addPlayer(player));
  }

  updatePlayerScore(playerId: number, gameId: number, maxScore: number): Promise<void> {
    return this.mutate((store) => store.updatePlayerScore(playerId, gameId, maxScore));
  }

  updatePlayerLeaveTime(playerId: number, gameId: number, leaveTime: Date): Promise<void> {
    return this.mutate((store) => store.updatePlayerLeaveTime(playerId, gameId, leaveTime));
  }

  async listGames(): Promise<GameRow[]> {
    return new MemoryScoreStore(await this.load()).listGames();
  }

  async getGame(gameId: number): Promise<GameDetails | null> {
    return new MemoryScoreStore(await this.load()).getGame(gameId);
  }

  private mutate<T>(fn: (store: MemoryScoreStore) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const store = new MemoryScoreStore(await this.load());
      const result = await fn(store);
      await this.save(store.toData());
      return result;
    });
    // Later writes wait for this one whether or not it fails; the caller sees the failure.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(): Promise<StoreData> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return emptyData();
      throw err;
    }
    return storeFileSchema.parse(JSON.parse(raw));
  }

  private async save(data: StoreData): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(this.file)), { recursive: true });
    const tmp = `${this.file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(data, null, 2), "utf8");
    await fs.rename(tmp, this.file);
  }
}

/**
 * Turns the stream of snake updates one client sees into player rows for a
 * single game: the first sighting adds the player, a higher score raises
 * their max, and the end of the session stamps everyone's leave time.
 */
export class PlayerTracker implements ScoreSink {
  private readonly best = new Map<number, number>();

  constructor(
    private readonly store: ScoreStore,
    private readonly gameId: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async snakeUpdated(playerId: number, name: string, score: number): Promise<void> {
    const best = this.best.get(playerId);
    if (best === undefined) {
      this.best.set(playerId, score);
      await this.store.addPlayer({ playerId, gameId: this.gameId, name, maxScore: score, enterTime: this.now() });
    } else if (score > best) {
      this.best.set(playerId, score);
      await this.store.updatePlayerScore(playerId, this.gameId, score);
    }
  }

  async sessionEnded(leftAt: Date): Promise<void> {
    await Promise.all(
      Array.from(this.best.keys(), (playerId) => this.store.updatePlayerLeaveTime(playerId, this.gameId, leftAt)),
    );
  }
}
