// Game server: handshake, command intake and per-tick broadcast, plus the score report
import { createServer as createHttpServer, type Server as HttpServer } from "node:http";
import { pathToFileURL } from "node:url";
import type { LineConnection } from "../src/shared/connection.js";
import { loadServerConfig, type ServerConfig } from "../src/shared/config.js";
import { errorMessage } from "../src/shared/errors.js";
import { createLogger, type Logger } from "../src/shared/logger.js";
import { decodeCommand, encodePowerUp, encodeSnake, encodeWall } from "../src/shared/protocol.js";
import { JsonFileScoreStore, type ScoreStore } from "../src/shared/store.js";
import { SnakeGame, type TickResult } from "./game.js";
import { ConnectionListener } from "./listener.js";
import { createReportApp } from "./report.js";

export interface GameServerOptions {
  logger: Logger;
  random?: () => number;
  store?: ScoreStore;
}

export interface GameServerHandle {
  port: number;
  reportPort: number | null;
  game: SnakeGame;
  stop(): Promise<void>;
}

export async function startGameServer(config: ServerConfig, options: GameServerOptions): Promise<GameServerHandle> {
  const { logger } = options;
  const game = new SnakeGame({ worldSize: config.worldSize, maxPowerUps: config.maxPowerUps, random: options.random });
  const clients = new Map<number, LineConnection>();
  const listener = new ConnectionListener({ logger, maxConnections: config.maxConnections });
  const abort = new AbortController();

  async function handleClient(connection: LineConnection): Promise<void> {
    const name = await connection.readLine();
    if (!connection.isConnected()) return;
    const id = game.join(name);
    const log = logger.child({ conn: connection.id, clientId: id });
    log.info({ event: "player_joined", name }, `${name} joined as ${id}`);
    try {
      await connection.send(String(id));
      await connection.send(String(game.worldSize));
      await Promise.all(game.walls().map((wall) => connection.send(encodeWall(wall))));
      clients.set(id, connection);

      while (connection.isConnected()) {
        const line = await connection.readLine();
        if (line === "") continue;
        const direction = decodeCommand(line);
        if (direction) game.steer(id, direction);
        else log.debug({ line }, "ignoring unknown command");
      }
    } finally {
      clients.delete(id);
      game.leave(id);
      log.info({ event: "player_left" }, `${name} left`);
    }
  }

  async function deliver(id: number, connection: LineConnection, lines: string[]): Promise<void> {
    try {
      await Promise.all(lines.map((line) => connection.send(line)));
    } catch (err) {
      logger.debug({ clientId: id, error: errorMessage(err) }, "broadcast to client failed");
    }
  }

  function broadcast({ snakes, powerUps }: TickResult): void {
    if (clients.size === 0) return;
    const lines = [...snakes.map(encodeSnake), ...powerUps.map(encodePowerUp)];
    for (const [id, connection] of clients) void deliver(id, connection, lines);
  }

  let port = config.port;
  let markBound: () => void = () => undefined;
  const bound = new Promise<void>((resolve) => {
    markBound = resolve;
  });
  const closed = listener.listen(config.port, handleClient, {
    signal: abort.signal,
    onListening: (boundPort) => {
      port = boundPort;
      markBound();
    },
  });
  // `closed` rejects with a ListenError when the port cannot be bound.
  await Promise.race([bound, closed]);

  const timer = setInterval(() => broadcast(game.tick()), 1000 / config.tickRate);

  let http: HttpServer | null = null;
  let reportPort: number | null = null;
  if (config.reportPort > 0) {
    const store = options.store ?? new JsonFileScoreStore(config.storePath);
    http = createHttpServer(createReportApp(store, logger.child({ component: "report" })));
    try {
      reportPort = await listenHttp(http, config.reportPort);
    } catch (err) {
      logger.error({ err, port: config.reportPort }, "failed to start report server");
      clearInterval(timer);
      abort.abort();
      await closed;
      throw err;
    }
    logger.info({ event: "report_listening", port: reportPort }, `report on :${reportPort}`);
  }

  return {
    port,
    reportPort,
    game,
    async stop() {
      clearInterval(timer);
      abort.abort();
      await closed;
      const server = http;
      if (server) {
        await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      }
    },
  };
}

function listenHttp(server: HttpServer, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      const address = server.address();
      resolve(address && typeof address === "object" ? address.port : port);
    });
  });
}

async function main(): Promise<void> {
  const config = loadServerConfig();
  const logger = createLogger({ name: "snake-server", level: config.logLevel });
  const server = await startGameServer(config, { logger });
  logger.info({ event: "started", port: server.port }, `game server listening on :${server.port}`);

  const shutdown = (signal: string): void => {
    logger.info({ event: "shutdown", signal }, `received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exit(1);
  });
}
