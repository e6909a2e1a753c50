import { createServer, type Server } from "node:net";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { WorldState } from "../../src/client/state.js";
import { ClientSession } from "../../src/client/net.js";
import type { ServerConfig } from "../../src/shared/config.js";
import { LineConnection } from "../../src/shared/connection.js";
import { silentLogger } from "../../src/shared/logger.js";
import { closedPort } from "../../src/shared/__tests__/helpers/loopback.js";
import { startGameServer, type GameServerHandle } from "../server.js";

const config: ServerConfig = {
  port: 0,
  reportPort: 0,
  worldSize: 4000,
  tickRate: 100,
  maxPowerUps: 0,
  maxConnections: 0,
  storePath: "unused.json",
  logLevel: "silent",
};

describe("game server", () => {
  let server: GameServerHandle;

  beforeEach(async () => {
    server = await startGameServer(config, { logger: silentLogger(), random: () => 0.5 });
  });

  afterEach(async () => {
    await server.stop();
  });

  it("answers the handshake with the id, the world size and the walls", async () => {
    const client = new LineConnection();
    const result = await client.connect("127.0.0.1", server.port);
    expect(result.ok).toBe(true);

    await client.send("bob");
    const lines: string[] = [];
    for (let i = 0; i < 6; i++) lines.push(await client.readLine());

    expect(lines[0]).toBe("0");
    expect(lines[1]).toBe("4000");
    expect(lines[2]).toBe('{"wall":{"WallId":0,"P1":{"X":-2000,"Y":-2000},"P2":{"X":2000,"Y":-2000}}}');
    expect(lines.slice(2).map((l) => Object.keys(JSON.parse(l)))).toEqual([["wall"], ["wall"], ["wall"], ["wall"]]);
    expect(server.reportPort).toBeNull();
    client.disconnect();
  });

  it("streams the player's snake and follows its commands", async () => {
    const world = new WorldState();
    const session = new ClientSession();

    await session.start(world, "127.0.0.1", server.port, "Alice");

    expect(session.clientId).toBe(0);
    await vi.waitFor(() => {
      expect(world.snapshot().walls).toHaveLength(4);
      expect(world.snapshot().snakes.map((s) => s.Name)).toEqual(["Alice"]);
    });
    expect(world.snapshot().width).toBe(4000);

    await session.sendCommand("up");
    await vi.waitFor(() => {
      expect(world.snapshot().snakes[0]?.Direction).toEqual({ X: 0, Y: -1 });
    });

    session.disconnect();
    await session.done();
    await vi.waitFor(() => {
      expect(server.game.playerCount).toBe(0);
    });
  });

  it("ends client sessions when it stops", async () => {
    const session = new ClientSession();
    await session.start(new WorldState(), "127.0.0.1", server.port, "Alice");

    await server.stop();

    await session.done();
    expect(session.state).toBe("disconnected");
  });

  it("releases the game port when the report port cannot be bound", async () => {
    const blocker: Server = createServer();
    const reportPort = await new Promise<number>((resolve) => {
      blocker.listen(0, () => {
        const address = blocker.address();
        resolve(address && typeof address === "object" ? address.port : 0);
      });
    });
    const port = await closedPort();

    try {
      await expect(
        startGameServer({ ...config, port, reportPort }, { logger: silentLogger() }),
      ).rejects.toMatchObject({ code: "EADDRINUSE" });

      const again = await startGameServer({ ...config, port }, { logger: silentLogger() });
      expect(again.port).toBe(port);
      await again.stop();
    } finally {
      await new Promise<void>((resolve) => blocker.close(() => resolve()));
    }
  });
});
