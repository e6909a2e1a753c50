import { createServer, type Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { silentLogger } from "../../src/shared/logger.js";
import { MemoryScoreStore } from "../../src/shared/store.js";
import { createReportApp, escapeHtml } from "../report.js";

describe("report pages", () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    const store = new MemoryScoreStore();
    const gameId = await store.addGame(new Date("2024-03-01T10:00:00.000Z"));
    await store.addPlayer({
      playerId: 7,
      gameId,
      name: "<Alice>",
      maxScore: 12,
      enterTime: new Date("2024-03-01T10:00:01.000Z"),
    });
    server = createServer(createReportApp(store, silentLogger()));
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    base = `http://127.0.0.1:${address && typeof address === "object" ? address.port : 0}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it("welcomes visitors on the index page", async () => {
    const res = await fetch(`${base}/`);

    expect(res.status).toBe(200);
    expect(await res.text()).toContain("<h3>Welcome to the Snake Games Database!</h3>");
  });

  it("lists games with links to their stats", async () => {
    const body = await (await fetch(`${base}/games`)).text();

    expect(body).toContain('<tr><td><a href="/games?gid=1">1</a></td><td>2024-03-01T10:00:00.000Z</td><td></td></tr>');
  });

  it("shows one game's players with escaped names", async () => {
    const res = await fetch(`${base}/games?gid=1`);
    const body = await res.text();

    expect(res.status).toBe(200);
    expect(body).toContain("<h3>Stats for Game 1</h3>");
    expect(body).toContain(
      "<tr><td>7</td><td>&lt;Alice&gt;</td><td>12</td><td>2024-03-01T10:00:01.000Z</td><td></td></tr>",
    );
  });

  it("rejects a game id that is not a number", async () => {
    const res = await fetch(`${base}/games?gid=abc`);

    expect(res.status).toBe(400);
    expect(await res.text()).toContain("<h3>Invalid Game ID</h3>");
  });

  it("answers 404 for unknown games and paths", async () => {
    const missing = await fetch(`${base}/games?gid=99`);
    expect(missing.status).toBe(404);
    expect(await missing.text()).toContain("<h3>Game 99 not found</h3>");

    const other = await fetch(`${base}/nowhere`);
    expect(other.status).toBe(404);
    expect(await other.text()).toContain("<h3>404 Not Found</h3>");
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters and renders nullish values as empty", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
    expect(escapeHtml(null)).toBe("");
  });
});
