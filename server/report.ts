// Score report pages (express)
import express, { type Express } from "express";
import type { Logger } from "../src/shared/logger.js";
import type { ScoreStore } from "../src/shared/store.js";

const STYLE = `body{font-family:Arial,sans-serif;background:#f4f4f4;text-align:center}
h3{margin-top:50px;color:#333}
table{margin:20px auto;border-collapse:collapse;background:#fff}
td{padding:4px 10px}
a.button{display:inline-block;margin-top:20px;text-decoration:none;font-size:18px;color:#fff;background:#007bff;padding:10px 20px;border-radius:5px}`;

export function escapeHtml(value: unknown): string {
  return String(value ?? "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function page(title: string, body: string): string {
  return `<!doctype html><html><head><meta charset="utf-8"><title>${escapeHtml(title)}</title><style>${STYLE}</style></head><body>${body}</body></html>`;
}

function row(cells: unknown[]): string {
  return `<tr>${cells.map((c) => `<td>${escapeHtml(c)}</td>`).join("")}</tr>`;
}

export function createReportApp(store: ScoreStore, logger: Logger): Express {
  const app = express();

  app.use((req, _res, next) => {
    logger.debug({ method: req.method, url: req.originalUrl }, "report request");
    next();
  });

  app.get("/", (_req, res) => {
    res.type("html").send(
      page("Snake Games", `<h3>Welcome to the Snake Games Database!</h3><a class="button" href="/games">View Games</a>`),
    );
  });

  app.get("/games", async (req, res, next) => {
    try {
      const gid = req.query.gid;
      if (gid === undefined) {
        const games = await store.listGames();
        const rows = games
          .map(
            (g) =>
              `<tr><td><a href="/games?gid=${g.id}">${g.id}</a></td><td>${escapeHtml(g.startTime)}</td><td>${escapeHtml(g.endTime)}</td></tr>`,
          )
          .join("");
        res
          .type("html")
          .send(page("Games", `<table border="1"><thead>${row(["ID", "Start", "End"])}</thead><tbody>${rows}</tbody></table>`));
        return;
      }

      const gameId = typeof gid === "string" && /^\d+$/.test(gid) ? Number(gid) : -1;
      if (gameId < 0) {
        res.status(400).type("html").send(page("Invalid Game ID", "<h3>Invalid Game ID</h3>"));
        return;
      }
      const details = await store.getGame(gameId);
      if (!details) {
        res.status(404).type("html").send(page("Not Found", `<h3>Game ${gameId} not found</h3>`));
        return;
      }
      const rows = details.players
        .map((p) => row([p.playerId, p.name, p.maxScore, p.enterTime, p.leaveTime]))
        .join("");
      res
        .type("html")
        .send(
          page(
            `Game ${gameId}`,
            `<h3>Stats for Game ${gameId}</h3><table border="1"><thead>${row(["Player ID", "Name", "Max Score", "Enter Time", "Leave Time"])}</thead><tbody>${rows}</tbody></table>`,
          ),
        );
    } catch (err) {
      next(err);
    }
  });

  app.use((_req, res) => {
    res.status(404).type("html").send(page("Not Found", "<h3>404 Not Found</h3>"));
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ err }, "report request failed");
    res.status(500).type("html").send(page("Error", "<h3>Error loading report</h3>"));
  });

  return app;
}
