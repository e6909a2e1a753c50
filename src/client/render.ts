// Text scoreboard drawn from a world snapshot
import type { WorldSnapshot } from "./state.js";

export const render = {
  scoreboard(world: WorldSnapshot, clientId: number | null, limit = 10): string {
    const ranked = world.snakes
      .filter((s) => !s.Disconnected)
      .sort((a, b) => b.Score - a.Score || a.SnakeId - b.SnakeId)
      .slice(0, limit);
    const lines = [
      `world ${world.width}x${world.height} | snakes ${world.snakes.length} | power-ups ${world.powerUps.length} | walls ${world.walls.length}`,
    ];
    ranked.forEach((s, i) => {
      const me = s.SnakeId === clientId ? "*" : " ";
      const status = s.Alive ? "" : " (dead)";
      lines.push(`${me}${String(i + 1).padStart(2)}. ${s.Name || "anon"} ${s.Score}${status}`);
    });
    return lines.join("\n");
  },
};
