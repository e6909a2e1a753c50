// Terminal client: connect, stream the world, steer with the keyboard
import { pathToFileURL } from "node:url";
import { loadClientConfig } from "../shared/config.js";
import { ConnectError, errorMessage } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { JsonFileScoreStore, PlayerTracker } from "../shared/store.js";
import { registerKeyboard } from "./events.js";
import { ClientSession } from "./net.js";
import { render } from "./render.js";
import { WorldState } from "./state.js";

const SCOREBOARD_INTERVAL_MS = 1000;

async function main(): Promise<number> {
  const config = loadClientConfig(process.env, process.argv.slice(2));
  // Logs go to stderr so the scoreboard on stdout stays readable.
  const logger = createLogger({ name: "snake-client", level: config.logLevel, fd: 2 });
  const store = new JsonFileScoreStore(config.storePath);
  const gameId = await store.addGame(new Date());
  const world = new WorldState();
  const session = new ClientSession({
    logger,
    connectTimeoutMs: config.connectTimeoutMs,
    scores: new PlayerTracker(store, gameId),
  });

  try {
    await session.start(world, config.host, config.port, config.playerName);
  } catch (err) {
    await store.endGame(gameId, new Date());
    console.error(err instanceof ConnectError ? err.message : `failed to join: ${errorMessage(err)}`);
    return 1;
  }

  const stopKeyboard = registerKeyboard(process.stdin, {
    onDirection: (direction) => void session.sendCommand(direction),
    onQuit: () => session.disconnect(),
  });
  const timer = setInterval(() => {
    process.stdout.write("\x1b[2J\x1b[H" + render.scoreboard(world.snapshot(), session.clientId) + "\n");
  }, SCOREBOARD_INTERVAL_MS);

  await session.done();
  clearInterval(timer);
  stopKeyboard();
  await store.endGame(gameId, new Date());
  console.log("disconnected");
  return 0;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(errorMessage(err));
      process.exit(1);
    },
  );
}
