// Runtime configuration, read once from the environment and passed down
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";

const port = z.coerce.number().int().min(0).max(65535);

const logLevel = z.enum(LOG_LEVELS).default("info");

const serverSchema = z.object({
  SNAKE_PORT: port.default(11000),
  REPORT_PORT: port.default(8080),
  WORLD_SIZE: z.coerce.number().int().min(100).max(20000).default(2000),
  TICK_RATE: z.coerce.number().int().min(1).max(120).default(20),
  MAX_POWERUPS: z.coerce.number().int().min(0).max(500).default(20),
  MAX_CONNECTIONS: z.coerce.number().int().min(0).default(0),
  STORE_PATH: z.string().min(1).default("snake-scores.json"),
  LOG_LEVEL: logLevel,
});

const clientSchema = z.object({
  SNAKE_HOST: z.string().min(1).default("localhost"),
  SNAKE_PORT: port.default(11000),
  PLAYER_NAME: z.string().min(1).max(16).default("player"),
  CONNECT_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  STORE_PATH: z.string().min(1).default("snake-scores.json"),
  LOG_LEVEL: logLevel,
});

export interface ServerConfig {
  port: number;
  reportPort: number;
  worldSize: number;
  tickRate: number;
  maxPowerUps: number;
  maxConnections: number;
  storePath: string;
  logLevel: z.infer<typeof logLevel>;
}

export interface ClientConfig {
  host: string;
  port: number;
  playerName: string;
  connectTimeoutMs: number;
  storePath: string;
  logLevel: z.infer<typeof logLevel>;
}

type Env = Record<string, string | undefined>;

function parse<T extends z.ZodTypeAny>(schema: T, env: Env): z.infer<T> {
  // Empty strings count as unset so `FOO= cmd` falls back to the default.
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }
  const result = schema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return result.data;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const raw = parse(serverSchema, env);
  return {
    port: raw.SNAKE_PORT,
    reportPort: raw.REPORT_PORT,
    worldSize: raw.WORLD_SIZE,
    tickRate: raw.TICK_RATE,
    maxPowerUps: raw.MAX_POWERUPS,
    maxConnections: raw.MAX_CONNECTIONS,
    storePath: raw.STORE_PATH,
    logLevel: raw.LOG_LEVEL,
  };
}

export function loadClientConfig(env: Env = process.env, argv: string[] = []): ClientConfig {
  const overrides = parseClientArgs(argv);
  const raw = parse(clientSchema, { ...env, ...overrides });
  return {
    host: raw.SNAKE_HOST,
    port: raw.SNAKE_PORT,
    playerName: raw.PLAYER_NAME,
    connectTimeoutMs: raw.CONNECT_TIMEOUT_MS,
    storePath: raw.STORE_PATH,
    logLevel: raw.LOG_LEVEL,
  };
}

const CLIENT_FLAGS: Record<string, string> = {
  "--host": "SNAKE_HOST",
  "-h": "SNAKE_HOST",
  "--port": "SNAKE_PORT",
  "-p": "SNAKE_PORT",
  "--name": "PLAYER_NAME",
  "-n": "PLAYER_NAME",
};

function parseClientArgs(argv: string[]): Env {
  const out: Env = {};
  for (let i = 0; i < argv.length; i++) {
    const key = CLIENT_FLAGS[argv[i]];
    if (!key) throw new ConfigError([`unknown argument ${argv[i]}`]);
    const value = argv[i + 1];
    if (value === undefined) throw new ConfigError([`${argv[i]} needs a value`]);
    out[key] = value;
    i++;
  }
  return out;
}
