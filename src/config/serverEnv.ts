import {
  CHAT_HISTORY_LIMIT,
  DEFAULT_HOST,
  DEFAULT_PORT,
  MAX_BUFFERED_BYTES,
  MAX_PAYLOAD_BYTES,
  MAX_PLAYERS,
  TICK_MS,
  WORLD_HEIGHT,
  WORLD_WIDTH,
} from "./constants.js";

export interface WorldBounds {
  width: number;
  height: number;
}

/** Settings the game core consumes. */
export interface GameConfig {
  tickMs: number;
  bounds: WorldBounds;
  chatHistoryLimit: number;
  maxPlayers: number;
}

/** Full process configuration: game core plus listener and logging. */
export interface ServerConfig extends GameConfig {
  host: string;
  port: number;
  /** Restrict WebSocket upgrades to this path. Undefined accepts any path. */
  wsPath: string | undefined;
  maxPayloadBytes: number;
  maxBufferedBytes: number;
  dataDir: string;
}

export const DEFAULT_GAME_CONFIG: GameConfig = {
  tickMs: TICK_MS,
  bounds: { width: WORLD_WIDTH, height: WORLD_HEIGHT },
  chatHistoryLimit: CHAT_HISTORY_LIMIT,
  maxPlayers: MAX_PLAYERS,
};

/** Parse a positive integer, falling back on anything malformed or non-positive. */
const toPositiveInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const toNonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    host: toNonEmpty(env.HOST) ?? DEFAULT_HOST,
    port: toPositiveInt(env.PORT, DEFAULT_PORT),
    wsPath: toNonEmpty(env.WS_PATH),
    tickMs: toPositiveInt(env.TICK_MS, TICK_MS),
    bounds: {
      width: toPositiveInt(env.WORLD_WIDTH, WORLD_WIDTH),
      height: toPositiveInt(env.WORLD_HEIGHT, WORLD_HEIGHT),
    },
    chatHistoryLimit: toPositiveInt(env.CHAT_HISTORY_LIMIT, CHAT_HISTORY_LIMIT),
    maxPlayers: toPositiveInt(env.MAX_PLAYERS, MAX_PLAYERS),
    maxPayloadBytes: toPositiveInt(env.MAX_PAYLOAD_BYTES, MAX_PAYLOAD_BYTES),
    maxBufferedBytes: toPositiveInt(env.MAX_BUFFERED_BYTES, MAX_BUFFERED_BYTES),
    dataDir: toNonEmpty(env.DATA_DIR) ?? "./data",
  };
}
