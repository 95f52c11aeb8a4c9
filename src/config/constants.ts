/** Authoritative tick interval in milliseconds. */
export const TICK_MS = 600;

/** World width in grid cells (valid x is [0, WORLD_WIDTH)). */
export const WORLD_WIDTH = 100;

/** World height in grid cells (valid y is [0, WORLD_HEIGHT)). */
export const WORLD_HEIGHT = 100;

/** Chat messages retained in the game state; oldest evicted first. */
export const CHAT_HISTORY_LIMIT = 100;

/** Maximum chat message length, counted in characters before filtering. */
export const CHAT_MAX_LENGTH = 100;

/** Connections beyond this count are refused. */
export const MAX_PLAYERS = 2000;

// ── Run energy ──

export const MAX_RUN_ENERGY = 100;

/** Energy lost per tick while running. */
export const RUN_ENERGY_DRAIN = 0.67;

/** Energy regained per tick while walking. */
export const RUN_ENERGY_REGEN = 0.45;

// ── Transport ──

export const DEFAULT_PORT = 3001;

export const DEFAULT_HOST = "0.0.0.0";

/** Inbound frames larger than this are refused by the socket layer. */
export const MAX_PAYLOAD_BYTES = 16 * 1024;

/** Outbound backlog above which snapshot frames are skipped for that peer. */
export const MAX_BUFFERED_BYTES = 1024 * 1024;

// ── Client ──

/** Peer-side render cadence, independent of the server tick. */
export const RENDER_INTERVAL_MS = 100;

/** Skill levels for a freshly joined player. */
export const DEFAULT_SKILLS: Readonly<Record<string, number>> = {
  attack: 0,
  strength: 0,
  defence: 0,
  hitpoints: 10,
  prayer: 0,
  magic: 0,
  ranged: 0,
  mining: 0,
  woodcutting: 0,
  fishing: 0,
};
