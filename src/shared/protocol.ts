// ---- World data ----

/** Grid cell coordinates. */
export interface Position {
  x: number;
  y: number;
}

/** Opaque inventory entry; the core never mutates inventories. */
export interface Item {
  id: string;
  name: string;
  stackable: boolean;
  quantity: number;
}

export interface Player {
  id: string;
  name: string;
  position: Position;
  isRunning: boolean;
  runEnergy: number;
  inventory: Item[];
  skills: Record<string, number>;
}

export interface ChatMessage {
  playerName: string;
  content: string;
  /** Epoch milliseconds. */
  timestamp: number;
}

/** Static scenery. No runtime mutation path exists. */
export interface WorldObject {
  id: string;
  type: string;
  position: Position;
}

/**
 * Full snapshot of the world as it travels on the wire.
 * Maps are keyed by id.
 */
export interface GameState {
  tick: number;
  players: Record<string, Player>;
  chatMessages: ChatMessage[];
  worldObjects: Record<string, WorldObject>;
}

// ---- Client → Server messages ----

export type ClientMessage =
  | { type: "MOVE"; playerId: string; position: Position }
  | { type: "CHAT"; playerId: string; content: string }
  | { type: "INTERACT"; playerId: string; targetId: string }
  | { type: "SET_RUNNING"; playerId: string; running: boolean };

export type ClientMessageType = ClientMessage["type"];

// ---- Server → Client messages ----

export type ServerMessage =
  | { type: "INIT"; playerId: string; gameState: GameState }
  | { type: "STATE_UPDATE"; gameState: GameState }
  | { type: "PLAYER_JOINED"; player: Player }
  | { type: "PLAYER_LEFT"; playerId: string }
  | { type: "CHAT_MESSAGE"; message: ChatMessage }
  | { type: "ERROR"; message: string };

export type ServerMessageType = ServerMessage["type"];

/** Narrow a server message union member by its type tag. */
export type ServerMessageOf<T extends ServerMessageType> = Extract<ServerMessage, { type: T }>;
