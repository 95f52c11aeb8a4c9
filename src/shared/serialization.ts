import type { ChatMessage, GameState, Player, Position, WorldObject } from "./protocol.js";

/** Store-side view of the world that snapshots are taken from. */
export interface WorldData {
  readonly tick: number;
  readonly players: ReadonlyMap<string, Player>;
  readonly chatMessages: readonly ChatMessage[];
  readonly worldObjects: ReadonlyMap<string, WorldObject>;
}

// ---- Player ----

export function serializePlayer(p: Player): Player {
  return {
    id: p.id,
    name: p.name,
    position: copyPosition(p.position),
    isRunning: p.isRunning,
    runEnergy: p.runEnergy,
    inventory: p.inventory.map((item) => ({ ...item })),
    skills: { ...p.skills },
  };
}

// ---- World object ----

export function serializeWorldObject(o: WorldObject): WorldObject {
  return { id: o.id, type: o.type, position: copyPosition(o.position) };
}

// ---- Game state ----

/**
 * Copy the world into a plain, JSON-ready snapshot. The result shares no
 * object references with the store, so later mutations never leak into it.
 */
export function serializeGameState(data: WorldData): GameState {
  const players: Record<string, Player> = {};
  for (const [id, player] of data.players) {
    players[id] = serializePlayer(player);
  }
  const worldObjects: Record<string, WorldObject> = {};
  for (const [id, obj] of data.worldObjects) {
    worldObjects[id] = serializeWorldObject(obj);
  }
  return {
    tick: data.tick,
    players,
    // ChatMessage is immutable once created; a shallow copy of the list suffices.
    chatMessages: [...data.chatMessages],
    worldObjects,
  };
}

function copyPosition(p: Position): Position {
  return { x: p.x, y: p.y };
}
