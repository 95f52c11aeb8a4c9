import { randomUUID } from "node:crypto";
import { DEFAULT_SKILLS, MAX_RUN_ENERGY } from "../config/constants.js";
import type { Player } from "../shared/protocol.js";
import { PlayerSession } from "./PlayerSession.js";
import type { WorldStore } from "./WorldStore.js";

/**
 * Default id source. The base-36 player number prefix is unique per process,
 * so ids never repeat without keeping a record of past ones.
 */
export function createPlayerId(playerNumber: number): string {
  return `${playerNumber.toString(36)}-${randomUUID()}`;
}

export function createDefaultPlayer(id: string, name: string): Player {
  return {
    id,
    name,
    position: { x: 0, y: 0 },
    isRunning: false,
    runEnergy: MAX_RUN_ENERGY,
    inventory: [],
    skills: { ...DEFAULT_SKILLS },
  };
}

/**
 * Maps each live connection to exactly one freshly minted player identity.
 * Connecting seeds the store with a default player; disconnecting removes it.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, PlayerSession>();
  /** Monotonic player number, incremented on each connect. */
  private nextPlayerNumber = 1;

  constructor(
    private readonly store: WorldStore,
    /** Must not repeat an id within the process; a live id is redrawn. */
    private readonly createId: (playerNumber: number) => string = createPlayerId,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  onConnect(connectionId: string): PlayerSession {
    if (this.sessions.has(connectionId)) {
      throw new Error(`connection ${connectionId} is already registered`);
    }
    const playerNumber = this.nextPlayerNumber++;
    const playerId = this.mintId(playerNumber);
    const session = new PlayerSession(connectionId, playerId, playerNumber);
    this.store.upsertPlayer(playerId, createDefaultPlayer(playerId, session.displayName));
    this.sessions.set(connectionId, session);
    return session;
  }

  /**
   * Tear down a connection's session. Returns the removed session, or null
   * when the connection was never registered or was already cleaned up.
   */
  onDisconnect(connectionId: string): PlayerSession | null {
    const session = this.sessions.get(connectionId);
    if (!session) return null;
    this.sessions.delete(connectionId);
    this.store.removePlayer(session.playerId);
    return session;
  }

  get(connectionId: string): PlayerSession | undefined {
    return this.sessions.get(connectionId);
  }

  getPlayerId(connectionId: string): string | undefined {
    return this.sessions.get(connectionId)?.playerId;
  }

  connectionIds(): IterableIterator<string> {
    return this.sessions.keys();
  }

  values(): IterableIterator<PlayerSession> {
    return this.sessions.values();
  }

  private mintId(playerNumber: number): string {
    let id = this.createId(playerNumber);
    while (this.store.hasPlayer(id)) {
      id = this.createId(playerNumber);
    }
    return id;
  }
}
