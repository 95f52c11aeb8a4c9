import {
  CHAT_MAX_LENGTH,
  MAX_RUN_ENERGY,
  RUN_ENERGY_DRAIN,
  RUN_ENERGY_REGEN,
} from "../config/constants.js";
import type { WorldBounds } from "../config/serverEnv.js";
import type { ChatMessage, GameState, Player, Position, WorldObject } from "../shared/protocol.js";
import { serializeGameState, serializePlayer } from "../shared/serialization.js";
import { isValidPosition, sanitizeChatContent } from "./validation.js";

export interface WorldStoreOptions {
  bounds: WorldBounds;
  chatHistoryLimit: number;
  /** Static scenery present from the start. */
  worldObjects?: readonly WorldObject[];
  /** Clock for chat timestamps (epoch ms). */
  now?: () => number;
}

/**
 * Sole owner of mutable world data. Every read and write goes through these
 * methods, and each mutation is one synchronous step, so the event loop gives
 * a total order over mutations and snapshots.
 */
export class WorldStore {
  readonly bounds: WorldBounds;
  private readonly chatHistoryLimit: number;
  private readonly now: () => number;

  private _tick = 0;
  private readonly players = new Map<string, Player>();
  private readonly chatMessages: ChatMessage[] = [];
  private readonly worldObjects = new Map<string, WorldObject>();

  constructor(options: WorldStoreOptions) {
    this.bounds = { ...options.bounds };
    this.chatHistoryLimit = options.chatHistoryLimit;
    this.now = options.now ?? Date.now;
    for (const obj of options.worldObjects ?? []) {
      this.worldObjects.set(obj.id, { ...obj, position: { ...obj.position } });
    }
  }

  get tick(): number {
    return this._tick;
  }

  get playerCount(): number {
    return this.players.size;
  }

  /** Advance the authoritative clock by exactly one tick. */
  advanceTick(): number {
    this._tick++;
    return this._tick;
  }

  // ---- Players ----

  upsertPlayer(id: string, player: Player): void {
    this.players.set(id, { ...serializePlayer(player), id });
  }

  removePlayer(id: string): boolean {
    return this.players.delete(id);
  }

  hasPlayer(id: string): boolean {
    return this.players.has(id);
  }

  getPlayer(id: string): Readonly<Player> | undefined {
    return this.players.get(id);
  }

  /**
   * Commit a move if the target cell is legal. A rejected move leaves the
   * previous position untouched.
   */
  applyMove(id: string, newPosition: Position): boolean {
    const player = this.players.get(id);
    if (!player) return false;
    if (!isValidPosition(newPosition, this.bounds)) return false;
    player.position = { x: newPosition.x, y: newPosition.y };
    return true;
  }

  /** Toggle running. Refused when turning on with no energy left. */
  setRunning(id: string, running: boolean): boolean {
    const player = this.players.get(id);
    if (!player) return false;
    if (running && player.runEnergy <= 0) return false;
    player.isRunning = running;
    return true;
  }

  /** Per-tick energy bookkeeping: running drains, walking regenerates. */
  processRunEnergy(): void {
    for (const player of this.players.values()) {
      if (player.isRunning) {
        player.runEnergy = Math.max(0, player.runEnergy - RUN_ENERGY_DRAIN);
        if (player.runEnergy === 0) {
          player.isRunning = false;
        }
      } else if (player.runEnergy < MAX_RUN_ENERGY) {
        player.runEnergy = Math.min(MAX_RUN_ENERGY, player.runEnergy + RUN_ENERGY_REGEN);
      }
    }
  }

  // ---- Chat ----

  /**
   * Sanitize and append a chat message, evicting the oldest entry once the
   * history is full. Returns null (and stores nothing) when no text survives
   * sanitation.
   */
  appendChat(playerName: string, rawContent: string): ChatMessage | null {
    const content = sanitizeChatContent(rawContent, CHAT_MAX_LENGTH);
    if (content.length === 0) return null;

    const message: ChatMessage = Object.freeze({
      playerName,
      content,
      timestamp: this.now(),
    });
    while (this.chatMessages.length >= this.chatHistoryLimit) {
      this.chatMessages.shift();
    }
    this.chatMessages.push(message);
    return message;
  }

  get chatLength(): number {
    return this.chatMessages.length;
  }

  // ---- Snapshot ----

  /** Consistent copy of the whole world at this instant. */
  snapshot(): GameState {
    return serializeGameState({
      tick: this._tick,
      players: this.players,
      chatMessages: this.chatMessages,
      worldObjects: this.worldObjects,
    });
  }
}
