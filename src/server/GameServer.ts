import { DEFAULT_GAME_CONFIG, type GameConfig } from "../config/serverEnv.js";
import type { WorldObject } from "../shared/protocol.js";
import { serializePlayer } from "../shared/serialization.js";
import type { IServerTransport } from "../transport/Transport.js";
import { Broadcaster } from "./Broadcaster.js";
import { MessageDispatcher } from "./MessageDispatcher.js";
import type { PlayerSession } from "./PlayerSession.js";
import { ServerLoop } from "./ServerLoop.js";
import { SessionRegistry } from "./SessionRegistry.js";
import { serverLog } from "./serverLog.js";
import { WorldStore } from "./WorldStore.js";

export interface GameServerDeps {
  /** Player id generator, given the player number (defaults to number-prefixed UUIDs). */
  createId?: (playerNumber: number) => string;
  /** Clock for chat timestamps. */
  now?: () => number;
  /** Static scenery present from the start. */
  worldObjects?: readonly WorldObject[];
}

/**
 * Authoritative server instance: owns the world store, the session registry,
 * the inbound dispatcher and the tick loop. Everything runs on the caller's
 * event loop, so every mutation and broadcast is totally ordered.
 */
export class GameServer {
  readonly store: WorldStore;
  readonly registry: SessionRegistry;
  private readonly transport: IServerTransport;
  private readonly config: GameConfig;
  private readonly out: Broadcaster;
  private readonly dispatcher: MessageDispatcher;
  private loop: ServerLoop | null = null;
  private started = false;

  constructor(
    transport: IServerTransport,
    config: GameConfig = DEFAULT_GAME_CONFIG,
    deps?: GameServerDeps,
  ) {
    this.transport = transport;
    this.config = { ...config, bounds: { ...config.bounds } };
    this.store = new WorldStore({
      bounds: config.bounds,
      chatHistoryLimit: config.chatHistoryLimit,
      ...(deps?.worldObjects ? { worldObjects: deps.worldObjects } : {}),
      ...(deps?.now ? { now: deps.now } : {}),
    });
    this.registry = new SessionRegistry(this.store, deps?.createId);
    this.out = new Broadcaster(transport, this.registry);
    this.dispatcher = new MessageDispatcher(this.store, this.registry, this.out);
  }

  /** Register transport handlers. */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.transport.onConnect((connectionId) => {
      this.handleConnect(connectionId);
    });

    this.transport.onMessage((connectionId, frame) => {
      this.dispatcher.dispatch(connectionId, frame);
    });

    this.transport.onDisconnect((connectionId) => {
      this.handleDisconnect(connectionId);
    });
  }

  /** Start the tick loop. */
  startLoop(): void {
    if (this.loop) return;
    this.loop = new ServerLoop(() => {
      this.tick();
    }, this.config.tickMs);
    this.loop.start();
  }

  stopLoop(): void {
    this.loop?.stop();
    this.loop = null;
  }

  get tickMs(): number {
    return this.loop?.tickMs ?? this.config.tickMs;
  }

  /** Change the tick interval; takes effect immediately if the loop is running. */
  setTickMs(ms: number): void {
    if (ms <= 0) return;
    const prevMs = this.tickMs;
    this.config.tickMs = ms;
    this.loop?.setTickMs(ms);
    serverLog(`tick changed: ${prevMs}ms -> ${ms}ms`);
  }

  /**
   * One authoritative tick: advance the clock, run per-tick processing, then
   * send the full snapshot to every session. The only source of STATE_UPDATE.
   *
   * Snapshots are sent droppable: a connection whose socket backlog exceeds
   * `maxBufferedBytes` skips this one, so its observed ticks can jump by more
   * than 1. Each snapshot is complete, so the next one that gets through
   * carries everything the skipped ones did. Events (INIT, PLAYER_JOINED,
   * PLAYER_LEFT, CHAT_MESSAGE, ERROR) are never dropped.
   */
  tick(): void {
    this.store.advanceTick();
    this.store.processRunEnergy();
    this.out.broadcast(
      { type: "STATE_UPDATE", gameState: this.store.snapshot() },
      { droppable: true },
    );
  }

  getSession(connectionId: string): PlayerSession | undefined {
    return this.registry.get(connectionId);
  }

  get sessionCount(): number {
    return this.registry.size;
  }

  destroy(): void {
    this.stopLoop();
    this.transport.close();
  }

  // ---- Private ----

  private handleConnect(connectionId: string): void {
    if (this.registry.size >= this.config.maxPlayers) {
      serverLog(`refusing ${connectionId}: server full (${this.config.maxPlayers} players)`);
      this.transport.disconnect(connectionId, "Server full");
      return;
    }

    const session = this.registry.onConnect(connectionId);
    const player = this.store.getPlayer(session.playerId);
    serverLog(
      `client connected: ${connectionId} as ${session.displayName} (${this.registry.size} online)`,
    );

    this.out.send(connectionId, {
      type: "INIT",
      playerId: session.playerId,
      gameState: this.store.snapshot(),
    });
    if (player) {
      this.out.broadcast(
        { type: "PLAYER_JOINED", player: serializePlayer(player) },
        { exclude: connectionId },
      );
    }
  }

  private handleDisconnect(connectionId: string): void {
    const session = this.registry.onDisconnect(connectionId);
    if (!session) return;
    const seconds = Math.round((Date.now() - session.connectedAt) / 1000);
    serverLog(
      `client disconnected: ${connectionId} (${session.displayName}) after ${seconds}s, ` +
        `${this.registry.size} online`,
    );
    this.out.broadcast({ type: "PLAYER_LEFT", playerId: session.playerId });
  }
}
