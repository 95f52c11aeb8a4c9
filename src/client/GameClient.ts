import { decodeServerMessage, encodeClientMessage } from "../shared/jsonCodec.js";
import type {
  ClientMessage,
  GameState,
  Player,
  Position,
  ServerMessage,
  ServerMessageOf,
  ServerMessageType,
} from "../shared/protocol.js";
import type { IClientTransport } from "../transport/Transport.js";

type AnyListener = (msg: ServerMessage) => void;

function isMessageOfType<T extends ServerMessageType>(
  msg: ServerMessage,
  type: T,
): msg is ServerMessageOf<T> {
  return msg.type === type;
}

/**
 * Peer-side counterpart of the server. Holds a read-only mirror of the world
 * that is replaced wholesale by every INIT and STATE_UPDATE, and forwards
 * input upstream tagged with the id the server assigned.
 */
export class GameClient {
  private readonly transport: IClientTransport;
  private readonly listeners = new Map<ServerMessageType, Set<AnyListener>>();
  private readonly closeListeners = new Set<() => void>();
  private _playerId: string | null = null;
  private _state: GameState | null = null;
  private _lastError: string | null = null;
  private _connected = true;

  constructor(transport: IClientTransport) {
    this.transport = transport;
    transport.onMessage((frame) => {
      this.handleFrame(frame);
    });
    transport.onClose(() => {
      this._connected = false;
      for (const listener of this.closeListeners) listener();
    });
  }

  /** Id assigned by the server in INIT; null until then. */
  get playerId(): string | null {
    return this._playerId;
  }

  /** Latest authoritative snapshot; null until INIT. */
  get state(): GameState | null {
    return this._state;
  }

  /** This peer's own player in the latest snapshot. */
  get self(): Player | undefined {
    if (!this._state || !this._playerId) return undefined;
    return this._state.players[this._playerId];
  }

  get lastError(): string | null {
    return this._lastError;
  }

  get connected(): boolean {
    return this._connected;
  }

  /** Subscribe to one server message type. Returns an unsubscribe function. */
  on<T extends ServerMessageType>(
    type: T,
    listener: (msg: ServerMessageOf<T>) => void,
  ): () => void {
    const wrapped: AnyListener = (msg) => {
      if (isMessageOfType(msg, type)) listener(msg);
    };
    const set = this.listeners.get(type) ?? new Set<AnyListener>();
    this.listeners.set(type, set);
    set.add(wrapped);
    return () => {
      set.delete(wrapped);
    };
  }

  onClose(listener: () => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  // ---- Input ----

  move(position: Position): void {
    this.send({ type: "MOVE", playerId: this.requireId(), position });
  }

  chat(content: string): void {
    this.send({ type: "CHAT", playerId: this.requireId(), content });
  }

  interact(targetId: string): void {
    this.send({ type: "INTERACT", playerId: this.requireId(), targetId });
  }

  setRunning(running: boolean): void {
    this.send({ type: "SET_RUNNING", playerId: this.requireId(), running });
  }

  close(): void {
    this.transport.close();
  }

  // ---- Private ----

  private send(msg: ClientMessage): void {
    this.transport.send(encodeClientMessage(msg));
  }

  private requireId(): string {
    if (this._playerId === null) throw new Error("Not joined yet");
    return this._playerId;
  }

  private handleFrame(frame: string): void {
    let msg: ServerMessage;
    try {
      msg = decodeServerMessage(frame);
    } catch (err) {
      console.error("[gridsync] Bad server message:", err instanceof Error ? err.message : err);
      return;
    }
    this.apply(msg);
    const set = this.listeners.get(msg.type);
    if (!set) return;
    for (const listener of [...set]) listener(msg);
  }

  private apply(msg: ServerMessage): void {
    switch (msg.type) {
      case "INIT":
        this._playerId = msg.playerId;
        this._state = msg.gameState;
        break;
      case "STATE_UPDATE":
        this._state = msg.gameState;
        break;
      // Events reach listeners only; the mirror changes on snapshots alone.
      case "PLAYER_JOINED":
      case "PLAYER_LEFT":
      case "CHAT_MESSAGE":
        break;
      case "ERROR":
        this._lastError = msg.message;
        break;
    }
  }
}
