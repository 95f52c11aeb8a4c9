import { DecodeError, IdentityError } from "../shared/errors.js";
import { decodeClientMessage } from "../shared/jsonCodec.js";
import type { ClientMessage, Position } from "../shared/protocol.js";
import type { Outbox } from "./Broadcaster.js";
import type { PlayerSession } from "./PlayerSession.js";
import type { SessionRegistry } from "./SessionRegistry.js";
import { serverLog } from "./serverLog.js";
import { moveViolation } from "./validation.js";
import type { WorldStore } from "./WorldStore.js";

/**
 * Protocol boundary for inbound frames: decode, authenticate the claimed
 * identity against the connection's session, then apply to the store.
 *
 * Decode and identity failures are answered with an ERROR to the sender only;
 * the connection stays open and nothing is mutated.
 */
export class MessageDispatcher {
  constructor(
    private readonly store: WorldStore,
    private readonly registry: SessionRegistry,
    private readonly out: Outbox,
  ) {}

  dispatch(connectionId: string, frame: string): void {
    let msg: ClientMessage;
    try {
      msg = decodeClientMessage(frame);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      serverLog(`bad message from ${connectionId}: ${err.message}`);
      this.out.send(connectionId, { type: "ERROR", message: "Invalid message format" });
      return;
    }

    let session: PlayerSession;
    try {
      session = this.authenticate(connectionId, msg);
    } catch (err) {
      if (!(err instanceof IdentityError)) throw err;
      serverLog(`rejected ${msg.type} from ${connectionId}: ${err.message}`);
      this.out.send(connectionId, { type: "ERROR", message: err.message });
      return;
    }

    switch (msg.type) {
      case "MOVE":
        this.handleMove(session, msg.position);
        return;
      case "CHAT":
        this.handleChat(session, msg.content);
        return;
      case "INTERACT":
        this.handleInteract(session, msg.targetId);
        return;
      case "SET_RUNNING":
        this.handleSetRunning(session, msg.running);
        return;
    }
  }

  /** Resolve the session behind a connection and check the claimed id. */
  authenticate(connectionId: string, msg: ClientMessage): PlayerSession {
    const session = this.registry.get(connectionId);
    if (!session || msg.playerId !== session.playerId) {
      throw new IdentityError("Invalid player ID");
    }
    if (!this.store.hasPlayer(session.playerId)) {
      throw new IdentityError("Player not found");
    }
    return session;
  }

  // ---- Handlers ----

  /** Becomes visible on the next tick broadcast; no per-move message is sent. */
  private handleMove(session: PlayerSession, position: Position): void {
    const violation = moveViolation(position, this.store.bounds);
    if (violation) {
      // Rejected moves are not reported to the client.
      serverLog(`move rejected for ${session.displayName}: ${violation.message}`);
      return;
    }
    this.store.applyMove(session.playerId, position);
  }

  private handleChat(session: PlayerSession, content: string): void {
    const name = this.store.getPlayer(session.playerId)?.name ?? session.displayName;
    const message = this.store.appendChat(name, content);
    if (!message) return;
    this.out.broadcast({ type: "CHAT_MESSAGE", message });
  }

  /** Reserved: identity is validated, nothing is mutated yet. */
  private handleInteract(_session: PlayerSession, _targetId: string): void {}

  private handleSetRunning(session: PlayerSession, running: boolean): void {
    if (!this.store.setRunning(session.playerId, running)) {
      serverLog(`${session.displayName} cannot run: out of energy`);
    }
  }
}
