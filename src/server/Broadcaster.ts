import { DeliveryError } from "../shared/errors.js";
import { encodeServerMessage } from "../shared/jsonCodec.js";
import type { ServerMessage } from "../shared/protocol.js";
import type { IServerTransport, SendOptions } from "../transport/Transport.js";
import { serverLogError } from "./serverLog.js";
import type { SessionRegistry } from "./SessionRegistry.js";

export interface BroadcastOptions extends SendOptions {
  /** Connection that should not receive the message. */
  exclude?: string;
}

/** The part of the broadcaster message handlers write to. */
export type Outbox = Pick<Broadcaster, "send" | "broadcast">;

/**
 * Outbound side of the protocol. Encodes each message once and writes it to
 * every registered session; a failing recipient is logged and skipped.
 */
export class Broadcaster {
  constructor(
    private readonly transport: IServerTransport,
    private readonly registry: SessionRegistry,
  ) {}

  /** Send to one connection, registered or not. */
  send(connectionId: string, msg: ServerMessage, options?: SendOptions): boolean {
    return this.deliver(connectionId, encodeServerMessage(msg), options);
  }

  /** Send to every registered session. Returns how many accepted the frame. */
  broadcast(msg: ServerMessage, options?: BroadcastOptions): number {
    const frame = encodeServerMessage(msg);
    const sendOptions: SendOptions = options?.droppable ? { droppable: true } : {};
    let delivered = 0;
    // Copy first: a failing write may tear a session down mid-iteration.
    for (const connectionId of [...this.registry.connectionIds()]) {
      if (connectionId === options?.exclude) continue;
      if (this.deliver(connectionId, frame, sendOptions)) delivered++;
    }
    return delivered;
  }

  private deliver(connectionId: string, frame: string, options?: SendOptions): boolean {
    try {
      return this.transport.send(connectionId, frame, options);
    } catch (err) {
      serverLogError("send failed", new DeliveryError(connectionId, { cause: err }));
      return false;
    }
  }
}
