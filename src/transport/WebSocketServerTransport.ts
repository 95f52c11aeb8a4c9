import { randomUUID } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import { type RawData, WebSocket, WebSocketServer } from "ws";
import { MAX_BUFFERED_BYTES, MAX_PAYLOAD_BYTES } from "../config/constants.js";
import { serverLog, serverLogError } from "../server/serverLog.js";
import { DeliveryError } from "../shared/errors.js";
import type { IServerTransport, SendOptions } from "./Transport.js";

/** Close code for a connection the server refuses or evicts (policy violation). */
const CLOSE_POLICY = 1008;

export interface WebSocketServerTransportOptions {
  server: HttpServer;
  /** Only accept upgrades on this path. Undefined accepts any path. */
  path?: string | undefined;
  /** Largest inbound frame; bigger frames close the socket. */
  maxPayloadBytes?: number;
  /** Droppable frames are skipped while a socket has more than this queued. */
  maxBufferedBytes?: number;
}

/** Text of a ws message, however ws chose to deliver it. */
export function frameToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * WebSocket-backed server transport for Node.js. Every accepted socket gets a
 * fresh connection id; a reconnecting client is a new connection.
 */
export class WebSocketServerTransport implements IServerTransport {
  private readonly wss: WebSocketServer;
  private readonly clients = new Map<string, WebSocket>();
  private readonly maxBufferedBytes: number;
  private messageHandler: ((connectionId: string, frame: string) => void) | null = null;
  private connectHandler: ((connectionId: string) => void) | null = null;
  private disconnectHandler: ((connectionId: string) => void) | null = null;

  constructor(options: WebSocketServerTransportOptions) {
    const maxPayload = options.maxPayloadBytes ?? MAX_PAYLOAD_BYTES;
    this.maxBufferedBytes = options.maxBufferedBytes ?? MAX_BUFFERED_BYTES;

    const { path } = options;
    if (path) {
      // noServer mode: only accept upgrades on the specified path.
      this.wss = new WebSocketServer({ noServer: true, maxPayload });
      options.server.on("upgrade", (req, socket, head) => {
        const url = req.url ?? "";
        if (url === path || url.startsWith(`${path}?`)) {
          this.wss.handleUpgrade(req, socket, head, (ws) => {
            this.wss.emit("connection", ws, req);
          });
        } else {
          socket.destroy();
        }
      });
    } else {
      this.wss = new WebSocketServer({ server: options.server, maxPayload });
    }

    this.wss.on("connection", (ws: WebSocket) => {
      this.accept(ws);
    });
    this.wss.on("error", (err) => {
      serverLogError("WebSocket server error", err);
    });
  }

  get connectionCount(): number {
    return this.clients.size;
  }

  send(connectionId: string, frame: string, options?: SendOptions): boolean {
    const ws = this.clients.get(connectionId);
    if (ws?.readyState !== WebSocket.OPEN) return false;
    if (options?.droppable && ws.bufferedAmount > this.maxBufferedBytes) {
      return false;
    }
    ws.send(frame, (err) => {
      if (err) serverLogError("send failed", new DeliveryError(connectionId, { cause: err }));
    });
    return true;
  }

  onMessage(handler: (connectionId: string, frame: string) => void): void {
    this.messageHandler = handler;
  }

  onConnect(handler: (connectionId: string) => void): void {
    this.connectHandler = handler;
  }

  onDisconnect(handler: (connectionId: string) => void): void {
    this.disconnectHandler = handler;
  }

  disconnect(connectionId: string, reason: string): void {
    const ws = this.clients.get(connectionId);
    if (!ws) return;
    ws.close(CLOSE_POLICY, reason);
    this.drop(connectionId, ws);
  }

  close(): void {
    for (const [connectionId, ws] of [...this.clients]) {
      ws.close(1001, "Server shutting down");
      this.drop(connectionId, ws);
    }
    this.wss.close();
  }

  private accept(ws: WebSocket): void {
    const connectionId = randomUUID();
    this.clients.set(connectionId, ws);

    ws.on("message", (data) => {
      if (this.clients.get(connectionId) !== ws) return;
      this.messageHandler?.(connectionId, frameToString(data));
    });

    // close and error can both fire for one socket; drop() reports once.
    ws.on("close", () => {
      this.drop(connectionId, ws);
    });
    ws.on("error", (err) => {
      serverLog(`WebSocket error for ${connectionId}: ${err.message}`);
      this.drop(connectionId, ws);
    });

    this.connectHandler?.(connectionId);
  }

  private drop(connectionId: string, ws: WebSocket): void {
    if (this.clients.get(connectionId) !== ws) return;
    this.clients.delete(connectionId);
    this.disconnectHandler?.(connectionId);
  }
}
