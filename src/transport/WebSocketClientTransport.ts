import { WebSocket } from "ws";
import { MAX_PAYLOAD_BYTES } from "../config/constants.js";
import type { IClientTransport } from "./Transport.js";
import { frameToString } from "./WebSocketServerTransport.js";

/**
 * Node WebSocket client transport. Connects to a remote game server; frames
 * sent before the socket opens are dropped, so await ready() first. Frames
 * that arrive before onMessage() is called are held and handed to the
 * handler when it is attached: the server's first frame can arrive in the
 * same burst as the handshake.
 */
export class WebSocketClientTransport implements IClientTransport {
  private readonly ws: WebSocket;
  private messageHandler: ((frame: string) => void) | null = null;
  private readonly pendingFrames: string[] = [];
  private closeHandler: (() => void) | null = null;
  private closed = false;
  bytesReceived = 0;
  /** Close code and reason the server gave, if any (e.g. 1008 "Server full"). */
  closeCode = 0;
  closeReason = "";

  constructor(url: string) {
    this.ws = new WebSocket(url, { maxPayload: MAX_PAYLOAD_BYTES * 64 });
    this.ws.on("message", (data) => {
      const frame = frameToString(data);
      this.bytesReceived += Buffer.byteLength(frame);
      if (this.messageHandler) {
        this.messageHandler(frame);
      } else {
        this.pendingFrames.push(frame);
      }
    });
    this.ws.on("close", (code, reason) => {
      this.closeCode = code;
      this.closeReason = reason.toString("utf8");
      this.markClosed();
    });
    // ws always follows an error with close, which reports it.
    this.ws.on("error", (err) => {
      console.error("[gridsync] WebSocket error:", err.message);
    });
  }

  /** Returns a promise that resolves when the WebSocket connection is open. */
  ready(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) {
      return Promise.resolve();
    }
    if (this.closed) {
      return Promise.reject(new Error("WebSocket is closed"));
    }
    return new Promise((resolve, reject) => {
      this.ws.once("open", () => resolve());
      this.ws.once("error", (err) => {
        reject(new Error("WebSocket connection failed", { cause: err }));
      });
    });
  }

  send(frame: string): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(frame);
    }
  }

  onMessage(handler: (frame: string) => void): void {
    this.messageHandler = handler;
    for (const frame of this.pendingFrames.splice(0)) handler(frame);
  }

  onClose(handler: () => void): void {
    this.closeHandler = handler;
  }

  close(): void {
    this.ws.close();
  }

  private markClosed(): void {
    if (this.closed) return;
    this.closed = true;
    this.closeHandler?.();
  }
}
