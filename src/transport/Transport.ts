/**
 * Frame-level transports. Frames are opaque UTF-8 strings here; encoding and
 * decoding belong to the codec, so a bad frame reaches the dispatcher intact
 * and can be answered with an ERROR.
 */

export interface SendOptions {
  /**
   * The frame may be skipped for a peer whose outbound buffer is backed up.
   * Used for snapshots, which the next tick supersedes.
   */
  droppable?: boolean;
}

export interface IClientTransport {
  send(frame: string): void;
  onMessage(handler: (frame: string) => void): void;
  /** Fires once when the connection is gone, whichever side closed it. */
  onClose(handler: () => void): void;
  close(): void;
}

export interface IServerTransport {
  /**
   * Hand a frame to one connection. Returns false when it was not written
   * (unknown/closed connection, or a droppable frame skipped). Throws only if
   * the underlying socket write throws synchronously.
   */
  send(connectionId: string, frame: string, options?: SendOptions): boolean;
  onMessage(handler: (connectionId: string, frame: string) => void): void;
  onConnect(handler: (connectionId: string) => void): void;
  /** Fires exactly once per connection that previously fired onConnect. */
  onDisconnect(handler: (connectionId: string) => void): void;
  /** Close one connection from the server side. */
  disconnect(connectionId: string, reason: string): void;
  close(): void;
}
