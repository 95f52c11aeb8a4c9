import type { IClientTransport, IServerTransport, SendOptions } from "./Transport.js";

/**
 * One in-memory client connection. Every frame the server sends is recorded
 * in `frames` (in order) and forwarded to the registered handler, if any.
 */
export class LocalConnection implements IClientTransport {
  readonly frames: string[] = [];
  /** Frames skipped because they were droppable while the connection was congested. */
  droppedFrames = 0;
  /** When set, droppable frames are skipped as if the socket buffer were full. */
  congested = false;

  private messageHandler: ((frame: string) => void) | null = null;
  private closeHandler: (() => void) | null = null;
  private deliveryError: Error | null = null;
  private _closed = false;

  constructor(
    readonly id: string,
    private readonly owner: LocalTransport,
  ) {}

  get closed(): boolean {
    return this._closed;
  }

  send(frame: string): void {
    if (this._closed) return;
    this.owner.deliverToServer(this.id, frame);
  }

  onMessage(handler: (frame: string) => void): void {
    this.messageHandler = handler;
  }

  onClose(handler: () => void): void {
    this.closeHandler = handler;
  }

  close(): void {
    this.owner.closeConnection(this.id);
  }

  /** Make every subsequent server write to this connection throw. */
  failDelivery(error = new Error("socket closed")): void {
    this.deliveryError = error;
  }

  /** @internal Called by the transport for server → client frames. */
  receive(frame: string, options?: SendOptions): boolean {
    if (this._closed) return false;
    if (this.deliveryError) throw this.deliveryError;
    if (options?.droppable && this.congested) {
      this.droppedFrames++;
      return false;
    }
    this.frames.push(frame);
    this.messageHandler?.(frame);
    return true;
  }

  /** @internal */
  markClosed(): void {
    if (this._closed) return;
    this._closed = true;
    this.closeHandler?.();
  }
}

/**
 * Synchronous in-process transport with any number of client connections.
 * Messages are delivered on the caller's stack, so tests observe the full
 * effect of a send without awaiting.
 */
export class LocalTransport {
  readonly serverSide: IServerTransport;

  private readonly connections = new Map<string, LocalConnection>();
  private serverMessageHandler: ((connectionId: string, frame: string) => void) | null = null;
  private connectHandler: ((connectionId: string) => void) | null = null;
  private disconnectHandler: ((connectionId: string) => void) | null = null;
  private nextConnectionNumber = 1;
  private closed = false;

  constructor() {
    const self = this;

    this.serverSide = {
      send(connectionId: string, frame: string, options?: SendOptions): boolean {
        if (self.closed) return false;
        return self.connections.get(connectionId)?.receive(frame, options) ?? false;
      },
      onMessage(handler: (connectionId: string, frame: string) => void): void {
        self.serverMessageHandler = handler;
      },
      onConnect(handler: (connectionId: string) => void): void {
        self.connectHandler = handler;
      },
      onDisconnect(handler: (connectionId: string) => void): void {
        self.disconnectHandler = handler;
      },
      disconnect(connectionId: string, _reason: string): void {
        self.closeConnection(connectionId);
      },
      close(): void {
        for (const id of [...self.connections.keys()]) {
          self.closeConnection(id);
        }
        self.closed = true;
      },
    };
  }

  /**
   * Open a new client connection. Call after the server registered its
   * handlers; frames sent during the connect handler are recorded.
   */
  connect(): LocalConnection {
    const conn = this.createConnection();
    this.open(conn);
    return conn;
  }

  /** A connection the server has not seen yet; attach handlers, then open() it. */
  createConnection(): LocalConnection {
    return new LocalConnection(`local-${this.nextConnectionNumber++}`, this);
  }

  /** Announce a connection to the server. */
  open(conn: LocalConnection): void {
    if (this.closed || this.connections.has(conn.id) || conn.closed) return;
    this.connections.set(conn.id, conn);
    this.connectHandler?.(conn.id);
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /** @internal */
  deliverToServer(connectionId: string, frame: string): void {
    if (this.closed || !this.connections.has(connectionId)) return;
    this.serverMessageHandler?.(connectionId, frame);
  }

  /** @internal Close a connection; the disconnect handler fires at most once. */
  closeConnection(connectionId: string): void {
    const conn = this.connections.get(connectionId);
    if (!conn) return;
    this.connections.delete(connectionId);
    conn.markClosed();
    this.disconnectHandler?.(connectionId);
  }
}
