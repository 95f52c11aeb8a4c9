/**
 * Live pairing of a connection with its assigned player identity.
 * Holds only the back-reference to the player; the Player record itself
 * lives in the WorldStore.
 */
export class PlayerSession {
  readonly connectionId: string;
  readonly playerId: string;

  /** Connection order number (1-based, never reused). */
  readonly playerNumber: number;

  /** Auto-assigned display name (e.g. "Player3"). */
  readonly displayName: string;

  /** Timestamp (ms) when this session was created. */
  readonly connectedAt: number;

  constructor(
    connectionId: string,
    playerId: string,
    playerNumber: number,
    connectedAt = Date.now(),
  ) {
    this.connectionId = connectionId;
    this.playerId = playerId;
    this.playerNumber = playerNumber;
    this.displayName = `Player${playerNumber}`;
    this.connectedAt = connectedAt;
  }
}
