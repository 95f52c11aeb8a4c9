/** Inbound frame is not valid JSON or does not match any client envelope. */
export class DecodeError extends Error {
  override readonly name = "DecodeError";
}

/**
 * Claimed player id does not belong to the sending connection, or the
 * player no longer exists.
 */
export class IdentityError extends Error {
  override readonly name = "IdentityError";
}

/** Proposed mutation is illegal (e.g. a move outside the world bounds). */
export class ValidationError extends Error {
  override readonly name = "ValidationError";
}

/** Writing a frame to one connection failed. */
export class DeliveryError extends Error {
  override readonly name = "DeliveryError";

  constructor(
    readonly connectionId: string,
    options?: { cause?: unknown },
  ) {
    super(`delivery to ${connectionId} failed`, options);
  }
}
