import { CHAT_MAX_LENGTH } from "../config/constants.js";
import type { WorldBounds } from "../config/serverEnv.js";
import { ValidationError } from "../shared/errors.js";
import type { Position } from "../shared/protocol.js";

/** Characters a chat message may keep: word characters, whitespace and ! ? . , */
const DISALLOWED_CHAT_CHARS = /[^\w\s!?.,]/g;

/**
 * Check a proposed position against the world bounds.
 * Returns the violation, or null when the move is legal.
 */
export function moveViolation(position: Position, bounds: WorldBounds): ValidationError | null {
  const { x, y } = position;
  if (!Number.isInteger(x) || !Number.isInteger(y)) {
    return new ValidationError(`position (${x}, ${y}) is not a grid cell`);
  }
  if (x < 0 || x >= bounds.width || y < 0 || y >= bounds.height) {
    return new ValidationError(
      `position (${x}, ${y}) is outside [0,${bounds.width}) x [0,${bounds.height})`,
    );
  }
  return null;
}

export function isValidPosition(position: Position, bounds: WorldBounds): boolean {
  return moveViolation(position, bounds) === null;
}

/**
 * Normalize raw chat text: trim, truncate to `maxLength` characters, then
 * strip disallowed characters. Truncation counts raw code points, so symbols
 * removed by the filter still consume length.
 */
export function sanitizeChatContent(raw: string, maxLength = CHAT_MAX_LENGTH): string {
  const truncated = Array.from(raw.trim()).slice(0, maxLength).join("");
  return truncated.replace(DISALLOWED_CHAT_CHARS, "").trim();
}
