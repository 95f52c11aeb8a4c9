/**
 * JSON envelope codec.
 *
 * Every frame is a UTF-8 JSON object discriminated by its `type` field.
 * Decoding validates the envelope shape; unknown keys are stripped, and any
 * parse or shape failure surfaces as a DecodeError.
 */

import { z } from "zod";
import { DecodeError } from "./errors.js";
import type {
  ChatMessage,
  ClientMessage,
  GameState,
  Item,
  Player,
  Position,
  ServerMessage,
  WorldObject,
} from "./protocol.js";

// ---- Schemas ----

const positionSchema: z.ZodType<Position> = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const itemSchema: z.ZodType<Item> = z.object({
  id: z.string(),
  name: z.string(),
  stackable: z.boolean(),
  quantity: z.number(),
});

const playerSchema: z.ZodType<Player> = z.object({
  id: z.string(),
  name: z.string(),
  position: positionSchema,
  isRunning: z.boolean(),
  runEnergy: z.number(),
  inventory: z.array(itemSchema),
  skills: z.record(z.string(), z.number()),
});

const chatMessageSchema: z.ZodType<ChatMessage> = z.object({
  playerName: z.string(),
  content: z.string(),
  timestamp: z.number(),
});

const worldObjectSchema: z.ZodType<WorldObject> = z.object({
  id: z.string(),
  type: z.string(),
  position: positionSchema,
});

const gameStateSchema: z.ZodType<GameState> = z.object({
  tick: z.number().int(),
  players: z.record(z.string(), playerSchema),
  chatMessages: z.array(chatMessageSchema),
  worldObjects: z.record(z.string(), worldObjectSchema),
});

export const clientMessageSchema: z.ZodType<ClientMessage> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("MOVE"), playerId: z.string(), position: positionSchema }),
  z.object({ type: z.literal("CHAT"), playerId: z.string(), content: z.string() }),
  z.object({ type: z.literal("INTERACT"), playerId: z.string(), targetId: z.string() }),
  z.object({ type: z.literal("SET_RUNNING"), playerId: z.string(), running: z.boolean() }),
]);

export const serverMessageSchema: z.ZodType<ServerMessage> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("INIT"), playerId: z.string(), gameState: gameStateSchema }),
  z.object({ type: z.literal("STATE_UPDATE"), gameState: gameStateSchema }),
  z.object({ type: z.literal("PLAYER_JOINED"), player: playerSchema }),
  z.object({ type: z.literal("PLAYER_LEFT"), playerId: z.string() }),
  z.object({ type: z.literal("CHAT_MESSAGE"), message: chatMessageSchema }),
  z.object({ type: z.literal("ERROR"), message: z.string() }),
]);

// ---- Encoding ----

export function encodeServerMessage(msg: ServerMessage): string {
  return JSON.stringify(msg);
}

export function encodeClientMessage(msg: ClientMessage): string {
  return JSON.stringify(msg);
}

// ---- Decoding ----

export function decodeClientMessage(frame: string): ClientMessage {
  return decodeWith(clientMessageSchema, frame);
}

export function decodeServerMessage(frame: string): ServerMessage {
  return decodeWith(serverMessageSchema, frame);
}

function decodeWith<T>(schema: z.ZodType<T>, frame: string): T {
  let json: unknown;
  try {
    json = JSON.parse(frame);
  } catch (err) {
    throw new DecodeError("Frame is not valid JSON", { cause: err });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new DecodeError(`Invalid envelope${where}: ${issue?.message ?? "unknown shape"}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
