import { describe, expect, it } from "vitest";
import { SessionRegistry } from "./SessionRegistry.js";
import { WorldStore } from "./WorldStore.js";

function createRegistry(createId?: (playerNumber: number) => string) {
  const store = new WorldStore({ bounds: { width: 100, height: 100 }, chatHistoryLimit: 100 });
  const registry = new SessionRegistry(store, createId);
  return { store, registry };
}

describe("SessionRegistry", () => {
  it("onConnect seeds a default player in the store", () => {
    const { store, registry } = createRegistry();
    const session = registry.onConnect("conn-1");

    expect(registry.getPlayerId("conn-1")).toBe(session.playerId);
    expect(store.getPlayer(session.playerId)).toEqual({
      id: session.playerId,
      name: "Player1",
      position: { x: 0, y: 0 },
      isRunning: false,
      runEnergy: 100,
      inventory: [],
      skills: {
        attack: 0,
        strength: 0,
        defence: 0,
        hitpoints: 10,
        prayer: 0,
        magic: 0,
        ranged: 0,
        mining: 0,
        woodcutting: 0,
        fishing: 0,
      },
    });
  });

  it("assigns distinct ids and increasing player numbers", () => {
    const { registry } = createRegistry();
    const a = registry.onConnect("conn-1");
    const b = registry.onConnect("conn-2");

    expect(a.playerId).not.toBe(b.playerId);
    expect(a.displayName).toBe("Player1");
    expect(b.displayName).toBe("Player2");
  });

  it("rejects registering the same connection twice", () => {
    const { registry } = createRegistry();
    registry.onConnect("conn-1");
    expect(() => registry.onConnect("conn-1")).toThrow("connection conn-1 is already registered");
  });

  it("onDisconnect removes the player and the mapping", () => {
    const { store, registry } = createRegistry();
    const session = registry.onConnect("conn-1");

    expect(registry.onDisconnect("conn-1")).toBe(session);
    expect(store.hasPlayer(session.playerId)).toBe(false);
    expect(registry.getPlayerId("conn-1")).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it("onDisconnect is idempotent and ignores unknown connections", () => {
    const { registry } = createRegistry();
    registry.onConnect("conn-1");

    expect(registry.onDisconnect("conn-1")).not.toBeNull();
    expect(registry.onDisconnect("conn-1")).toBeNull();
    expect(registry.onDisconnect("never-joined")).toBeNull();
  });

  it("default ids are prefixed with the player number", () => {
    const { registry } = createRegistry();
    const ids = Array.from({ length: 40 }, (_, i) => registry.onConnect(`conn-${i}`).playerId);

    expect(ids[0]).toMatch(/^1-[0-9a-f-]{36}$/);
    expect(ids[35]).toMatch(/^10-/);
    expect(new Set(ids.map((id) => id.split("-")[0])).size).toBe(40);
  });

  it("never reissues an id, even after disconnect", () => {
    const { registry } = createRegistry();
    const first = registry.onConnect("conn-1");
    registry.onDisconnect("conn-1");
    const second = registry.onConnect("conn-1");

    expect(second.playerId).not.toBe(first.playerId);
    expect(second.playerId.startsWith("2-")).toBe(true);
  });

  it("redraws an id that belongs to a live player", () => {
    const ids = ["dup", "dup", "fresh"];
    const { registry } = createRegistry(() => ids.shift() ?? "exhausted");

    const first = registry.onConnect("conn-1");
    const second = registry.onConnect("conn-2");

    expect(first.playerId).toBe("dup");
    expect(second.playerId).toBe("fresh");
  });

  it("passes the player number to the id source", () => {
    const seen: number[] = [];
    const { registry } = createRegistry((n) => {
      seen.push(n);
      return `id-${n}`;
    });
    registry.onConnect("a");
    registry.onConnect("b");

    expect(seen).toEqual([1, 2]);
    expect(registry.getPlayerId("b")).toBe("id-2");
  });

  it("keeps connections and players in one-to-one correspondence", () => {
    const { store, registry } = createRegistry();
    for (let i = 0; i < 5; i++) registry.onConnect(`conn-${i}`);
    registry.onDisconnect("conn-2");
    registry.onDisconnect("conn-4");

    expect(registry.size).toBe(3);
    expect(store.playerCount).toBe(3);
    const playerIds = [...registry.values()].map((s) => s.playerId);
    expect(new Set(playerIds).size).toBe(3);
    for (const id of playerIds) expect(store.hasPlayer(id)).toBe(true);
    expect([...registry.connectionIds()]).toEqual(["conn-0", "conn-1", "conn-3"]);
  });
});
