import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_GAME_CONFIG } from "../config/serverEnv.js";
import { GameServer } from "../server/GameServer.js";
import { LocalTransport } from "../transport/LocalTransport.js";
import { GameClient } from "./GameClient.js";

function setup() {
  let n = 0;
  const transport = new LocalTransport();
  const server = new GameServer(transport.serverSide, DEFAULT_GAME_CONFIG, {
    createId: () => `P${++n}`,
    now: () => 50,
  });
  server.start();
  const join = () => {
    const conn = transport.createConnection();
    const client = new GameClient(conn);
    transport.open(conn);
    return { conn, client };
  };
  return { transport, server, join };
}

describe("GameClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("throws on input before INIT", () => {
    const transport = new LocalTransport();
    const client = new GameClient(transport.connect());

    expect(client.playerId).toBeNull();
    expect(() => client.move({ x: 1, y: 1 })).toThrow("Not joined yet");
    expect(() => client.chat("hi")).toThrow("Not joined yet");
  });

  it("adopts the id and mirror from INIT", () => {
    const transport = new LocalTransport();
    const conn = transport.connect();
    const client = new GameClient(conn);

    conn.receive(
      JSON.stringify({
        type: "INIT",
        playerId: "P9",
        gameState: { tick: 4, players: {}, chatMessages: [], worldObjects: {} },
      }),
    );

    expect(client.playerId).toBe("P9");
    expect(client.state?.tick).toBe(4);
  });

  it("replaces the mirror wholesale on each snapshot", () => {
    const { server, join } = setup();
    const { client } = join();
    const first = client.state;

    client.move({ x: 7, y: 8 });
    server.tick();

    expect(client.state).not.toBe(first);
    expect(client.state?.tick).toBe(1);
    expect(client.self?.position).toEqual({ x: 7, y: 8 });
  });

  it("leaves the mirror alone on join and leave events until the next snapshot", () => {
    const { server, join } = setup();
    const a = join();
    const before = a.client.state;
    const b = join();
    const onLeft = vi.fn();
    a.client.on("PLAYER_LEFT", onLeft);

    expect(a.client.state).toBe(before);
    expect(Object.keys(a.client.state?.players ?? {})).toEqual(["P1"]);

    b.conn.close();
    expect(onLeft).toHaveBeenCalledWith({ type: "PLAYER_LEFT", playerId: "P2" });
    expect(a.client.state).toBe(before);

    server.tick();
    expect(Object.keys(a.client.state?.players ?? {})).toEqual(["P1"]);
    expect(a.client.state?.tick).toBe(1);
  });

  it("never holds more chat than the server keeps", () => {
    const { server, join } = setup();
    const { client } = join();
    server.tick();

    for (let i = 1; i <= 150; i++) client.chat(`m${i}`);
    expect(client.state?.chatMessages).toEqual([]);

    server.tick();
    const contents = client.state?.chatMessages.map((m) => m.content) ?? [];
    expect(contents).toHaveLength(100);
    expect(contents[0]).toBe("m51");
    expect(contents[99]).toBe("m150");
    expect(server.store.chatLength).toBe(100);
  });

  it("notifies typed listeners", () => {
    const { join } = setup();
    const a = join();
    const b = join();
    const onChat = vi.fn();
    const unsubscribe = b.client.on("CHAT_MESSAGE", onChat);

    a.client.chat("hello");
    unsubscribe();
    a.client.chat("again");

    expect(onChat).toHaveBeenCalledOnce();
    expect(onChat).toHaveBeenCalledWith({
      type: "CHAT_MESSAGE",
      message: { playerName: "Player1", content: "hello", timestamp: 50 },
    });
    expect(b.client.state?.chatMessages).toEqual([]);
  });

  it("keeps the last ERROR", () => {
    const { join } = setup();
    const { conn, client } = join();

    conn.send('{"type":"MOVE"}');
    expect(client.lastError).toBe("Invalid message format");
  });

  it("ignores undecodable server frames", () => {
    const transport = new LocalTransport();
    const conn = transport.connect();
    const client = new GameClient(conn);
    const onAny = vi.fn();
    client.on("ERROR", onAny);

    conn.receive("garbage");

    expect(onAny).not.toHaveBeenCalled();
    expect(client.state).toBeNull();
  });

  it("reports the connection closing", () => {
    const { join } = setup();
    const { conn, client } = join();
    const onClose = vi.fn();
    client.onClose(onClose);

    conn.close();

    expect(client.connected).toBe(false);
    expect(onClose).toHaveBeenCalledOnce();
  });
});
