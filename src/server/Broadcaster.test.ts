import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { IServerTransport, SendOptions } from "../transport/Transport.js";
import { Broadcaster } from "./Broadcaster.js";
import { SessionRegistry } from "./SessionRegistry.js";
import { WorldStore } from "./WorldStore.js";

interface SentFrame {
  connectionId: string;
  frame: string;
  options: SendOptions | undefined;
}

function createFakeTransport(failing: ReadonlySet<string> = new Set()) {
  const sent: SentFrame[] = [];
  const transport: IServerTransport = {
    send(connectionId, frame, options) {
      if (failing.has(connectionId)) throw new Error("socket closed");
      sent.push({ connectionId, frame, options });
      return true;
    },
    onMessage() {},
    onConnect() {},
    onDisconnect() {},
    disconnect() {},
    close() {},
  };
  return { transport, sent };
}

function setup(failing?: ReadonlySet<string>) {
  const { transport, sent } = createFakeTransport(failing);
  const store = new WorldStore({ bounds: { width: 100, height: 100 }, chatHistoryLimit: 100 });
  const registry = new SessionRegistry(store);
  registry.onConnect("c1");
  registry.onConnect("c2");
  registry.onConnect("c3");
  return { broadcaster: new Broadcaster(transport, registry), sent };
}

describe("Broadcaster", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends the same encoded frame to every session", () => {
    const { broadcaster, sent } = setup();
    const delivered = broadcaster.broadcast({ type: "PLAYER_LEFT", playerId: "gone" });

    expect(delivered).toBe(3);
    expect(sent.map((s) => s.connectionId)).toEqual(["c1", "c2", "c3"]);
    expect(new Set(sent.map((s) => s.frame))).toEqual(
      new Set(['{"type":"PLAYER_LEFT","playerId":"gone"}']),
    );
  });

  it("skips the excluded connection", () => {
    const { broadcaster, sent } = setup();
    broadcaster.broadcast({ type: "ERROR", message: "x" }, { exclude: "c2" });
    expect(sent.map((s) => s.connectionId)).toEqual(["c1", "c3"]);
  });

  it("passes droppable through to the transport", () => {
    const { broadcaster, sent } = setup();
    broadcaster.broadcast({ type: "ERROR", message: "x" }, { droppable: true });
    expect(sent.every((s) => s.options?.droppable === true)).toBe(true);
  });

  it("logs a failing recipient and keeps going", () => {
    const { broadcaster, sent } = setup(new Set(["c2"]));
    const delivered = broadcaster.broadcast({ type: "ERROR", message: "x" });

    expect(delivered).toBe(2);
    expect(sent.map((s) => s.connectionId)).toEqual(["c1", "c3"]);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining("send failed: delivery to c2 failed"),
    );
  });

  it("send targets one connection", () => {
    const { broadcaster, sent } = setup();
    expect(broadcaster.send("c3", { type: "ERROR", message: "only you" })).toBe(true);
    expect(sent).toEqual([
      { connectionId: "c3", frame: '{"type":"ERROR","message":"only you"}', options: undefined },
    ]);
  });
});
