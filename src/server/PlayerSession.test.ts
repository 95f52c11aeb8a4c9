import { describe, expect, it } from "vitest";
import { PlayerSession } from "./PlayerSession.js";

describe("PlayerSession", () => {
  it("derives the display name from the player number", () => {
    const session = new PlayerSession("conn-1", "player-a", 3, 1234);

    expect(session.connectionId).toBe("conn-1");
    expect(session.playerId).toBe("player-a");
    expect(session.playerNumber).toBe(3);
    expect(session.displayName).toBe("Player3");
    expect(session.connectedAt).toBe(1234);
  });
});
