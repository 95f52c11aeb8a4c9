import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { GameState } from "../shared/protocol.js";
import { RenderLoop, type RenderSource } from "./RenderLoop.js";

function emptyState(tick: number): GameState {
  return { tick, players: {}, chatMessages: [], worldObjects: {} };
}

describe("RenderLoop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("skips frames until a mirror exists", () => {
    const source: { state: GameState | null } = { state: null };
    const render = vi.fn();
    const loop = new RenderLoop(source, render, 100);
    loop.start();

    vi.advanceTimersByTime(300);
    expect(render).not.toHaveBeenCalled();

    source.state = emptyState(1);
    vi.advanceTimersByTime(100);
    expect(render).toHaveBeenCalledWith(source.state, 1);

    loop.stop();
  });

  it("renders at its own cadence regardless of snapshot rate", () => {
    const source: RenderSource = { state: emptyState(5) };
    const render = vi.fn();
    const loop = new RenderLoop(source, render, 100);
    loop.start();

    vi.advanceTimersByTime(600);
    loop.stop();
    vi.advanceTimersByTime(600);

    expect(render).toHaveBeenCalledTimes(6);
    expect(loop.frameCount).toBe(6);
    expect(loop.running).toBe(false);
  });
});
