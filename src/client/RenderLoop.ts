import { RENDER_INTERVAL_MS } from "../config/constants.js";
import type { GameState } from "../shared/protocol.js";

export interface RenderSource {
  readonly state: GameState | null;
}

/**
 * Fixed-interval presentation loop. Draws whatever mirror is current, so the
 * frame rate never depends on how often snapshots arrive. Frames before the
 * first snapshot are skipped.
 */
export class RenderLoop {
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private frames = 0;

  constructor(
    private readonly source: RenderSource,
    private readonly render: (state: GameState, frame: number) => void,
    private readonly intervalMs = RENDER_INTERVAL_MS,
  ) {}

  get running(): boolean {
    return this.intervalId !== null;
  }

  get frameCount(): number {
    return this.frames;
  }

  start(): void {
    if (this.intervalId !== null) return;
    this.intervalId = setInterval(() => {
      this.frame();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  private frame(): void {
    const state = this.source.state;
    if (!state) return;
    this.render(state, ++this.frames);
  }
}
