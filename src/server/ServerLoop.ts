import { TICK_MS } from "../config/constants.js";
import { serverLogError } from "./serverLog.js";

/**
 * Fixed-interval tick loop using setInterval. The interval is independent of
 * inbound traffic; a throwing tick is logged and the loop keeps running.
 */
export class ServerLoop {
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private readonly tickFn: () => void;
  private _tickMs: number;

  constructor(tickFn: () => void, tickMs = TICK_MS) {
    this.tickFn = tickFn;
    this._tickMs = tickMs;
  }

  get tickMs(): number {
    return this._tickMs;
  }

  get running(): boolean {
    return this.intervalId !== null;
  }

  start(): void {
    if (this.intervalId !== null) return;
    this.intervalId = setInterval(() => {
      try {
        this.tickFn();
      } catch (err) {
        serverLogError("tick error", err);
      }
    }, this._tickMs);
  }

  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  setTickMs(ms: number): void {
    if (ms <= 0) return;
    this._tickMs = ms;
    // Restart interval at new rate if currently running
    if (this.intervalId !== null) {
      this.stop();
      this.start();
    }
  }
}
