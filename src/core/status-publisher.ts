import type { Logger } from "../logger.js";
import type { StatusOutput } from "../outputs/output.js";
import type { ScenarioStatus, StatusStore } from "./status-store.js";

/**
 * Pushes the full status snapshot to every output on each store change.
 * Outputs are independent: one that throws is logged and skipped.
 */
export class StatusPublisher {
  private ticker: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly outputs: StatusOutput[],
    private readonly logger: Logger,
  ) {}

  attach(store: StatusStore): void {
    this.unsubscribe?.();
    this.unsubscribe = store.subscribe((status) => this.publish(status));
  }

  publish(status: ScenarioStatus): void {
    for (const output of this.outputs) {
      try {
        output.push(status);
      } catch (error) {
        this.logger.warn({ err: error, output: output.id }, "Status output failed");
      }
    }
  }

  // Ticks while cooling down, plus once when the cooldown ends.
  startTicker(store: StatusStore, intervalMs = 1000): void {
    if (this.ticker) return;
    let wasCooling = false;
    this.ticker = setInterval(() => {
      const cooling = store.state() === "cooldown";
      if (cooling || wasCooling) this.publish(store.read());
      wasCooling = cooling;
    }, intervalMs);
    this.ticker.unref();
  }

  stop(): void {
    if (this.ticker) clearInterval(this.ticker);
    this.ticker = null;
    this.unsubscribe?.();
    this.unsubscribe = null;
  }
}
