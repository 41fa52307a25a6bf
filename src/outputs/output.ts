import type { ScenarioStatus } from "../core/status-store.js";

export interface StatusOutput {
  readonly id: string;
  push(status: ScenarioStatus): void;
}
