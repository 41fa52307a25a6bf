import type { PortalState } from "../config/types.js";
import type { Clock } from "./clock.js";

export type ScenarioState = "idle" | "running" | "cooldown";

export type TriggerOrigin = "bus" | "manual";

export type BusMessage = {
  topic: string;
  payload: string;
  timestamp: string;
};

export type ActiveTrigger = {
  origin: TriggerOrigin;
  source: string;
  startedAt: string;
};

export type StatusRecord = {
  lastTriggerTime: number | null;
  scenarioRunning: boolean;
  totalTriggers: number;
  lastPersonCount: number;
  autoTriggerEnabled: boolean;
  lastBusMessage: BusMessage | null;
  visitorCount: number;
  portalReportedState: PortalState | null;
  portalLastUpdate: string | null;
  portalOnline: boolean;
  haAvailable: boolean;
  busConnected: boolean;
  activeTrigger: ActiveTrigger | null;
  currentStep: string | null;
};

export type ScenarioStatus = Omit<StatusRecord, "lastTriggerTime" | "lastBusMessage" | "activeTrigger"> & {
  state: ScenarioState;
  lastTriggerTime: string | null;
  cooldownDurationSeconds: number;
  cooldownRemainingSeconds: number;
  lastBusMessage: BusMessage | null;
  activeTrigger: ActiveTrigger | null;
  uptimeStart: string;
};

type StatusListener = (status: ScenarioStatus) => void;

type TimingFields = Pick<StatusRecord, "scenarioRunning" | "lastTriggerTime">;

export function cooldownRemainingMs(record: TimingFields, cooldownMs: number, now: number): number {
  if (record.lastTriggerTime === null) return 0;
  return Math.max(0, cooldownMs - (now - record.lastTriggerTime));
}

export function deriveState(record: TimingFields, cooldownMs: number, now: number): ScenarioState {
  if (record.scenarioRunning) return "running";
  if (cooldownRemainingMs(record, cooldownMs, now) > 0) return "cooldown";
  return "idle";
}

export function toSeconds(ms: number): number {
  return Math.round(ms / 100) / 10;
}

export class StatusStore {
  private record: StatusRecord = {
    lastTriggerTime: null,
    scenarioRunning: false,
    totalTriggers: 0,
    lastPersonCount: 0,
    autoTriggerEnabled: true,
    lastBusMessage: null,
    visitorCount: 0,
    portalReportedState: null,
    portalLastUpdate: null,
    portalOnline: false,
    haAvailable: false,
    busConnected: false,
    activeTrigger: null,
    currentStep: null,
  };

  private readonly listeners = new Set<StatusListener>();
  private readonly uptimeStart: string;
  readonly cooldownMs: number;

  constructor(
    readonly cooldownDurationSeconds: number,
    private readonly clock: Clock,
  ) {
    this.cooldownMs = cooldownDurationSeconds * 1000;
    this.uptimeStart = new Date(clock.now()).toISOString();
  }

  read(): ScenarioStatus {
    const now = this.clock.now();
    const record = this.record;
    return {
      ...record,
      state: deriveState(record, this.cooldownMs, now),
      lastTriggerTime: record.lastTriggerTime === null ? null : new Date(record.lastTriggerTime).toISOString(),
      cooldownDurationSeconds: this.cooldownDurationSeconds,
      cooldownRemainingSeconds: toSeconds(cooldownRemainingMs(record, this.cooldownMs, now)),
      lastBusMessage: record.lastBusMessage ? { ...record.lastBusMessage } : null,
      activeTrigger: record.activeTrigger ? { ...record.activeTrigger } : null,
      uptimeStart: this.uptimeStart,
    };
  }

  state(): ScenarioState {
    return deriveState(this.record, this.cooldownMs, this.clock.now());
  }

  // Mutators are synchronous, so no two updates interleave. Listeners only hear about real changes.
  withLock<T>(mutator: (record: StatusRecord, now: number) => T): T {
    const now = this.clock.now();
    const draft: StatusRecord = { ...this.record };
    const result = mutator(draft, now);
    const changed = JSON.stringify(draft) !== JSON.stringify(this.record);
    this.record = draft;
    if (changed) this.notify();
    return result;
  }

  subscribe(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const snapshot = this.read();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
