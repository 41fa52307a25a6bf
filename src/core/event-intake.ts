import type { Logger } from "../logger.js";
import { parsePortalState } from "../devices/portal-client.js";
import type { RunOutcome, ScenarioMachine } from "./scenario-machine.js";
import { cooldownRemainingMs, deriveState, toSeconds } from "./status-store.js";
import type { StatusStore, TriggerOrigin } from "./status-store.js";

export type TriggerRequest = {
  origin: TriggerOrigin;
  source: string;
};

export type RejectionReason = "running" | "cooldown" | "auto-disabled";

export type Admission =
  | { admitted: true; triggerNumber: number; done: Promise<RunOutcome> }
  | { admitted: false; reason: RejectionReason; cooldownRemainingSeconds: number };

type Decision =
  | { admitted: true; triggerNumber: number }
  | { admitted: false; reason: RejectionReason; cooldownRemainingSeconds: number };

export type IntakeTopics = {
  personTopic: string;
  portalStateTopic: string;
};

function parseCount(payload: string): number | null {
  const text = payload.trim();
  if (!/^\d+$/.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}

export class EventIntake {
  constructor(
    private readonly deps: {
      store: StatusStore;
      machine: Pick<ScenarioMachine, "start">;
      topics: IntakeTopics;
      logger: Logger;
    },
  ) {}

  submit(request: TriggerRequest): Admission {
    const { store } = this.deps;
    const decision = store.withLock((record, now): Decision => {
      const remaining = toSeconds(cooldownRemainingMs(record, store.cooldownMs, now));
      if (request.origin === "bus" && !record.autoTriggerEnabled) {
        return { admitted: false, reason: "auto-disabled", cooldownRemainingSeconds: remaining };
      }
      const state = deriveState(record, store.cooldownMs, now);
      if (state !== "idle") {
        return { admitted: false, reason: state, cooldownRemainingSeconds: remaining };
      }
      record.scenarioRunning = true;
      record.lastTriggerTime = now;
      record.totalTriggers += 1;
      record.activeTrigger = { origin: request.origin, source: request.source, startedAt: new Date(now).toISOString() };
      record.currentStep = null;
      return { admitted: true, triggerNumber: record.totalTriggers };
    });

    if (!decision.admitted) {
      this.deps.logger.info(
        { origin: request.origin, source: request.source, reason: decision.reason, cooldownRemainingSeconds: decision.cooldownRemainingSeconds },
        "Trigger rejected",
      );
      return decision;
    }

    const run = this.deps.machine.start(decision.triggerNumber, request.origin, request.source);
    return { admitted: true, triggerNumber: decision.triggerNumber, done: run.done };
  }

  handleBusMessage(topic: string, raw: Buffer | string): void {
    const payload = typeof raw === "string" ? raw : raw.toString("utf8");
    const { topics, store, logger } = this.deps;
    const count = topic === topics.personTopic ? parseCount(payload) : null;
    store.withLock((record, now) => {
      record.lastBusMessage = { topic, payload, timestamp: new Date(now).toISOString() };
      if (count !== null) record.lastPersonCount = count;
    });

    if (topic === topics.portalStateTopic) {
      this.handlePortalState(payload);
      return;
    }
    if (topic !== topics.personTopic) {
      logger.debug({ topic }, "Ignoring message on unexpected topic");
      return;
    }
    if (count === null) {
      logger.warn({ topic, payload }, "Person count payload is not a non-negative integer");
      return;
    }
    if (count < 1) return;

    logger.info({ count }, "Person detected");
    this.submit({ origin: "bus", source: topic });
  }

  private handlePortalState(payload: string): void {
    const state = parsePortalState(payload);
    if (state === null) {
      this.deps.logger.warn({ payload }, "Portal state payload must be 1, 2 or 3");
      return;
    }
    const previous = this.deps.store.withLock((record, now) => {
      const before = record.portalReportedState;
      record.portalReportedState = state;
      record.portalLastUpdate = new Date(now).toISOString();
      return before;
    });
    if (previous !== state) {
      this.deps.logger.info({ from: previous, to: state }, "Portal state changed");
    }
  }
}
