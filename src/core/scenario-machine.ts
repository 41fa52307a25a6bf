import { PORTAL_ROTATING } from "../config/types.js";
import type { PortalState, ScenarioDefinition } from "../config/types.js";
import type { DeviceResult } from "../devices/device-result.js";
import type { LightingDevice } from "../devices/lighting-client.js";
import type { PortalDevice } from "../devices/portal-client.js";
import type { Logger } from "../logger.js";
import { CancellationToken } from "./clock.js";
import type { Clock } from "./clock.js";
import { cycleDurationMs, runFlicker } from "./flicker.js";
import type { FlickerOutcome } from "./flicker.js";
import { recordLightingResult, recordPortalResult } from "./liveness.js";
import type { StatusStore, TriggerOrigin } from "./status-store.js";

export type RunOutcome = "completed" | "aborted";

export type ScenarioRun = {
  readonly triggerNumber: number;
  readonly origin: TriggerOrigin;
  readonly source: string;
  readonly token: CancellationToken;
  portalStateBefore: PortalState | null;
  done: Promise<RunOutcome>;
};

type ScenarioStep = {
  name: string;
  run: (run: ScenarioRun) => Promise<void>;
};

export type FlickerStart = { started: true; done: Promise<FlickerOutcome> } | { started: false; reason: "running" };

export type ScenarioMachineDeps = {
  store: StatusStore;
  portal: PortalDevice;
  lighting: LightingDevice;
  scenario: ScenarioDefinition;
  clock: Clock;
  logger: Logger;
};

export class ScenarioMachine {
  private activeRun: ScenarioRun | null = null;
  private flickerToken: CancellationToken | null = null;
  private readonly steps: ScenarioStep[];

  constructor(private readonly deps: ScenarioMachineDeps) {
    const { scenes } = deps.scenario;
    this.steps = [
      {
        name: "query-portal",
        run: async (run) => {
          const result = await this.portalCall("getState", () => deps.portal.getState());
          run.portalStateBefore = result.ok ? result.value : null;
        },
      },
      {
        name: "portal-alarm",
        run: async (run) => {
          // Toggle only maps rotating to alarm.
          if (run.portalStateBefore === PORTAL_ROTATING) {
            await this.portalCall("toggle", () => deps.portal.toggle());
          } else {
            await this.portalCall("forceRed", () => deps.portal.forceRed());
          }
        },
      },
      {
        name: "lights-off",
        run: async () => {
          await this.lightingCall("lights-off", () => deps.lighting.activateScene(scenes["lights-off"]));
        },
      },
      {
        name: "flicker",
        run: async (run) => {
          await runFlicker({
            definition: deps.scenario.flicker,
            lighting: deps.lighting,
            clock: deps.clock,
            token: run.token,
            logger: deps.logger,
            onResult: (result) => recordLightingResult(deps.store, result),
          });
        },
      },
      {
        name: "lights-on",
        run: async () => {
          await this.lightingCall("lights-on", () => deps.lighting.activateScene(scenes["lights-on"]));
        },
      },
      {
        name: "portal-restore",
        run: async () => {
          await this.portalCall("reset", () => deps.portal.reset());
        },
      },
    ];
  }

  get stepNames(): string[] {
    return this.steps.map((step) => step.name);
  }

  start(triggerNumber: number, origin: TriggerOrigin, source: string): ScenarioRun {
    this.cancelFlicker();
    const run: ScenarioRun = {
      triggerNumber,
      origin,
      source,
      token: new CancellationToken(),
      portalStateBefore: null,
      done: Promise.resolve<RunOutcome>("completed"),
    };
    this.activeRun = run;
    const { flicker } = this.deps.scenario;
    this.deps.logger.info(
      { triggerNumber, origin, source, flickerMs: cycleDurationMs(flicker) * flicker.cycles },
      "Scenario started",
    );
    run.done = this.execute(run).catch((error: unknown) => {
      this.deps.logger.error({ err: error, triggerNumber }, "Scenario sequence failed");
      this.finish(run);
      return "completed" as const;
    });
    return run;
  }

  // The cooldown restarts from the abort; the sequence stops at its next token check.
  abort(): boolean {
    const run = this.activeRun;
    this.activeRun = null;
    run?.token.cancel();
    this.cancelFlicker();
    const stopped = this.deps.store.withLock((record, now) => {
      if (!record.scenarioRunning) return false;
      record.scenarioRunning = false;
      record.lastTriggerTime = now;
      record.activeTrigger = null;
      record.currentStep = null;
      return true;
    });
    if (stopped) {
      this.deps.logger.warn({ triggerNumber: run?.triggerNumber ?? null }, "Scenario aborted by operator");
    }
    return stopped;
  }

  resetCooldown(): void {
    this.deps.store.withLock((record) => {
      record.lastTriggerTime = null;
    });
    this.deps.logger.info("Cooldown reset");
  }

  startFlicker(): FlickerStart {
    if (this.activeRun || this.flickerToken || this.deps.store.state() === "running") {
      return { started: false, reason: "running" };
    }
    const token = new CancellationToken();
    this.flickerToken = token;
    const done = runFlicker({
      definition: this.deps.scenario.flicker,
      lighting: this.deps.lighting,
      clock: this.deps.clock,
      token,
      logger: this.deps.logger,
      onResult: (result) => recordLightingResult(this.deps.store, result),
    })
      .catch((error: unknown) => {
        this.deps.logger.error({ err: error }, "Standalone flicker failed");
        return "cancelled" as const;
      })
      .finally(() => {
        if (this.flickerToken === token) this.flickerToken = null;
      });
    return { started: true, done };
  }

  shutdown(): void {
    this.activeRun?.token.cancel();
    this.activeRun = null;
    this.cancelFlicker();
  }

  private async execute(run: ScenarioRun): Promise<RunOutcome> {
    for (const step of this.steps) {
      if (run.token.cancelled) return this.aborted(run, step.name);
      this.markStep(run, step.name);
      await step.run(run);
    }
    if (run.token.cancelled) return this.aborted(run, "complete");
    this.finish(run);
    this.deps.logger.info({ triggerNumber: run.triggerNumber }, "Scenario completed");
    return "completed";
  }

  private aborted(run: ScenarioRun, beforeStep: string): RunOutcome {
    this.deps.logger.info({ triggerNumber: run.triggerNumber, beforeStep }, "Scenario sequence stopped");
    return "aborted";
  }

  private markStep(run: ScenarioRun, name: string): void {
    this.deps.logger.debug({ triggerNumber: run.triggerNumber, step: name }, "Scenario step");
    this.deps.store.withLock((record) => {
      if (this.activeRun === run) record.currentStep = name;
    });
  }

  private finish(run: ScenarioRun): void {
    if (this.activeRun !== run) return;
    this.activeRun = null;
    this.deps.store.withLock((record) => {
      record.scenarioRunning = false;
      record.activeTrigger = null;
      record.currentStep = null;
    });
  }

  private cancelFlicker(): void {
    this.flickerToken?.cancel();
    this.flickerToken = null;
  }

  private async portalCall(
    label: string,
    call: () => Promise<DeviceResult<PortalState>>,
  ): Promise<DeviceResult<PortalState>> {
    const result = await call();
    recordPortalResult(this.deps.store, result);
    if (!result.ok) {
      this.deps.logger.warn({ device: "portal", call: label, reason: result.reason }, result.message);
    }
    return result;
  }

  private async lightingCall(label: string, call: () => Promise<DeviceResult>): Promise<DeviceResult> {
    const result = await call();
    recordLightingResult(this.deps.store, result);
    if (!result.ok) {
      this.deps.logger.warn({ device: "lighting", call: label, reason: result.reason }, result.message);
    }
    return result;
  }
}
