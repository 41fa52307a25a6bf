import type { PortalState } from "../config/types.js";
import type { DeviceResult } from "../devices/device-result.js";
import type { LightingDevice } from "../devices/lighting-client.js";
import type { PortalDevice } from "../devices/portal-client.js";
import type { Logger } from "../logger.js";
import type { Clock } from "./clock.js";
import type { StatusStore } from "./status-store.js";

export type PortalPingResponse = {
  success: boolean;
  state?: PortalState;
  error?: string;
  timestamp: string;
};

export type LightingPingResponse = {
  success: boolean;
  error?: string;
  timestamp: string;
};

export function recordPortalResult(store: StatusStore, result: DeviceResult<PortalState>): void {
  store.withLock((record, now) => {
    record.portalOnline = result.ok;
    if (result.ok) {
      record.portalReportedState = result.value;
      record.portalLastUpdate = new Date(now).toISOString();
    }
  });
}

export function recordLightingResult(store: StatusStore, result: DeviceResult): void {
  store.withLock((record) => {
    record.haAvailable = result.ok;
  });
}

export class LivenessMonitor {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly deps: {
      store: StatusStore;
      portal: Pick<PortalDevice, "getState">;
      lighting: Pick<LightingDevice, "checkHealth">;
      clock: Clock;
      logger: Logger;
    },
  ) {}

  async pingPortal(): Promise<PortalPingResponse> {
    const result = await this.deps.portal.getState();
    recordPortalResult(this.deps.store, result);
    const timestamp = new Date(this.deps.clock.now()).toISOString();
    if (result.ok) return { success: true, state: result.value, timestamp };
    this.deps.logger.debug({ reason: result.reason }, `Portal ping failed: ${result.message}`);
    return { success: false, error: "Failed to connect to portal", timestamp };
  }

  async pingLighting(): Promise<LightingPingResponse> {
    const result = await this.deps.lighting.checkHealth();
    recordLightingResult(this.deps.store, result);
    const timestamp = new Date(this.deps.clock.now()).toISOString();
    if (result.ok) return { success: true, timestamp };
    this.deps.logger.debug({ reason: result.reason }, `Lighting ping failed: ${result.message}`);
    return { success: false, error: "Lighting controller not responding", timestamp };
  }

  async probeAll(): Promise<void> {
    await Promise.all([this.pingPortal(), this.pingLighting()]);
  }

  start(intervalMs: number): void {
    if (this.timer || intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.probeAll().catch((error: unknown) => {
        this.deps.logger.error({ err: error }, "Liveness probe failed");
      });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }
}
