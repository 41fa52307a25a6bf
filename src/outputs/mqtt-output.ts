import type { ScenarioStatus } from "../core/status-store.js";
import type { MqttBus } from "../bus/mqtt-bus.js";
import type { StatusOutput } from "./output.js";

/** Mirrors the status snapshot to a retained `<base>/status` topic. */
export class MqttStatusOutput implements StatusOutput {
  readonly id = "mqtt";
  readonly topic: string;

  constructor(
    private readonly bus: Pick<MqttBus, "publishRetained">,
    baseTopic: string,
  ) {
    this.topic = `${baseTopic}/status`;
  }

  push(status: ScenarioStatus): void {
    this.bus.publishRetained(this.topic, JSON.stringify(status));
  }
}
