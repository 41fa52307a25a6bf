import { connect } from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import type { BusConfig } from "../config/types.js";
import type { StatusStore } from "../core/status-store.js";
import type { Logger } from "../logger.js";

type MessageHandler = (topic: string, payload: Buffer) => void;

function toClientOptions(config: BusConfig, availabilityTopic: string): IClientOptions {
  const options: IClientOptions = {
    reconnectPeriod: 5000,
    will: { topic: availabilityTopic, payload: Buffer.from("offline"), qos: 0, retain: true },
  };
  if (config.clientId) options.clientId = config.clientId;
  if (config.username) options.username = config.username;
  if (config.password) options.password = config.password;
  return options;
}

export class MqttBus {
  private client: MqttClient | null = null;
  private readonly retainedPayloadCache = new Map<string, string>();
  readonly availabilityTopic: string;

  constructor(
    private readonly config: BusConfig,
    private readonly deps: {
      store: StatusStore;
      onMessage: MessageHandler;
      logger: Logger;
    },
  ) {
    this.availabilityTopic = `${config.statusBaseTopic}/availability`;
  }

  connect(): void {
    if (this.client) return;
    const { config, deps } = this;
    const topics = [config.personTopic, config.portalStateTopic];
    deps.logger.info({ brokerUrl: config.brokerUrl, topics }, "Connecting to MQTT broker");

    const client = connect(config.brokerUrl, toClientOptions(config, this.availabilityTopic));
    this.client = client;

    client.on("connect", () => {
      this.setConnected(true);
      client.subscribe(topics, { qos: 0 }, (error) => {
        if (error) deps.logger.error({ err: error, topics }, "MQTT subscribe failed");
      });
      client.publish(this.availabilityTopic, "online", { qos: 0, retain: true });
      for (const [topic, payload] of this.retainedPayloadCache.entries()) {
        client.publish(topic, payload, { qos: 0, retain: true });
      }
      deps.logger.info({ topics }, "MQTT connected");
    });

    client.on("close", () => {
      this.setConnected(false);
    });

    client.on("offline", () => {
      this.setConnected(false);
      deps.logger.warn({ brokerUrl: config.brokerUrl }, "MQTT offline");
    });

    client.on("reconnect", () => {
      deps.logger.debug({ brokerUrl: config.brokerUrl }, "MQTT reconnecting");
    });

    client.on("message", (topic, payload) => {
      deps.onMessage(topic, payload);
    });

    client.on("error", (error) => {
      deps.logger.error({ brokerUrl: config.brokerUrl, message: error.message }, "MQTT client error");
    });
  }

  publishRetained(topic: string, payload: string): void {
    if (this.retainedPayloadCache.get(topic) === payload) return;
    this.retainedPayloadCache.set(topic, payload);
    if (this.client?.connected) {
      this.client.publish(topic, payload, { qos: 0, retain: true });
    }
  }

  async end(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    if (client.connected) {
      await client.publishAsync(this.availabilityTopic, "offline", { qos: 0, retain: true });
    }
    await client.endAsync();
    this.setConnected(false);
  }

  private setConnected(connected: boolean): void {
    this.deps.store.withLock((record) => {
      record.busConnected = connected;
    });
  }
}
