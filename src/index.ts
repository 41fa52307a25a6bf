import "dotenv/config";
import { buildApp } from "./app.js";
import { MqttBus } from "./bus/mqtt-bus.js";
import { ConfigError, loadRuntimeConfig } from "./config/load-config.js";
import type { RuntimeConfig } from "./config/types.js";
import { systemClock } from "./core/clock.js";
import { EventIntake } from "./core/event-intake.js";
import { LivenessMonitor, recordLightingResult, recordPortalResult } from "./core/liveness.js";
import { ScenarioMachine } from "./core/scenario-machine.js";
import { StatusPublisher } from "./core/status-publisher.js";
import { StatusStore } from "./core/status-store.js";
import { VisitorStore } from "./core/visitor-store.js";
import { LightingClient, createLightingHttp } from "./devices/lighting-client.js";
import { PortalClient, createPortalHttp } from "./devices/portal-client.js";
import { createLogger } from "./logger.js";
import { MqttStatusOutput } from "./outputs/mqtt-output.js";
import { WsHub } from "./ws/hub.js";

async function start(config: RuntimeConfig): Promise<void> {
  const logger = createLogger(config.logLevel);
  const clock = systemClock;
  const { devices } = config;

  const store = new StatusStore(config.cooldownSeconds, clock);
  const portal = new PortalClient(createPortalHttp(devices.portalUrl, devices.timeoutMs));
  const lighting = new LightingClient(createLightingHttp(devices.lightingUrl, devices.lightingToken, devices.timeoutMs));
  const liveness = new LivenessMonitor({
    store,
    portal: new PortalClient(createPortalHttp(devices.portalUrl, devices.probeTimeoutMs)),
    lighting: new LightingClient(
      createLightingHttp(devices.lightingUrl, devices.lightingToken, devices.probeTimeoutMs),
    ),
    clock,
    logger: logger.child({ component: "liveness" }),
  });

  const machine = new ScenarioMachine({
    store,
    portal,
    lighting,
    scenario: config.scenario,
    clock,
    logger: logger.child({ component: "scenario" }),
  });
  const intake = new EventIntake({
    store,
    machine,
    topics: config.bus,
    logger: logger.child({ component: "intake" }),
  });
  const bus = new MqttBus(config.bus, {
    store,
    onMessage: (topic, payload) => intake.handleBusMessage(topic, payload),
    logger: logger.child({ component: "bus" }),
  });

  const visitors = new VisitorStore(config.visitorsFile, store, logger.child({ component: "visitors" }));
  const visitorCount = await visitors.load();
  logger.info({ visitorCount }, "Visitor count loaded");

  const wsHub = new WsHub(logger.child({ component: "ws" }));
  const publisher = new StatusPublisher(
    [wsHub, new MqttStatusOutput(bus, config.bus.statusBaseTopic)],
    logger.child({ component: "publisher" }),
  );
  publisher.attach(store);

  const app = await buildApp({
    store,
    intake,
    machine,
    portal,
    lighting,
    scenes: config.scenario.scenes,
    visitors,
    logger,
    wsHub,
    liveness,
  });

  const [lightsOn, portalReset] = await Promise.all([
    lighting.activateScene(config.scenario.scenes["lights-on"]),
    portal.reset(),
  ]);
  recordLightingResult(store, lightsOn);
  recordPortalResult(store, portalReset);
  if (!lightsOn.ok) logger.warn({ reason: lightsOn.reason }, "Lighting controller unavailable at startup");
  if (!portalReset.ok) logger.warn({ reason: portalReset.reason }, "Portal unavailable at startup");

  liveness.start(devices.healthIntervalMs);
  publisher.startTicker(store);
  bus.connect();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    machine.shutdown();
    liveness.stop();
    publisher.stop();
    await bus.end();
    await app.close();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  process.on("unhandledRejection", (reason) => {
    logger.error({ err: reason }, "Unhandled rejection");
  });
  process.on("uncaughtException", (error) => {
    logger.fatal({ err: error }, "Uncaught exception");
    process.exit(1);
  });

  await app.listen({ port: config.port, host: config.host });
  logger.info(
    { cooldownSeconds: config.cooldownSeconds, personTopic: config.bus.personTopic },
    "Waiting for person detection or manual triggers",
  );
}

async function main(): Promise<void> {
  let config: RuntimeConfig;
  try {
    config = await loadRuntimeConfig();
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    createLogger("info").fatal(`Invalid configuration: ${error.message}`);
    process.exit(1);
  }
  await start(config);
}

main().catch((error: unknown) => {
  createLogger("info").fatal({ err: error }, "Startup failed");
  process.exit(1);
});
