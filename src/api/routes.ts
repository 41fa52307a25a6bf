import type { FastifyInstance, FastifyReply } from "fastify";
import type { SceneMap } from "../config/types.js";
import type { EventIntake } from "../core/event-intake.js";
import { recordLightingResult, recordPortalResult } from "../core/liveness.js";
import type { ScenarioMachine } from "../core/scenario-machine.js";
import type { StatusStore } from "../core/status-store.js";
import type { VisitorStore } from "../core/visitor-store.js";
import type { LightingDevice } from "../devices/lighting-client.js";
import type { PortalDevice } from "../devices/portal-client.js";

export type RouteDeps = {
  store: StatusStore;
  intake: Pick<EventIntake, "submit">;
  machine: Pick<ScenarioMachine, "abort" | "resetCooldown" | "startFlicker">;
  portal: PortalDevice;
  lighting: LightingDevice;
  scenes: SceneMap;
  visitors: Pick<VisitorStore, "get" | "add" | "reset">;
};

type PortalCommand = "red" | "green" | "reset";

function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return "Unknown error";
}

export function parseVisitorIncrement(body: unknown): number | string {
  if (body === undefined || body === null) return 1;
  if (typeof body !== "object") return "Body must be a JSON object";
  if (!("count" in body) || body.count === undefined) return 1;
  const { count } = body;
  if (typeof count !== "number" || !Number.isSafeInteger(count) || count < 1) {
    return "Count must be a positive integer";
  }
  return count;
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { store } = deps;

  app.get("/health", async () => ({ ok: true }));

  app.get("/api/status", async () => store.read());

  app.post("/api/scenario/trigger", async (_request, reply) => {
    const admission = deps.intake.submit({ origin: "manual", source: "api" });
    if (admission.admitted) {
      reply.code(202);
      return { accepted: true, triggerNumber: admission.triggerNumber };
    }
    if (admission.reason === "cooldown") {
      reply.header("Retry-After", String(Math.max(1, Math.ceil(admission.cooldownRemainingSeconds))));
      reply.code(429);
      return {
        error: `Cooldown active. Wait ${admission.cooldownRemainingSeconds}s`,
        reason: admission.reason,
        retryAfterSeconds: admission.cooldownRemainingSeconds,
      };
    }
    reply.code(409);
    return { error: "Scenario is already running", reason: admission.reason };
  });

  app.post("/api/scenario/reset", async () => {
    const stopped = deps.machine.abort();
    const [portal, lights] = await Promise.all([
      deps.portal.reset(),
      deps.lighting.activateScene(deps.scenes["lights-on"]),
    ]);
    recordPortalResult(store, portal);
    recordLightingResult(store, lights);
    if (!portal.ok) app.log.warn({ reason: portal.reason }, `Portal reset failed: ${portal.message}`);
    if (!lights.ok) app.log.warn({ reason: lights.reason }, `Lights-on scene failed: ${lights.message}`);
    return {
      stopped,
      portalRestored: portal.ok,
      lightsRestored: lights.ok,
      message: stopped ? "Scenario stopped and reset" : "Scenario reset",
    };
  });

  app.post("/api/cooldown/reset", async () => {
    deps.machine.resetCooldown();
    return { message: "Cooldown timer reset", state: store.state() };
  });

  app.post("/api/auto-trigger/toggle", async () => {
    const autoTriggerEnabled = store.withLock((record) => {
      record.autoTriggerEnabled = !record.autoTriggerEnabled;
      return record.autoTriggerEnabled;
    });
    app.log.info({ autoTriggerEnabled }, "Auto-trigger toggled");
    return { autoTriggerEnabled };
  });

  app.get("/api/portal/state", async (_request, reply) => {
    const result = await deps.portal.getState();
    recordPortalResult(store, result);
    if (!result.ok) {
      reply.code(503);
      return { error: "Failed to get portal state", reason: result.reason };
    }
    return { state: result.value };
  });

  const portalCommands: Record<PortalCommand, () => ReturnType<PortalDevice["reset"]>> = {
    red: () => deps.portal.forceRed(),
    green: () => deps.portal.forceGreen(),
    reset: () => deps.portal.reset(),
  };

  for (const [command, call] of Object.entries(portalCommands)) {
    app.post(`/api/portal/${command}`, async (_request, reply) => {
      const result = await call();
      recordPortalResult(store, result);
      if (!result.ok) {
        reply.code(503);
        return { error: `Portal ${command} failed`, reason: result.reason };
      }
      return { state: result.value };
    });
  }

  const activateScene = async (name: string, reply: FastifyReply) => {
    const entityId = Object.hasOwn(deps.scenes, name) ? deps.scenes[name] : undefined;
    if (!entityId) {
      reply.code(400);
      return { error: `Unknown scene: ${name}` };
    }
    const result = await deps.lighting.activateScene(entityId);
    recordLightingResult(store, result);
    if (!result.ok) {
      reply.code(503);
      return { error: `Scene ${name} failed`, reason: result.reason };
    }
    return { scene: name, entityId };
  };

  app.post("/api/lighting/on", async (_request, reply) => activateScene("lights-on", reply));

  app.post("/api/lighting/off", async (_request, reply) => activateScene("lights-off", reply));

  app.post<{ Params: { name: string } }>("/api/lighting/scene/:name", async (request, reply) =>
    activateScene(request.params.name, reply),
  );

  app.post("/api/lighting/flicker", async (_request, reply) => {
    const flicker = deps.machine.startFlicker();
    if (!flicker.started) {
      reply.code(409);
      return { error: "A scenario or flicker effect is already running" };
    }
    reply.code(202);
    return { message: "Flicker effect started" };
  });

  app.get("/api/visitors", async () => ({ visitorCount: deps.visitors.get() }));

  app.post("/api/visitors/add", async (request, reply) => {
    const count = parseVisitorIncrement(request.body);
    if (typeof count === "string") {
      reply.code(400);
      return { error: count };
    }
    try {
      const visitorCount = await deps.visitors.add(count);
      app.log.info({ added: count, visitorCount }, "Visitors added");
      return { visitorCount, added: count };
    } catch (error) {
      reply.code(500);
      return { error: asErrorMessage(error) };
    }
  });

  app.post("/api/visitors/reset", async (_request, reply) => {
    try {
      await deps.visitors.reset();
      return { visitorCount: 0 };
    } catch (error) {
      reply.code(500);
      return { error: asErrorMessage(error) };
    }
  });
}
