import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { registerRoutes } from "./api/routes.js";
import type { RouteDeps } from "./api/routes.js";
import type { LivenessMonitor } from "./core/liveness.js";
import type { Logger } from "./logger.js";
import type { Reply, WsHub } from "./ws/hub.js";
import type { ClientEvent } from "./ws/protocol.js";

export type AppDeps = RouteDeps & {
  logger: Logger;
  wsHub: WsHub;
  liveness: Pick<LivenessMonitor, "pingPortal" | "pingLighting">;
};

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({ loggerInstance: deps.logger });
  await app.register(cors, { origin: true });
  await app.register(websocket);

  await registerRoutes(app, deps);

  const handleClientEvent = async (event: ClientEvent, reply: Reply): Promise<void> => {
    switch (event.type) {
      case "pingPortal":
        reply({ type: "portalPingResponse", payload: await deps.liveness.pingPortal() });
        break;
      case "pingLighting":
        reply({ type: "lightingPingResponse", payload: await deps.liveness.pingLighting() });
        break;
    }
  };

  app.get("/ws", { websocket: true }, (socket) => {
    deps.wsHub.addClient(socket, (event, reply) => {
      handleClientEvent(event, reply).catch((error: unknown) => {
        app.log.error({ err: error, event: event.type }, "WebSocket event failed");
      });
    });
    deps.wsHub.send(socket, { type: "status", payload: deps.store.read() });
  });

  return app;
}
