import type { LightingPingResponse, PortalPingResponse } from "../core/liveness.js";
import type { ScenarioStatus } from "../core/status-store.js";

export type ServerEvent =
  | { type: "status"; payload: ScenarioStatus }
  | { type: "portalPingResponse"; payload: PortalPingResponse }
  | { type: "lightingPingResponse"; payload: LightingPingResponse };

export type ClientEvent = { type: "pingPortal" } | { type: "pingLighting" };

export function parseClientEvent(raw: string): ClientEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("type" in parsed)) return null;
  switch (parsed.type) {
    case "pingPortal":
      return { type: "pingPortal" };
    case "pingLighting":
      return { type: "pingLighting" };
    default:
      return null;
  }
}
