import axios from "axios";
import type { AxiosInstance } from "axios";
import { describeFailure, failure, success } from "./device-result.js";
import type { DeviceResult } from "./device-result.js";

export function createLightingHttp(baseURL: string, token: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL: `${baseURL}/api`,
    timeout: timeoutMs,
    headers: {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json",
    },
  });
}

function clampBrightness(level: number): number {
  if (!Number.isFinite(level) || level <= 0) return 0;
  if (level >= 255) return 255;
  return Math.round(level);
}

export class LightingClient {
  constructor(private readonly http: AxiosInstance) {}

  activateScene(sceneEntityId: string): Promise<DeviceResult> {
    return this.callService("scene", "turn_on", { entity_id: sceneEntityId });
  }

  /** Brightness 0 turns the light off; `transitionMs` is sent in seconds. */
  setBrightness(entityId: string, level: number, transitionMs = 0): Promise<DeviceResult> {
    const brightness = clampBrightness(level);
    const transition = transitionMs > 0 ? { transition: transitionMs / 1000 } : {};
    if (brightness === 0) {
      return this.callService("light", "turn_off", { entity_id: entityId, ...transition });
    }
    return this.callService("light", "turn_on", { entity_id: entityId, brightness, ...transition });
  }

  async checkHealth(): Promise<DeviceResult> {
    try {
      const response = await this.http.get<unknown>("/");
      const body: unknown = response.data;
      if (typeof body === "object" && body !== null && "message" in body && body.message === "API running.") {
        return success(undefined);
      }
      return failure("bad-response", "Lighting controller did not report a running API");
    } catch (error) {
      return describeFailure(error);
    }
  }

  private async callService(domain: string, service: string, data: Record<string, unknown>): Promise<DeviceResult> {
    try {
      await this.http.post(`/services/${domain}/${service}`, data);
      return success(undefined);
    } catch (error) {
      return describeFailure(error);
    }
  }
}

export type LightingDevice = Pick<LightingClient, "activateScene" | "setBrightness" | "checkHealth">;
