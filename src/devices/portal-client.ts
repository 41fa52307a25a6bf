import axios from "axios";
import type { AxiosInstance } from "axios";
import type { PortalState } from "../config/types.js";
import { describeFailure, failure, success } from "./device-result.js";
import type { DeviceResult } from "./device-result.js";

type PortalCommand = "toggle" | "red" | "green" | "reset";

export function isPortalState(value: unknown): value is PortalState {
  return value === 1 || value === 2 || value === 3;
}

export function parsePortalState(raw: unknown): PortalState | null {
  const value = typeof raw === "string" ? Number(raw.trim()) : raw;
  return isPortalState(value) ? value : null;
}

export function createPortalHttp(baseURL: string, timeoutMs: number): AxiosInstance {
  return axios.create({ baseURL, timeout: timeoutMs });
}

// Every portal endpoint is a GET answering `{ state }`.
export class PortalClient {
  constructor(private readonly http: AxiosInstance) {}

  getState(): Promise<DeviceResult<PortalState>> {
    return this.request("/state");
  }

  toggle(): Promise<DeviceResult<PortalState>> {
    return this.command("toggle");
  }

  forceRed(): Promise<DeviceResult<PortalState>> {
    return this.command("red");
  }

  forceGreen(): Promise<DeviceResult<PortalState>> {
    return this.command("green");
  }

  reset(): Promise<DeviceResult<PortalState>> {
    return this.command("reset");
  }

  private command(command: PortalCommand): Promise<DeviceResult<PortalState>> {
    return this.request(`/${command}`);
  }

  private async request(path: string): Promise<DeviceResult<PortalState>> {
    try {
      const response = await this.http.get<unknown>(path);
      const body: unknown = response.data;
      const state = typeof body === "object" && body !== null && "state" in body ? parsePortalState(body.state) : null;
      if (state === null) {
        return failure("bad-response", `Unexpected portal response for ${path}`);
      }
      return success(state);
    } catch (error) {
      return describeFailure(error);
    }
  }
}

export type PortalDevice = Pick<PortalClient, "getState" | "toggle" | "forceRed" | "forceGreen" | "reset">;
