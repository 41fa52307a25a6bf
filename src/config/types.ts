export type PortalState = 1 | 2 | 3;

export const PORTAL_ROTATING: PortalState = 1;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type FlickerStep = {
  brightness: number;
  holdMs: number;
  transitionMs?: number;
};

export type FlickerDefinition = {
  entityId: string;
  cycles: number;
  pollIntervalMs: number;
  pattern: FlickerStep[];
};

export type SceneMap = {
  "lights-off": string;
  "lights-on": string;
  [name: string]: string;
};

export type ScenarioDefinition = {
  scenes: SceneMap;
  flicker: FlickerDefinition;
};

export type BusConfig = {
  brokerUrl: string;
  username?: string;
  password?: string;
  clientId?: string;
  personTopic: string;
  portalStateTopic: string;
  statusBaseTopic: string;
};

export type DeviceConfig = {
  portalUrl: string;
  lightingUrl: string;
  lightingToken: string;
  timeoutMs: number;
  probeTimeoutMs: number;
  healthIntervalMs: number;
};

export type RuntimeConfig = {
  port: number;
  host: string;
  logLevel: LogLevel;
  cooldownSeconds: number;
  visitorsFile: string;
  bus: BusConfig;
  devices: DeviceConfig;
  scenario: ScenarioDefinition;
};
