import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type {
  FlickerDefinition,
  FlickerStep,
  LogLevel,
  RuntimeConfig,
  ScenarioDefinition,
  SceneMap,
} from "./types.js";

type Env = Record<string, string | undefined>;

// Upper bound on how long a cancelled flicker can keep running.
const MAX_POLL_INTERVAL_MS = 1000;

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value && value.length > 0 ? value : undefined;
}

function requiredString(env: Env, key: string): string {
  const value = optionalString(env, key);
  if (!value) throw new ConfigError(`${key} must be set`);
  return value;
}

function integer(env: Env, key: string, fallback: number, min: number): number {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return parsed;
}

function baseUrl(env: Env, key: string, fallback?: string): string {
  const raw = fallback === undefined ? requiredString(env, key) : optionalString(env, key) ?? fallback;
  try {
    const url = new URL(raw);
    return url.toString().replace(/\/+$/, "");
  } catch {
    throw new ConfigError(`${key} is not a valid URL: "${raw}"`);
  }
}

function logLevel(env: Env): LogLevel {
  if (env.SCENARIO_DEBUG === "1") return "debug";
  const raw = optionalString(env, "LOG_LEVEL") ?? "info";
  const match = LOG_LEVELS.find((level) => level === raw);
  if (!match) throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
  return match;
}

function parseFlickerStep(value: unknown, index: number): FlickerStep {
  if (!isRecord(value)) throw new ConfigError(`flicker.pattern[${index}] must be an object`);
  const { brightness, holdMs, transitionMs } = value;
  if (typeof brightness !== "number" || !Number.isInteger(brightness) || brightness < 0 || brightness > 255) {
    throw new ConfigError(`flicker.pattern[${index}].brightness must be an integer 0-255`);
  }
  if (typeof holdMs !== "number" || !Number.isFinite(holdMs) || holdMs <= 0) {
    throw new ConfigError(`flicker.pattern[${index}].holdMs must be a positive number`);
  }
  if (transitionMs !== undefined && (typeof transitionMs !== "number" || transitionMs < 0)) {
    throw new ConfigError(`flicker.pattern[${index}].transitionMs must be a non-negative number`);
  }
  return transitionMs === undefined ? { brightness, holdMs } : { brightness, holdMs, transitionMs };
}

function parseFlicker(value: unknown): FlickerDefinition {
  if (!isRecord(value)) throw new ConfigError("flicker must be an object");
  const { entityId, cycles, pollIntervalMs, pattern } = value;
  if (typeof entityId !== "string" || entityId.length === 0) {
    throw new ConfigError("flicker.entityId must be a non-empty string");
  }
  if (typeof cycles !== "number" || !Number.isInteger(cycles) || cycles < 1) {
    throw new ConfigError("flicker.cycles must be a positive integer");
  }
  const poll = pollIntervalMs ?? 100;
  if (typeof poll !== "number" || poll <= 0 || poll > MAX_POLL_INTERVAL_MS) {
    throw new ConfigError(`flicker.pollIntervalMs must be between 1 and ${MAX_POLL_INTERVAL_MS}`);
  }
  if (!Array.isArray(pattern) || pattern.length === 0) {
    throw new ConfigError("flicker.pattern must be a non-empty array");
  }
  return {
    entityId,
    cycles,
    pollIntervalMs: poll,
    pattern: pattern.map((step: unknown, index) => parseFlickerStep(step, index)),
  };
}

function parseScenes(value: unknown): SceneMap {
  if (!isRecord(value)) throw new ConfigError("scenes must be an object");
  const entries: Record<string, string> = {};
  for (const [name, entityId] of Object.entries(value)) {
    if (typeof entityId !== "string" || entityId.length === 0) {
      throw new ConfigError(`scenes.${name} must be a scene entity id`);
    }
    entries[name] = entityId;
  }
  const lightsOff = entries["lights-off"];
  const lightsOn = entries["lights-on"];
  if (!lightsOff || !lightsOn) {
    throw new ConfigError('scenes must define "lights-off" and "lights-on"');
  }
  return { ...entries, "lights-off": lightsOff, "lights-on": lightsOn };
}

export function parseScenarioDefinition(raw: unknown): ScenarioDefinition {
  if (!isRecord(raw)) throw new ConfigError("Scenario definition must be a JSON object");
  return { scenes: parseScenes(raw.scenes), flicker: parseFlicker(raw.flicker) };
}

async function readJsonFile(fullPath: string): Promise<unknown> {
  const raw = await readFile(fullPath, "utf8");
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ConfigError(`${fullPath} is not valid JSON: ${message}`);
  }
}

export async function loadRuntimeConfig(env: Env = process.env, cwd = process.cwd()): Promise<RuntimeConfig> {
  const scenarioFile = resolve(cwd, optionalString(env, "SCENARIO_FILE") ?? "data/scenario.json");
  const scenario = parseScenarioDefinition(await readJsonFile(scenarioFile));

  return {
    port: integer(env, "PORT", 3000, 0),
    host: optionalString(env, "HOST") ?? "0.0.0.0",
    logLevel: logLevel(env),
    cooldownSeconds: integer(env, "COOLDOWN_SECONDS", 30, 0),
    visitorsFile: resolve(cwd, optionalString(env, "VISITORS_FILE") ?? "data/visitors.json"),
    bus: {
      brokerUrl: requiredString(env, "MQTT_BROKER_URL"),
      username: optionalString(env, "MQTT_USERNAME"),
      password: optionalString(env, "MQTT_PASSWORD"),
      clientId: optionalString(env, "MQTT_CLIENT_ID"),
      personTopic: optionalString(env, "PERSON_TOPIC") ?? "frigate/entrance/person",
      portalStateTopic: optionalString(env, "PORTAL_STATE_TOPIC") ?? "portal/state",
      statusBaseTopic: optionalString(env, "STATUS_BASE_TOPIC") ?? "portal-scenario",
    },
    devices: {
      portalUrl: baseUrl(env, "PORTAL_URL", "http://portal.local"),
      lightingUrl: baseUrl(env, "LIGHTING_URL"),
      lightingToken: requiredString(env, "LIGHTING_TOKEN"),
      timeoutMs: integer(env, "DEVICE_TIMEOUT_MS", 5000, 1),
      probeTimeoutMs: integer(env, "PROBE_TIMEOUT_MS", 3000, 1),
      healthIntervalMs: integer(env, "HEALTH_INTERVAL_MS", 15000, 0),
    },
    scenario,
  };
}
