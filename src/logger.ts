import pino from "pino";
import type { FastifyBaseLogger } from "fastify";
import type { LogLevel } from "./config/types.js";

// Components log through the same pino instance Fastify uses for requests.
export type Logger = FastifyBaseLogger;

export function createLogger(level: LogLevel): Logger {
  return pino({ level, base: { service: "portal-scenario" } });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
