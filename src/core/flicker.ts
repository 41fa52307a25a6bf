import type { FlickerDefinition } from "../config/types.js";
import type { DeviceResult } from "../devices/device-result.js";
import type { LightingDevice } from "../devices/lighting-client.js";
import type { Logger } from "../logger.js";
import type { CancellationToken, Clock } from "./clock.js";

export type FlickerOutcome = "completed" | "cancelled";

export type FlickerOptions = {
  definition: FlickerDefinition;
  lighting: Pick<LightingDevice, "setBrightness">;
  clock: Clock;
  token: CancellationToken;
  logger: Logger;
  onResult?: (result: DeviceResult) => void;
};

export function cycleDurationMs(definition: FlickerDefinition): number {
  return definition.pattern.reduce((sum, step) => sum + step.holdMs, 0);
}

async function holdUntil(deadline: number, options: FlickerOptions): Promise<boolean> {
  const { clock, token, definition } = options;
  for (let remaining = deadline - clock.now(); remaining > 0; remaining = deadline - clock.now()) {
    if (token.cancelled) return false;
    await clock.sleep(Math.min(definition.pollIntervalMs, remaining));
  }
  return !token.cancelled;
}

// Steps end at fixed offsets from the start; a slow call eats into its hold
// and a step whose end has already passed is skipped.
export async function runFlicker(options: FlickerOptions): Promise<FlickerOutcome> {
  const { definition, lighting, logger, clock } = options;
  let stepEnd = clock.now();
  for (let cycle = 0; cycle < definition.cycles; cycle += 1) {
    logger.debug({ cycle: cycle + 1, cycles: definition.cycles }, "Flicker cycle");
    for (const step of definition.pattern) {
      if (options.token.cancelled) return "cancelled";
      stepEnd += step.holdMs;
      if (clock.now() >= stepEnd) {
        logger.debug({ brightness: step.brightness }, "Flicker step skipped, behind schedule");
        continue;
      }
      const result = await lighting.setBrightness(definition.entityId, step.brightness, step.transitionMs ?? 0);
      if (!result.ok) {
        logger.warn({ entityId: definition.entityId, brightness: step.brightness, reason: result.reason }, result.message);
      }
      options.onResult?.(result);
      if (!(await holdUntil(stepEnd, options))) return "cancelled";
    }
  }
  return "completed";
}
