import axios from "axios";

export type DeviceFailureReason = "timeout" | "unreachable" | "bad-response";

export type DeviceResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; reason: DeviceFailureReason; message: string };

export function success<T>(value: T): DeviceResult<T> {
  return { ok: true, value };
}

export function failure<T>(reason: DeviceFailureReason, message: string): DeviceResult<T> {
  return { ok: false, reason, message };
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export function describeFailure<T>(error: unknown): DeviceResult<T> {
  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) return failure("timeout", error.message);
    if (error.response) {
      return failure("bad-response", `HTTP ${error.response.status}`);
    }
    return failure("unreachable", error.message);
  }
  if (error instanceof Error) return failure("unreachable", error.message);
  return failure("unreachable", "Unknown error");
}
