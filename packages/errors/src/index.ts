/* eslint-disable no-redeclare */
import { TaggedError } from "better-result";

// A NIC (or bond) is already claimed by another network or bond
export const UsedDeviceError = TaggedError("UsedDeviceError")<{
  message: string;
  device: string;
  owner: string;
  deviceType: "nic" | "bond";
}>();

export type UsedDeviceError = InstanceType<typeof UsedDeviceError>;

// Bond name does not follow the platform naming convention
export const InvalidNameError = TaggedError("InvalidNameError")<{
  message: string;
  bondName: string;
}>();

export type InvalidNameError = InstanceType<typeof InvalidNameError>;

// Malformed or contradictory change-set attributes
export const ValidationError = TaggedError("ValidationError")<{
  message: string;
  entity?: string;
}>();

export type ValidationError = InstanceType<typeof ValidationError>;

// Underlying link/route/device command failed
export const DriverError = TaggedError("DriverError")<{
  message: string;
  device?: string;
  operation: string;
  cause?: unknown;
}>();

export type DriverError = InstanceType<typeof DriverError>;

// Blocking wait exceeded its bound
export const TimeoutError = TaggedError("TimeoutError")<{
  message: string;
}>();

export type TimeoutError = InstanceType<typeof TimeoutError>;

// Device, rule or routing table could not be located
export const NotFoundError = TaggedError("NotFoundError")<{
  message: string;
  device?: string;
}>();

export type NotFoundError = InstanceType<typeof NotFoundError>;

export interface Drift {
  entity: "network" | "bond";
  name: string;
  field: string;
  expected: unknown;
  actual: unknown;
}

// Running config and live state disagree after apply
export const VerificationError = TaggedError("VerificationError")<{
  message: string;
  drifts: Drift[];
}>();

export type VerificationError = InstanceType<typeof VerificationError>;

// An inverse step failed while unwinding a transaction
export const RollbackError = TaggedError("RollbackError")<{
  message: string;
  step: string;
  cause: DriverError | TimeoutError | NotFoundError;
}>();

export type RollbackError = InstanceType<typeof RollbackError>;

// Union type for all hostnet errors
export type HostnetError =
  | UsedDeviceError
  | InvalidNameError
  | ValidationError
  | DriverError
  | TimeoutError
  | NotFoundError
  | VerificationError
  | RollbackError;

export type ErrorCode =
  | "ERR_USED_NIC"
  | "ERR_USED_BOND"
  | "ERR_BAD_BONDING"
  | "ERR_BAD_PARAMS"
  | "ERR_BAD_NIC"
  | "ERR_DRIVER"
  | "ERR_TIMEOUT"
  | "ERR_NOT_FOUND"
  | "ERR_VERIFICATION"
  | "ERR_ROLLBACK";

/**
 * Get the stable error code reported to callers for an error
 */
export function getErrorCode(error: HostnetError): ErrorCode {
  switch (error._tag) {
    case "UsedDeviceError":
      return error.deviceType === "bond" ? "ERR_USED_BOND" : "ERR_USED_NIC";
    case "InvalidNameError":
      return "ERR_BAD_BONDING";
    case "ValidationError":
      return "ERR_BAD_PARAMS";
    case "NotFoundError":
      return error.device ? "ERR_BAD_NIC" : "ERR_NOT_FOUND";
    case "TimeoutError":
      return "ERR_TIMEOUT";
    case "VerificationError":
      return "ERR_VERIFICATION";
    case "RollbackError":
      return "ERR_ROLLBACK";
    case "DriverError":
    default:
      return "ERR_DRIVER";
  }
}

/**
 * Format a drift entry as a single human-readable line
 */
export function formatDrift(drift: Drift): string {
  return `${drift.entity} ${drift.name}: ${drift.field} expected ${JSON.stringify(
    drift.expected
  )}, got ${JSON.stringify(drift.actual)}`;
}
