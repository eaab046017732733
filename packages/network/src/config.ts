/**
 * Configuration from the environment
 */

import { Result } from "better-result";
import { ValidationError } from "@hostnet/errors";
import { type LogLevel, isLogLevel } from "@hostnet/logger";

export interface HostNetConfig {
  /** Bound on blocking link-up waits */
  upTimeoutMs: number;
  /** Bond names are this prefix followed by digits */
  bondPrefix: string;
  /** Autostart network definitions of the virtualization control plane */
  autostartDir: string;
  /** File name prefix of the definitions we own */
  autostartPrefix: string;
  sysfsNet: string;
  defaultMtu: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: HostNetConfig = {
  upTimeoutMs: 2000,
  bondPrefix: "bond",
  autostartDir: "/etc/libvirt/qemu/networks/autostart",
  autostartPrefix: "hostnet-",
  sysfsNet: "/sys/class/net",
  defaultMtu: 1500,
  logLevel: "info",
};

type Env = Record<string, string | undefined>;

function parsePositiveInt(
  name: string,
  value: string | undefined,
  fallback: number
): Result<number, ValidationError> {
  if (!value) {
    return Result.ok(fallback);
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return Result.err(new ValidationError({ message: `${name} must be a positive integer`, entity: name }));
  }

  return Result.ok(parsed);
}

export function loadConfig(env: Env = process.env): Result<HostNetConfig, ValidationError> {
  const upTimeoutMs = parsePositiveInt("HOSTNET_UP_TIMEOUT_MS", env.HOSTNET_UP_TIMEOUT_MS, DEFAULT_CONFIG.upTimeoutMs);
  if (upTimeoutMs.isErr()) {
    return Result.err(upTimeoutMs.error);
  }

  const defaultMtu = parsePositiveInt("HOSTNET_DEFAULT_MTU", env.HOSTNET_DEFAULT_MTU, DEFAULT_CONFIG.defaultMtu);
  if (defaultMtu.isErr()) {
    return Result.err(defaultMtu.error);
  }

  const logLevel = env.HOSTNET_LOG_LEVEL || DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    return Result.err(
      new ValidationError({
        message: "HOSTNET_LOG_LEVEL must be one of debug, info, warn, error",
        entity: "HOSTNET_LOG_LEVEL",
      })
    );
  }

  const bondPrefix = env.HOSTNET_BOND_PREFIX || DEFAULT_CONFIG.bondPrefix;
  if (!/^[a-zA-Z]+$/.test(bondPrefix)) {
    return Result.err(
      new ValidationError({ message: "HOSTNET_BOND_PREFIX must be letters only", entity: "HOSTNET_BOND_PREFIX" })
    );
  }

  return Result.ok({
    upTimeoutMs: upTimeoutMs.unwrap(),
    bondPrefix,
    autostartDir: env.HOSTNET_AUTOSTART_DIR || DEFAULT_CONFIG.autostartDir,
    autostartPrefix: env.HOSTNET_AUTOSTART_PREFIX || DEFAULT_CONFIG.autostartPrefix,
    sysfsNet: env.HOSTNET_SYSFS_NET || DEFAULT_CONFIG.sysfsNet,
    defaultMtu: defaultMtu.unwrap(),
    logLevel,
  });
}
