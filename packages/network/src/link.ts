/**
 * Link: per-device up/down and property queries.
 *
 * A device is either a kernel netdev or a poll-mode device. The kind is
 * resolved once when the handle is opened and each operation goes through
 * the strategy for that kind. Nothing is cached: every query re-reads the
 * driver, since kernel state changes underneath us.
 */

import { customAlphabet } from "nanoid";
import { Result } from "better-result";
import type { DriverError, TimeoutError } from "@hostnet/errors";
import { type Logger, silentLogger } from "@hostnet/logger";
import { waitForEvent } from "@hostnet/resilience";
import type { LinkControlDriver } from "./drivers";
import {
  IFF_PROMISC,
  IFF_RUNNING,
  IFF_UP,
  type DeviceKind,
  type LinkEvent,
  type LinkProperties,
  type LinkState,
} from "./types";

export const DEFAULT_UP_TIMEOUT_MS = 2000;

export interface LinkOptions {
  /** Virtual function index; addresses are then set on the VF */
  vfIndex?: number;
  /** Bound on blocking `up` waits (default: 2000) */
  upTimeoutMs?: number;
  /** Aborts a blocking `up` wait */
  signal?: AbortSignal;
  logger?: Logger;
}

interface LinkStrategy {
  /** Whether `up` can block on kernel link events */
  blockingUp: boolean;
  setState(driver: LinkControlDriver, device: string, state: LinkState): Promise<Result<void, DriverError>>;
  query(driver: LinkControlDriver, device: string): Promise<Result<LinkProperties, DriverError>>;
  operUp(driver: LinkControlDriver, device: string): Promise<Result<boolean, DriverError>>;
  exists(driver: LinkControlDriver, device: string, logger: Logger): Promise<boolean>;
}

const STRATEGIES: Record<DeviceKind, LinkStrategy> = {
  kernel: {
    blockingUp: true,
    setState: (driver, device, state) => driver.setState(device, state),
    query: (driver, device) => driver.query(device),
    operUp: async (driver, device) => {
      const properties = await driver.query(device);
      if (properties.isErr()) {
        return Result.err(properties.error);
      }
      return Result.ok(isLinkUp(properties.unwrap().flags, true));
    },
    exists: (driver, device) => driver.exists(device),
  },
  "poll-mode": {
    blockingUp: false,
    setState: (driver, device, state) => driver.pollMode.setState(device, state),
    query: (driver, device) => driver.pollMode.query(device),
    operUp: (driver, device) => driver.pollMode.operUp(device),
    exists: async (driver, device, logger) => {
      const devices = await driver.pollMode.listDevices();
      if (devices.isErr()) {
        logger.warn("Failed to list poll-mode devices", {
          device,
          error: devices.error.message,
        });
        return false;
      }
      return devices.unwrap().includes(device);
    },
  },
};

/**
 * Interpret interface flags. Administrative state is IFF_UP; operational
 * state additionally needs IFF_RUNNING.
 */
export function isLinkUp(flags: number, checkOperStatus: boolean): boolean {
  const adminUp = (flags & IFF_UP) !== 0;
  if (!checkOperStatus) {
    return adminUp;
  }
  return adminUp && (flags & IFF_RUNNING) !== 0;
}

export class Link {
  readonly kind: DeviceKind;
  private readonly strategy: LinkStrategy;
  private readonly upTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    readonly device: string,
    private readonly driver: LinkControlDriver,
    private readonly options: LinkOptions = {}
  ) {
    this.kind = driver.pollMode.isPollModeDevice(device) ? "poll-mode" : "kernel";
    this.strategy = STRATEGIES[this.kind];
    this.upTimeoutMs = options.upTimeoutMs ?? DEFAULT_UP_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  get vfIndex(): number | undefined {
    return this.options.vfIndex;
  }

  /**
   * Set the link UP.
   *
   * With `adminBlocking`, return only once the administrative state is
   * observed UP; with `operBlocking` as well, once the link is operational.
   * Poll-mode devices come up atomically in their driver and never block.
   */
  async up(
    adminBlocking = true,
    operBlocking = false
  ): Promise<Result<void, DriverError | TimeoutError>> {
    if (!this.strategy.blockingUp || !adminBlocking) {
      return this.strategy.setState(this.driver, this.device, "up");
    }

    const target = operBlocking ? "operational" : "administrative";
    this.logger.debug("Waiting for link up", { device: this.device, target });

    return waitForEvent<LinkEvent, DriverError>({
      subscribe: (listener) => this.driver.subscribe(this.device, listener),
      act: () => this.strategy.setState(this.driver, this.device, "up"),
      until: (event) => isLinkUp(event.flags, operBlocking),
      reached: async () => {
        const properties = await this.properties();
        return properties.isOk() && isLinkUp(properties.unwrap().flags, operBlocking);
      },
      timeoutMs: this.upTimeoutMs,
      signal: this.options.signal,
      message: `Link ${this.device} did not reach ${target} up state within ${this.upTimeoutMs}ms`,
    });
  }

  down(): Promise<Result<void, DriverError>> {
    return this.strategy.setState(this.driver, this.device, "down");
  }

  properties(): Promise<Result<LinkProperties, DriverError>> {
    return this.strategy.query(this.driver, this.device);
  }

  /**
   * "Up" means administratively enabled; operational state may flap
   * independently of intent.
   */
  isUp(): Promise<Result<boolean, DriverError>> {
    return this.isAdminUp();
  }

  async isAdminUp(): Promise<Result<boolean, DriverError>> {
    return this.flagSet((flags) => isLinkUp(flags, false));
  }

  isOperUp(): Promise<Result<boolean, DriverError>> {
    return this.strategy.operUp(this.driver, this.device);
  }

  async isPromisc(): Promise<Result<boolean, DriverError>> {
    return this.flagSet((flags) => (flags & IFF_PROMISC) !== 0);
  }

  exists(): Promise<boolean> {
    return this.strategy.exists(this.driver, this.device, this.logger);
  }

  async address(): Promise<Result<string, DriverError>> {
    const properties = await this.properties();
    if (properties.isErr()) {
      return Result.err(properties.error);
    }
    return Result.ok(properties.unwrap().address);
  }

  setAddress(address: string): Promise<Result<void, DriverError>> {
    return this.driver.setAddress(this.device, address, this.options.vfIndex);
  }

  async mtu(): Promise<Result<number, DriverError>> {
    const properties = await this.properties();
    if (properties.isErr()) {
      return Result.err(properties.error);
    }
    return Result.ok(properties.unwrap().mtu);
  }

  private async flagSet(
    test: (flags: number) => boolean
  ): Promise<Result<boolean, DriverError>> {
    const properties = await this.properties();
    if (properties.isErr()) {
      return Result.err(properties.error);
    }
    return Result.ok(test(properties.unwrap().flags));
  }
}

/**
 * Open a handle for `device`
 */
export function openLink(
  device: string,
  driver: LinkControlDriver,
  options: LinkOptions = {}
): Link {
  return new Link(device, driver, options);
}

export type LinkFactory = (device: string) => Link;

const DIGITS = "0123456789";
const NAME_CHARS = DIGITS + "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

/**
 * Device name with the given prefix and a random suffix, bounded by
 * IFNAMSIZ (16 including the terminator).
 */
export function randomIfaceName(prefix = "", maxLength = 15, digitOnly = false): string {
  const size = maxLength - prefix.length;
  if (size <= 0) {
    return prefix.slice(0, maxLength);
  }
  return prefix + customAlphabet(digitOnly ? DIGITS : NAME_CHARS, size)();
}
