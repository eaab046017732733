/**
 * Source Route Manager
 *
 * Gives a device's address its own routing domain: a dedicated table
 * holding a default route via the device's gateway, plus rules steering
 * traffic from (and to, via the device) its subnet into that table.
 *
 * Records are held in memory, but removal also works without one (e.g.
 * after a restart) by discovering the rules that name the device.
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { Result } from "better-result";
import { DriverError, NotFoundError } from "@hostnet/errors";
import { type Logger, silentLogger } from "@hostnet/logger";
import type { RouteControlDriver, TopologyOracle } from "./drivers";
import type { LinkFactory } from "./link";
import { isIPv4, networkCidr, tableIdFor } from "./ipv4";
import type { Route, Rule } from "./types";

export interface SourceRouteRecord {
  device: string;
  address: string;
  mask: string;
  gateway: string;
  /** Subnet in CIDR form */
  network: string;
  table: number;
  routes: Route[];
  rules: Rule[];
}

export type SourceRouteRemoval =
  | { kind: "removed"; table?: number; routes: Route[]; rules: Rule[] }
  | { kind: "absent" };

export interface DiscoveredSourceRoute {
  table?: number;
  routes: Route[];
  rules: Rule[];
}

export interface SourceRouteManagerOptions {
  /** Directory holding autostart network definitions */
  autostartDir?: string;
  /** Only definitions whose file name starts with this are ours */
  autostartPrefix?: string;
  logger?: Logger;
}

const UNSPECIFIED_GATEWAY = "0.0.0.0";

/**
 * Build the routes and rules implementing policy routing for one address
 */
export function buildSourceRoute(
  device: string,
  address: string,
  mask: string,
  gateway: string
): SourceRouteRecord {
  const table = tableIdFor(address);
  const network = networkCidr(address, mask);
  return {
    device,
    address,
    mask,
    gateway,
    network,
    table,
    routes: [
      { network: "0.0.0.0/0", via: gateway, device, table },
      { network, src: address, device, table, scope: "link" },
    ],
    rules: [
      { source: network, table },
      { destination: network, srcDevice: device, table },
    ],
  };
}

export class SourceRouteManager {
  private readonly records = new Map<string, SourceRouteRecord>();
  private readonly autostartDir: string;
  private readonly autostartPrefix: string;
  private readonly logger: Logger;

  constructor(
    private readonly driver: RouteControlDriver,
    private readonly links: LinkFactory,
    private readonly oracle: TopologyOracle,
    options: SourceRouteManagerOptions = {}
  ) {
    this.autostartDir = options.autostartDir ?? "/etc/libvirt/qemu/networks/autostart";
    this.autostartPrefix = options.autostartPrefix ?? "hostnet-";
    this.logger = (options.logger ?? silentLogger).child({ component: "source-route" });
  }

  /**
   * Record currently held for a device, if any
   */
  record(device: string): SourceRouteRecord | undefined {
    return this.records.get(device);
  }

  /**
   * Configure source routing for `device`. Returns null (and logs) when
   * there is no usable address, mask or gateway.
   */
  async configure(
    device: string,
    address: string | undefined,
    mask: string | undefined,
    gateway: string | undefined
  ): Promise<Result<SourceRouteRecord | null, DriverError | NotFoundError>> {
    if (
      !gateway ||
      gateway === UNSPECIFIED_GATEWAY ||
      !address ||
      !mask ||
      !isIPv4(address) ||
      !isIPv4(gateway)
    ) {
      this.logger.error("ipaddr, mask or gateway not received", { device });
      return Result.ok(null);
    }

    if (!(await this.links(device).exists())) {
      return Result.err(
        new NotFoundError({
          message: `Cannot configure source route: device ${device} does not exist`,
          device,
        })
      );
    }

    let record: SourceRouteRecord;
    try {
      record = buildSourceRoute(device, address, mask, gateway);
    } catch (error) {
      this.logger.error("Invalid source route parameters", {
        device,
        mask,
        error: error instanceof Error ? error.message : String(error),
      });
      return Result.ok(null);
    }

    // one record per device: drop the previous one before installing
    if (this.records.has(device)) {
      const previous = await this.remove(device);
      if (previous.isErr()) {
        return Result.err(previous.error);
      }
    }

    this.logger.info("Configuring gateway", {
      device,
      ip: record.address,
      network: record.network,
      subnet: record.mask,
      gateway: record.gateway,
      table: record.table,
    });

    const installed = await this.driver.install(record.routes, record.rules, device);
    if (installed.isErr()) {
      this.logger.error("Source route configuration failed", {
        device,
        error: installed.error.message,
      });
      return Result.err(installed.error);
    }

    this.records.set(device, record);
    return Result.ok(record);
  }

  /**
   * Remove source routing for `device`: from the held record when present,
   * otherwise by discovering the device's rules and table.
   */
  async remove(device: string): Promise<Result<SourceRouteRemoval, DriverError>> {
    const record = this.records.get(device);
    if (record) {
      const removed = await this.driver.remove(record.routes, record.rules, device);
      if (removed.isErr()) {
        return Result.err(removed.error);
      }
      this.records.delete(device);
      return Result.ok({
        kind: "removed",
        table: record.table,
        routes: record.routes,
        rules: record.rules,
      });
    }

    this.logger.info("Removing gateway", { device });

    const discovered = await this.discover(device);
    if (discovered.isErr()) {
      return Result.err(discovered.error);
    }
    const found = discovered.unwrap();
    if (!found) {
      return Result.ok({ kind: "absent" });
    }

    const removed = await this.driver.remove(found.routes, found.rules, device);
    if (removed.isErr()) {
      this.logger.error("Source route removal failed", {
        device,
        error: removed.error.message,
      });
      return Result.err(removed.error);
    }
    return Result.ok({ kind: "removed", ...found });
  }

  /**
   * Reinstall what a removal took away. Restores nothing for `absent`.
   */
  async restore(
    device: string,
    removal: SourceRouteRemoval
  ): Promise<Result<void, DriverError>> {
    if (removal.kind === "absent") {
      return Result.ok(undefined);
    }
    return this.driver.install(removal.routes, removal.rules, device);
  }

  /**
   * Find the rules and routes a previous `configure` installed for `device`.
   *
   *   32764: from all to 10.35.0.0/23 iif net1 lookup 170066177
   *   32765: from 10.35.0.0/23 lookup 170066177
   *
   * The first rule names the device; its destination network leads to the
   * second rule by source. Either one gives the table.
   */
  async discover(device: string): Promise<Result<DiscoveredSourceRoute | null, DriverError>> {
    const listed = await this.driver.listRules();
    if (listed.isErr()) {
      return Result.err(listed.error);
    }
    const allRules = listed.unwrap();

    const rules = allRules.filter((rule) => rule.srcDevice === device);
    if (rules.length === 0) {
      this.logger.error(`Rules not found for device ${device}`, { device });
      return Result.ok(null);
    }

    const network = rules[0].destination;
    if (network) {
      rules.push(...allRules.filter((rule) => rule.source === network));
    }

    const table = rules.find((rule) => rule.table !== undefined)?.table;
    if (table === undefined) {
      const diagnostic = new NotFoundError({
        message: `Table not found for device ${device}`,
        device,
      });
      this.logger.warn(diagnostic.message, { device, rules: rules.length });
      return Result.ok({ routes: [], rules });
    }

    const listedRoutes = await this.driver.listRoutesInTable(table);
    if (listedRoutes.isErr()) {
      return Result.err(listedRoutes.error);
    }
    // listing a table omits the table itself, so put it back
    const routes = listedRoutes
      .unwrap()
      .filter((route) => route.device === device)
      .map((route) => ({ ...route, table }));

    return Result.ok({ table, routes, rules });
  }

  /**
   * Whether the virtualization control plane owns `device`. Falls back to
   * scanning autostart definitions when the oracle cannot answer.
   */
  async isControlled(device: string): Promise<boolean> {
    const managed = await this.oracle.listManagedDevices();
    if (managed.isOk()) {
      return managed.unwrap().includes(device);
    }

    this.logger.error(
      "Control plane failed to answer; checking autostart definitions instead",
      { device, error: managed.error.message }
    );
    return this.isControlledFallback(device);
  }

  /**
   * DHCP lease hook: configure source routing for a managed device
   */
  async onLeaseAcquired(
    device: string,
    address: string,
    mask: string,
    gateway: string | undefined
  ): Promise<Result<SourceRouteRecord | null, DriverError | NotFoundError>> {
    if (!(await this.isControlled(device))) {
      this.logger.debug("Ignoring lease on unmanaged device", { device });
      return Result.ok(null);
    }
    return this.configure(device, address, mask, gateway);
  }

  /**
   * DHCP lease hook: drop source routing for a managed device
   */
  async onLeaseReleased(device: string): Promise<Result<SourceRouteRemoval, DriverError>> {
    if (!(await this.isControlled(device))) {
      this.logger.debug("Ignoring lease release on unmanaged device", { device });
      return Result.ok({ kind: "absent" });
    }
    return this.remove(device);
  }

  private async isControlledFallback(device: string): Promise<boolean> {
    const bridged = `bridge name='${device}'`;
    const bridgeless = `interface dev='${device}'`;

    let files: string[];
    try {
      files = await readdir(this.autostartDir);
    } catch (error) {
      this.logger.warn("Cannot read autostart definitions", {
        dir: this.autostartDir,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }

    for (const file of files.filter((name) => name.startsWith(this.autostartPrefix))) {
      let content: string;
      try {
        content = await readFile(join(this.autostartDir, file), "utf8");
      } catch (error) {
        this.logger.warn("Cannot read autostart definition", {
          file,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }
      if (content.includes(bridged) || content.includes(bridgeless)) {
        return true;
      }
    }
    return false;
  }
}
