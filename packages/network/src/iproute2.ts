/**
 * iproute2 driver
 *
 * Implements the link, device and route capabilities with `ip`, `tc` and
 * `dhclient`, plus sysfs reads for link properties. Poll-mode devices are
 * driven through Open vSwitch (`ovs-vsctl`, `ovs-ofctl`).
 */

import { access, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { Result } from "better-result";
import { DriverError } from "@hostnet/errors";
import { type Logger, silentLogger } from "@hostnet/logger";
import { type CommandRunner, type LineWatcher, runCommand, watchLines } from "./command";
import type {
  DeviceControlDriver,
  LinkControlDriver,
  LinkSubscription,
  PollModeDriver,
  RouteControlDriver,
} from "./drivers";
import {
  formatHfscCurve,
  parseAddresses,
  parseHfscClass,
  parseLinkLine,
  parseRoute,
  parseRule,
} from "./parsers";
import {
  IFF_RUNNING,
  IFF_UP,
  type DeviceDescription,
  type HostQos,
  type IpConfig,
  type LinkEvent,
  type LinkProperties,
  type LinkState,
  type QosCurveName,
  type Route,
  type Rule,
  type SwitchKind,
} from "./types";

export interface Iproute2DriverOptions {
  /** Kernel network device directory (default: /sys/class/net) */
  sysfsNet?: string;
  /** Name prefix of poll-mode devices (default: "dpdk") */
  pollModePrefix?: string;
  run?: CommandRunner;
  watch?: LineWatcher;
  logger?: Logger;
}

// Errors meaning the object is already gone
const MISSING_PATTERNS = ["No such process", "Cannot find device", "No such file or directory", "does not exist"];

function isMissing(error: DriverError): boolean {
  return MISSING_PATTERNS.some((pattern) => error.message.includes(pattern));
}

function withDevice(error: DriverError, device: string, operation: string): DriverError {
  return new DriverError({ message: error.message, device, operation, cause: error });
}

function bondOptionArgs(options: string): string[] {
  return options
    .split(/\s+/)
    .filter(Boolean)
    .flatMap((token) => {
      const index = token.indexOf("=");
      return index < 0 ? [token] : [token.slice(0, index), token.slice(index + 1)];
    });
}

function routeArgs(route: Route): string[] {
  const args = [route.network];
  if (route.via !== undefined) args.push("via", route.via);
  args.push("dev", route.device);
  if (route.src !== undefined) args.push("src", route.src);
  if (route.scope !== undefined) args.push("scope", route.scope);
  if (route.table !== undefined) args.push("table", String(route.table));
  return args;
}

function ruleArgs(rule: Rule): string[] {
  const args: string[] = [];
  if (rule.source !== undefined) args.push("from", rule.source);
  if (rule.destination !== undefined) args.push("to", rule.destination);
  if (rule.srcDevice !== undefined) args.push("iif", rule.srcDevice);
  if (rule.table !== undefined) args.push("table", String(rule.table));
  if (rule.priority !== undefined) args.push("priority", String(rule.priority));
  return args;
}

function unsupportedSwitch(kind: SwitchKind, device: string, operation: string): DriverError {
  return new DriverError({
    message: `Switch kind '${kind}' is not supported by the iproute2 driver`,
    device,
    operation,
  });
}

class OvsPollModeDriver implements PollModeDriver {
  constructor(
    private readonly run: CommandRunner,
    private readonly prefix: string
  ) {}

  isPollModeDevice(device: string): boolean {
    return device.startsWith(this.prefix);
  }

  async listDevices(): Promise<Result<string[], DriverError>> {
    const result = await this.run("ovs-vsctl", ["--bare", "--columns=name", "find", "Interface", "type=dpdk"]);
    if (result.isErr()) {
      return Result.err(result.error);
    }
    return Result.ok(
      result
        .unwrap()
        .split("\n")
        .map((line) => line.trim())
        .filter(Boolean)
    );
  }

  async setState(device: string, state: LinkState): Promise<Result<void, DriverError>> {
    const bridge = await this.run("ovs-vsctl", ["iface-to-br", device]);
    if (bridge.isErr()) {
      return Result.err(withDevice(bridge.error, device, "setState"));
    }
    const result = await this.run("ovs-ofctl", ["mod-port", bridge.unwrap().trim(), device, state]);
    if (result.isErr()) {
      return Result.err(withDevice(result.error, device, "setState"));
    }
    return Result.ok(undefined);
  }

  async query(device: string): Promise<Result<LinkProperties, DriverError>> {
    const result = await this.interfaceColumns(device, ["admin_state", "link_state", "mac_in_use", "mtu"]);
    if (result.isErr()) {
      return Result.err(result.error);
    }
    const [adminState, linkState, mac, mtu] = result.unwrap();
    let flags = 0;
    if (adminState === "up") flags |= IFF_UP;
    if (linkState === "up") flags |= IFF_RUNNING;
    return Result.ok({ flags, address: mac ?? "", mtu: Number(mtu ?? 0) });
  }

  async operUp(device: string): Promise<Result<boolean, DriverError>> {
    const result = await this.interfaceColumns(device, ["link_state"]);
    if (result.isErr()) {
      return Result.err(result.error);
    }
    return Result.ok(result.unwrap()[0] === "up");
  }

  private async interfaceColumns(device: string, columns: string[]): Promise<Result<string[], DriverError>> {
    const result = await this.run("ovs-vsctl", ["--bare", `--columns=${columns.join(",")}`, "list", "Interface", device]);
    if (result.isErr()) {
      return Result.err(withDevice(result.error, device, "query"));
    }
    return Result.ok(result.unwrap().split("\n").map((line) => line.trim()));
  }
}

export class Iproute2Driver implements LinkControlDriver, DeviceControlDriver, RouteControlDriver {
  readonly pollMode: PollModeDriver;
  private readonly sysfsNet: string;
  private readonly run: CommandRunner;
  private readonly watch: LineWatcher;
  private readonly logger: Logger;

  constructor(options: Iproute2DriverOptions = {}) {
    this.sysfsNet = options.sysfsNet ?? "/sys/class/net";
    this.watch = options.watch ?? watchLines;
    this.logger = (options.logger ?? silentLogger).child({ component: "iproute2" });
    const run = options.run ?? runCommand;
    this.run = (cmd, args) => {
      this.logger.debug("Running command", { cmd, args: args.join(" ") });
      return run(cmd, args);
    };
    this.pollMode = new OvsPollModeDriver(this.run, options.pollModePrefix ?? "dpdk");
  }

  // ─── Link control ────────────────────────────────────────────────────────

  async setState(device: string, state: LinkState): Promise<Result<void, DriverError>> {
    return this.ip(device, "setState", ["link", "set", "dev", device, state]);
  }

  async setAddress(device: string, address: string, vfIndex?: number): Promise<Result<void, DriverError>> {
    const args =
      vfIndex === undefined
        ? ["link", "set", "dev", device, "address", address]
        : ["link", "set", "dev", device, "vf", String(vfIndex), "mac", address];
    return this.ip(device, "setAddress", args);
  }

  async query(device: string): Promise<Result<LinkProperties, DriverError>> {
    return Result.tryPromise({
      try: async () => {
        const [flags, address, mtu] = await Promise.all([
          this.readSysfs(device, "flags"),
          this.readSysfs(device, "address"),
          this.readSysfs(device, "mtu"),
        ]);
        return { flags: parseInt(flags, 16), address, mtu: Number(mtu) };
      },
      catch: (error) =>
        new DriverError({
          message: `Failed to read properties of ${device}: ${error instanceof Error ? error.message : String(error)}`,
          device,
          operation: "query",
          cause: error,
        }),
    });
  }

  async exists(device: string): Promise<boolean> {
    try {
      await access(join(this.sysfsNet, device));
      return true;
    } catch {
      return false;
    }
  }

  subscribe(device: string, listener: (event: LinkEvent) => void): Result<LinkSubscription, DriverError> {
    return this.watch("ip", ["-o", "monitor", "link"], (line) => {
      const link = parseLinkLine(line);
      if (link && link.name === device && !line.startsWith("Deleted")) {
        listener({ device, flags: link.flags });
      }
    });
  }

  // ─── Devices ─────────────────────────────────────────────────────────────

  async createBond(
    name: string,
    members: string[],
    options: string,
    switchKind: SwitchKind
  ): Promise<Result<void, DriverError>> {
    if (switchKind !== "legacy") {
      return Result.err(unsupportedSwitch(switchKind, name, "createBond"));
    }
    const created = await this.ip(name, "createBond", ["link", "add", "name", name, "type", "bond", ...bondOptionArgs(options)]);
    if (created.isErr()) {
      return created;
    }
    for (const nic of members) {
      const enslaved = await this.enslave(name, nic);
      if (enslaved.isErr()) {
        const cleanup = await this.deleteLink(name);
        if (cleanup.isErr()) {
          this.logger.warn("Failed to clean up partially created bond", { bond: name, error: cleanup.error.message });
        }
        return enslaved;
      }
    }
    return Result.ok(undefined);
  }

  async setBondOptions(name: string, options: string): Promise<Result<void, DriverError>> {
    const args = bondOptionArgs(options);
    if (args.length === 0) {
      return Result.ok(undefined);
    }
    return this.ip(name, "setBondOptions", ["link", "set", "dev", name, "type", "bond", ...args]);
  }

  async enslave(bond: string, nic: string): Promise<Result<void, DriverError>> {
    // the kernel only enslaves links that are down
    const down = await this.ip(nic, "enslave", ["link", "set", "dev", nic, "down"]);
    if (down.isErr()) {
      return down;
    }
    return this.ip(nic, "enslave", ["link", "set", "dev", nic, "master", bond]);
  }

  /**
   * Detach `nic` from `bond`. A NIC held by any other master is left alone,
   * since `nomaster` would detach it from whichever bond now owns it.
   */
  async release(bond: string, nic: string): Promise<Result<void, DriverError>> {
    const shown = await this.output("ip", nic, "release", ["-o", "link", "show", "dev", nic]);
    if (shown.isErr()) {
      return Result.err(shown.error);
    }
    const master = parseLinkLine(shown.unwrap())?.master;
    if (master !== bond) {
      this.logger.debug("NIC is not enslaved to bond, nothing to release", { bond, nic, master: master ?? "none" });
      return Result.ok(undefined);
    }
    return this.ip(nic, "release", ["link", "set", "dev", nic, "nomaster"]);
  }

  async createVlan(name: string, base: string, tag: number): Promise<Result<void, DriverError>> {
    return this.ip(name, "createVlan", ["link", "add", "link", base, "name", name, "type", "vlan", "id", String(tag)]);
  }

  async createBridge(name: string, switchKind: SwitchKind): Promise<Result<void, DriverError>> {
    if (switchKind !== "legacy") {
      return Result.err(unsupportedSwitch(switchKind, name, "createBridge"));
    }
    return this.ip(name, "createBridge", ["link", "add", "name", name, "type", "bridge"]);
  }

  async setMaster(device: string, master: string | null): Promise<Result<void, DriverError>> {
    const args = master === null ? ["nomaster"] : ["master", master];
    return this.ip(device, "setMaster", ["link", "set", "dev", device, ...args]);
  }

  async deleteLink(name: string): Promise<Result<void, DriverError>> {
    return this.ip(name, "deleteLink", ["link", "del", "dev", name]);
  }

  async setMtu(device: string, mtu: number): Promise<Result<void, DriverError>> {
    return this.ip(device, "setMtu", ["link", "set", "dev", device, "mtu", String(mtu)]);
  }

  async configureIp(device: string, config: IpConfig): Promise<Result<void, DriverError>> {
    if (config.kind === "dhcp") {
      return this.command("dhclient", device, "configureIp", ["-nw", device]);
    }
    return this.ip(device, "configureIp", ["addr", "add", `${config.address}/${config.prefixLen}`, "dev", device]);
  }

  async flushIp(device: string, config: IpConfig): Promise<Result<void, DriverError>> {
    if (config.kind === "dhcp") {
      const released = await this.command("dhclient", device, "flushIp", ["-r", device]);
      if (released.isErr()) {
        return released;
      }
      return this.ip(device, "flushIp", ["-4", "addr", "flush", "dev", device]);
    }
    return this.ip(device, "flushIp", ["addr", "del", `${config.address}/${config.prefixLen}`, "dev", device]);
  }

  async setHostQos(device: string, qos: HostQos | null): Promise<Result<void, DriverError>> {
    if (qos === null) {
      const deleted = await this.command("tc", device, "setHostQos", ["qdisc", "del", "dev", device, "root"]);
      if (deleted.isErr() && !isMissing(deleted.error) && !deleted.error.message.includes("handle of zero")) {
        return deleted;
      }
      return Result.ok(undefined);
    }

    const qdisc = await this.command("tc", device, "setHostQos", [
      "qdisc", "replace", "dev", device, "root", "handle", "1:", "hfsc", "default", "1",
    ]);
    if (qdisc.isErr()) {
      return qdisc;
    }
    const curves: QosCurveName[] = ["ls", "ul", "rt"];
    const curveArgs = curves.flatMap((name) => {
      const curve = qos.out?.[name];
      return curve ? formatHfscCurve(name, curve) : [];
    });
    return this.command("tc", device, "setHostQos", [
      "class", "replace", "dev", device, "parent", "1:", "classid", "1:1", "hfsc", ...curveArgs,
    ]);
  }

  async describe(device: string): Promise<Result<DeviceDescription | null, DriverError>> {
    if (!(await this.exists(device))) {
      return Result.ok(null);
    }

    const shown = await this.output("ip", device, "describe", ["-d", "-o", "link", "show", "dev", device]);
    if (shown.isErr()) {
      return Result.err(shown.error);
    }
    const link = parseLinkLine(shown.unwrap());
    if (!link) {
      return Result.err(new DriverError({ message: `Cannot parse link ${device}`, device, operation: "describe" }));
    }

    const addr = await this.output("ip", device, "describe", ["-o", "-4", "addr", "show", "dev", device]);
    if (addr.isErr()) {
      return Result.err(addr.error);
    }
    const { addresses, dynamic } = parseAddresses(addr.unwrap());

    const description: DeviceDescription = {
      name: device,
      type: link.kind ?? "nic",
      addresses,
      dhcp: dynamic,
      mtu: link.mtu ?? "",
      switch: "legacy",
    };
    if (link.master !== undefined) {
      description.master = link.master;
    }
    if (link.kind === "vlan" && link.base !== undefined && link.vlanId !== undefined) {
      description.vlan = { base: link.base, tag: link.vlanId };
    }

    const sysfs = await Result.tryPromise({
      try: async () => {
        // sysfs reports MTU as text; keep it that way
        description.mtu = await this.readSysfs(device, "mtu");
        if (link.kind === "bond") {
          const slaves = await this.readSysfs(device, "bonding/slaves");
          description.members = slaves.split(/\s+/).filter(Boolean);
          description.bondOptions = await this.readBondOptions(device);
        }
        if (link.kind === "bridge") {
          description.ports = (await readdir(join(this.sysfsNet, device, "brif"))).sort();
        }
      },
      catch: (error) =>
        new DriverError({
          message: `Failed to read sysfs for ${device}: ${error instanceof Error ? error.message : String(error)}`,
          device,
          operation: "describe",
          cause: error,
        }),
    });
    if (sysfs.isErr()) {
      return Result.err(sysfs.error);
    }

    const classes = await this.output("tc", device, "describe", ["class", "show", "dev", device]);
    if (classes.isOk()) {
      for (const line of classes.unwrap().split("\n")) {
        const qos = parseHfscClass(line);
        if (qos) {
          description.hostQos = qos;
          break;
        }
      }
    }

    return Result.ok(description);
  }

  // ─── Routes ──────────────────────────────────────────────────────────────

  async install(routes: Route[], rules: Rule[], device: string): Promise<Result<void, DriverError>> {
    const installedRoutes: Route[] = [];
    const installedRules: Rule[] = [];

    const undo = async () => {
      const undone = await this.remove(installedRoutes, installedRules, device);
      if (undone.isErr()) {
        this.logger.warn("Failed to undo partial source route", { device, error: undone.error.message });
      }
    };

    for (const route of routes) {
      const added = await this.ip(device, "install", ["-4", "route", "add", ...routeArgs(route)]);
      if (added.isErr()) {
        await undo();
        return added;
      }
      installedRoutes.push(route);
    }
    for (const rule of rules) {
      const added = await this.ip(device, "install", ["-4", "rule", "add", ...ruleArgs(rule)]);
      if (added.isErr()) {
        await undo();
        return added;
      }
      installedRules.push(rule);
    }
    return Result.ok(undefined);
  }

  async remove(routes: Route[], rules: Rule[], device: string): Promise<Result<void, DriverError>> {
    let failure: DriverError | null = null;

    for (const rule of rules) {
      const deleted = await this.ip(device, "remove", ["-4", "rule", "del", ...ruleArgs(rule)]);
      if (deleted.isErr() && !isMissing(deleted.error)) {
        failure ??= deleted.error;
      }
    }
    for (const route of routes) {
      const deleted = await this.ip(device, "remove", ["-4", "route", "del", ...routeArgs(route)]);
      if (deleted.isErr() && !isMissing(deleted.error)) {
        failure ??= deleted.error;
      }
    }

    return failure ? Result.err(failure) : Result.ok(undefined);
  }

  async listRoutesInTable(table: number): Promise<Result<Route[], DriverError>> {
    const result = await this.run("ip", ["-4", "route", "show", "table", String(table)]);
    if (result.isErr()) {
      if (isMissing(result.error)) {
        return Result.ok([]);
      }
      return Result.err(result.error);
    }
    return Result.ok(
      result
        .unwrap()
        .split("\n")
        .map(parseRoute)
        .filter((route): route is Route => route !== null)
    );
  }

  async listRules(): Promise<Result<Rule[], DriverError>> {
    const result = await this.run("ip", ["-4", "rule", "show"]);
    if (result.isErr()) {
      return Result.err(result.error);
    }
    return Result.ok(
      result
        .unwrap()
        .split("\n")
        .map(parseRule)
        .filter((rule): rule is Rule => rule !== null)
    );
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────

  private ip(device: string, operation: string, args: string[]): Promise<Result<void, DriverError>> {
    return this.command("ip", device, operation, args);
  }

  private async command(
    cmd: string,
    device: string,
    operation: string,
    args: string[]
  ): Promise<Result<void, DriverError>> {
    const result = await this.output(cmd, device, operation, args);
    if (result.isErr()) {
      return Result.err(result.error);
    }
    return Result.ok(undefined);
  }

  private async output(
    cmd: string,
    device: string,
    operation: string,
    args: string[]
  ): Promise<Result<string, DriverError>> {
    const result = await this.run(cmd, args);
    if (result.isErr()) {
      return Result.err(withDevice(result.error, device, operation));
    }
    return Result.ok(result.unwrap());
  }

  private async readSysfs(device: string, attribute: string): Promise<string> {
    return (await readFile(join(this.sysfsNet, device, attribute), "utf8")).trim();
  }

  private async readBondOptions(device: string): Promise<Record<string, string>> {
    const dir = join(this.sysfsNet, device, "bonding");
    const options: Record<string, string> = {};
    for (const name of await readdir(dir)) {
      if (name === "slaves") {
        continue;
      }
      try {
        options[name] = (await readFile(join(dir, name), "utf8")).trim();
      } catch (error) {
        // some attributes are write-only or only readable in certain modes
        this.logger.debug("Skipping unreadable bond option", {
          device,
          option: name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return options;
  }
}

