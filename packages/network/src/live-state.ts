/**
 * Reads networks and bonds back from the kernel so they can be compared
 * with the running config.
 */

import { Result } from "better-result";
import type { DriverError } from "@hostnet/errors";
import { topDeviceOf } from "./devices";
import type { DeviceControlDriver } from "./drivers";
import { parseCIDR, prefixToNetmask } from "./ipv4";
import type { LiveBond, LiveNetwork, LiveState } from "./normalizer";
import type { SourceRouteManager } from "./source-route";
import type { DeviceDescription, NetworkAttributes } from "./types";

export interface LiveStateReaderDeps {
  devices: DeviceControlDriver;
  sourceRoutes: SourceRouteManager;
}

export class LiveStateReader {
  constructor(private readonly deps: LiveStateReaderDeps) {}

  /**
   * Read the named networks and bonds. `networks` maps each name to the
   * attributes it is expected to have, which says where to look for it
   * (bridge or bridgeless top device). Entities not found are left out.
   */
  async read(
    networks: Record<string, NetworkAttributes>,
    bonds: string[]
  ): Promise<Result<LiveState, DriverError>> {
    const state: LiveState = { networks: {}, bonds: {} };

    for (const [name, hint] of Object.entries(networks)) {
      const network = await this.readNetwork(name, hint);
      if (network.isErr()) {
        return Result.err(network.error);
      }
      const found = network.unwrap();
      if (found) {
        state.networks[name] = found;
      }
    }

    for (const name of bonds) {
      const bond = await this.readBond(name);
      if (bond.isErr()) {
        return Result.err(bond.error);
      }
      const found = bond.unwrap();
      if (found) {
        state.bonds[name] = found;
      }
    }

    return Result.ok(state);
  }

  async readBond(name: string): Promise<Result<LiveBond | null, DriverError>> {
    const described = await this.deps.devices.describe(name);
    if (described.isErr()) {
      return Result.err(described.error);
    }
    const device = described.unwrap();
    if (!device || device.type !== "bond") {
      return Result.ok(null);
    }
    return Result.ok({
      nics: device.members ?? [],
      options: device.bondOptions ?? {},
      switch: device.switch,
    });
  }

  async readNetwork(
    name: string,
    hint: NetworkAttributes
  ): Promise<Result<LiveNetwork | null, DriverError>> {
    const bridge = await this.deps.devices.describe(name);
    if (bridge.isErr()) {
      return Result.err(bridge.error);
    }
    const bridgeDevice = bridge.unwrap();

    let top: DeviceDescription;
    let port: DeviceDescription | null;
    const network: LiveNetwork = {};

    if (bridgeDevice && bridgeDevice.type === "bridge") {
      top = bridgeDevice;
      network.bridged = true;
      const portName = bridgeDevice.ports?.[0];
      if (portName === undefined) {
        port = null;
      } else {
        const described = await this.deps.devices.describe(portName);
        if (described.isErr()) {
          return Result.err(described.error);
        }
        port = described.unwrap();
      }
    } else {
      const topName = topDeviceOf(name, { ...hint, bridged: false });
      if (topName === undefined) {
        return Result.ok(null);
      }
      const described = await this.deps.devices.describe(topName);
      if (described.isErr()) {
        return Result.err(described.error);
      }
      const topDevice = described.unwrap();
      // a bridgeless network on a NIC that is bridged elsewhere is not this network
      if (!topDevice || topDevice.master !== undefined || hint.bridged !== false) {
        return Result.ok(null);
      }
      top = topDevice;
      port = topDevice;
      network.bridged = false;
    }

    if (port) {
      const attachment = await this.attachmentOf(port);
      if (attachment.isErr()) {
        return Result.err(attachment.error);
      }
      Object.assign(network, attachment.unwrap());
      if (port.hostQos) {
        network.hostQos = port.hostQos;
      }
    }

    network.mtu = top.mtu;
    network.switch = top.switch;

    if (top.dhcp) {
      network.bootproto = "dhcp";
    } else if (top.addresses.length > 0) {
      const { ip, prefixLen } = parseCIDR(top.addresses[0]);
      network.ipaddr = ip;
      network.netmask = prefixToNetmask(prefixLen);

      const discovered = await this.deps.sourceRoutes.discover(top.name);
      if (discovered.isErr()) {
        return Result.err(discovered.error);
      }
      const gateway = discovered
        .unwrap()
        ?.routes.find((route) => route.network === "0.0.0.0/0")?.via;
      if (gateway !== undefined) {
        network.gateway = gateway;
      }
    }

    return Result.ok(network);
  }

  private async attachmentOf(
    port: DeviceDescription
  ): Promise<Result<Pick<NetworkAttributes, "nic" | "bonding" | "vlan">, DriverError>> {
    let southbound = port;
    let vlan: number | undefined;

    if (port.type === "vlan" && port.vlan) {
      vlan = port.vlan.tag;
      const base = await this.deps.devices.describe(port.vlan.base);
      if (base.isErr()) {
        return Result.err(base.error);
      }
      southbound = base.unwrap() ?? { ...port, name: port.vlan.base, type: "nic" };
    }

    const attachment: Pick<NetworkAttributes, "nic" | "bonding" | "vlan"> =
      southbound.type === "bond" ? { bonding: southbound.name } : { nic: southbound.name };
    if (vlan !== undefined) {
      attachment.vlan = vlan;
    }
    return Result.ok(attachment);
  }
}

