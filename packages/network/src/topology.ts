/**
 * Topology planner
 *
 * Turns a validated change-set into ordered, reversible steps:
 *
 *   1. teardown of removed or edited networks (source route, QoS,
 *      addressing, bridge port, bridge, VLAN), then removed bonds
 *   2. in-place bond edits: member releases of every edited bond, then
 *      enslaves, then options
 *   3. bond creation
 *   4. network creation (VLAN, bridge and port, MTU, addressing, QoS,
 *      links up, source route)
 *
 * An edited network is torn down and rebuilt from its new attributes.
 */

import { Result } from "better-result";
import { type Logger, silentLogger } from "@hostnet/logger";
import {
  ipConfigOf,
  isBridged,
  netmaskOf,
  portDeviceOf,
  southboundOf,
  topDeviceOf,
  vlanDeviceOf,
} from "./devices";
import type { DeviceControlDriver } from "./drivers";
import type { LinkFactory } from "./link";
import type { RunningConfig } from "./running-config";
import type { SourceRouteManager } from "./source-route";
import type { TopologyStep, Undo } from "./transaction";
import { type BondAttributes, type ChangeSet, type NetworkAttributes, isRemoval } from "./types";

type Operation = Undo;

export interface TopologyPlannerDeps {
  devices: DeviceControlDriver;
  links: LinkFactory;
  sourceRoutes: SourceRouteManager;
  logger?: Logger;
}

function sequence(...operations: Operation[]): Undo {
  return async () => {
    for (const operation of operations) {
      const result = await operation();
      if (result.isErr()) {
        return result;
      }
    }
    return Result.ok(undefined);
  };
}

/**
 * Step whose inverse is known up front
 */
function reversible(description: string, apply: Operation, undo: Operation): TopologyStep {
  return {
    description,
    apply: async () => {
      const result = await apply();
      if (result.isErr()) {
        return Result.err(result.error);
      }
      return Result.ok(undo);
    },
  };
}

export class TopologyPlanner {
  private readonly devices: DeviceControlDriver;
  private readonly links: LinkFactory;
  private readonly sourceRoutes: SourceRouteManager;
  private readonly logger: Logger;

  constructor(deps: TopologyPlannerDeps) {
    this.devices = deps.devices;
    this.links = deps.links;
    this.sourceRoutes = deps.sourceRoutes;
    this.logger = (deps.logger ?? silentLogger).child({ component: "topology" });
  }

  plan(changes: ChangeSet, running: RunningConfig): TopologyStep[] {
    const steps: TopologyStep[] = [];
    const networks = Object.entries(changes.networks ?? {});
    const bonds = Object.entries(changes.bonds ?? {});

    // Removals: networks first, they sit on top of the bonds
    for (const [name] of networks) {
      const current = running.network(name);
      if (current) {
        steps.push(...this.removeNetwork(name, current));
      }
    }
    for (const [name, request] of bonds) {
      const current = running.bond(name);
      if (current && isRemoval(request)) {
        steps.push(...this.removeBond(name, current));
      }
    }

    // every release before any enslave, so a NIC can move between edited bonds
    const edits = bonds.flatMap(([name, request]) => {
      const current = running.bond(name);
      return current && !isRemoval(request) ? [{ name, current, desired: request }] : [];
    });
    for (const { name, current, desired } of edits) {
      steps.push(...this.releaseMembers(name, current, desired));
    }
    for (const { name, current, desired } of edits) {
      steps.push(...this.enslaveMembers(name, current, desired));
    }
    for (const { name, current, desired } of edits) {
      steps.push(...this.setBondOptions(name, current, desired));
    }

    for (const [name, request] of bonds) {
      if (!running.hasBond(name) && !isRemoval(request)) {
        steps.push(...this.addBond(name, request));
      }
    }

    for (const [name, request] of networks) {
      if (!isRemoval(request)) {
        steps.push(...this.addNetwork(name, request));
      }
    }

    this.logger.debug("Planned topology change", {
      steps: steps.length,
      networks: networks.length,
      bonds: bonds.length,
    });
    return steps;
  }

  private removeNetwork(name: string, attrs: NetworkAttributes): TopologyStep[] {
    const steps: TopologyStep[] = [];
    const top = topDeviceOf(name, attrs);
    const port = portDeviceOf(attrs);
    const southbound = southboundOf(attrs);
    const vlanDevice = vlanDeviceOf(attrs);
    const ipConfig = ipConfigOf(attrs);
    const switchKind = attrs.switch ?? "legacy";

    if (top !== undefined && (attrs.gateway !== undefined || ipConfig?.kind === "dhcp")) {
      steps.push({
        description: `remove source route of ${top}`,
        apply: async () => {
          const removed = await this.sourceRoutes.remove(top);
          if (removed.isErr()) {
            return Result.err(removed.error);
          }
          const removal = removed.unwrap();
          const gateway = attrs.gateway;
          if (removal.kind === "absent") {
            return Result.ok(null);
          }
          if (ipConfig?.kind === "static" && gateway !== undefined) {
            const address = ipConfig.address;
            const reconfigure: Undo = async () => {
              const restored = await this.sourceRoutes.configure(top, address, netmaskOf(attrs), gateway);
              if (restored.isErr()) {
                return Result.err(restored.error);
              }
              return Result.ok(undefined);
            };
            return Result.ok(reconfigure);
          }
          const restore: Undo = () => this.sourceRoutes.restore(top, removal);
          return Result.ok(restore);
        },
      });
    }

    if (port !== undefined && attrs.hostQos) {
      const qos = attrs.hostQos;
      steps.push(
        reversible(
          `clear host QoS on ${port}`,
          () => this.devices.setHostQos(port, null),
          () => this.devices.setHostQos(port, qos)
        )
      );
    }

    if (top !== undefined && ipConfig) {
      steps.push(
        reversible(
          `flush addressing of ${top}`,
          () => this.devices.flushIp(top, ipConfig),
          () => this.devices.configureIp(top, ipConfig)
        )
      );
    }

    if (isBridged(attrs)) {
      if (port !== undefined) {
        steps.push(
          reversible(
            `detach ${port} from bridge ${name}`,
            () => this.devices.setMaster(port, null),
            () => this.devices.setMaster(port, name)
          )
        );
      }
      steps.push(
        reversible(
          `delete bridge ${name}`,
          () => this.devices.deleteLink(name),
          sequence(
            () => this.devices.createBridge(name, switchKind),
            () => this.links(name).up()
          )
        )
      );
    }

    if (vlanDevice !== undefined && southbound !== undefined && attrs.vlan !== undefined) {
      const tag = attrs.vlan;
      steps.push(
        reversible(
          `delete vlan ${vlanDevice}`,
          () => this.devices.deleteLink(vlanDevice),
          sequence(
            () => this.devices.createVlan(vlanDevice, southbound, tag),
            () => this.links(vlanDevice).up()
          )
        )
      );
    }

    return steps;
  }

  private removeBond(name: string, attrs: BondAttributes): TopologyStep[] {
    return [
      reversible(
        `delete bond ${name}`,
        () => this.devices.deleteLink(name),
        sequence(
          () => this.devices.createBond(name, attrs.nics, attrs.options ?? "", attrs.switch ?? "legacy"),
          () => this.links(name).up()
        )
      ),
    ];
  }

  private releaseMembers(name: string, current: BondAttributes, desired: BondAttributes): TopologyStep[] {
    return current.nics
      .filter((nic) => !desired.nics.includes(nic))
      .map((nic) =>
        reversible(
          `release ${nic} from ${name}`,
          () => this.devices.release(name, nic),
          () => this.devices.enslave(name, nic)
        )
      );
  }

  private enslaveMembers(name: string, current: BondAttributes, desired: BondAttributes): TopologyStep[] {
    return desired.nics
      .filter((nic) => !current.nics.includes(nic))
      .map((nic) =>
        reversible(
          `enslave ${nic} to ${name}`,
          () => this.devices.enslave(name, nic),
          () => this.devices.release(name, nic)
        )
      );
  }

  private setBondOptions(name: string, current: BondAttributes, desired: BondAttributes): TopologyStep[] {
    const previousOptions = current.options ?? "";
    const options = desired.options ?? "";
    if (options === previousOptions) {
      return [];
    }
    return [
      reversible(
        `set options of ${name}`,
        () => this.devices.setBondOptions(name, options),
        () => this.devices.setBondOptions(name, previousOptions)
      ),
    ];
  }

  private addBond(name: string, attrs: BondAttributes): TopologyStep[] {
    return [
      reversible(
        `create bond ${name}`,
        () => this.devices.createBond(name, attrs.nics, attrs.options ?? "", attrs.switch ?? "legacy"),
        () => this.devices.deleteLink(name)
      ),
      this.linkUp(name),
    ];
  }

  private addNetwork(name: string, attrs: NetworkAttributes): TopologyStep[] {
    const steps: TopologyStep[] = [];
    const southbound = southboundOf(attrs);
    const vlanDevice = vlanDeviceOf(attrs);
    const port = portDeviceOf(attrs);
    const top = topDeviceOf(name, attrs);
    const ipConfig = ipConfigOf(attrs);
    const stack: string[] = [];

    if (southbound !== undefined) {
      stack.push(southbound);
    }

    if (vlanDevice !== undefined && southbound !== undefined && attrs.vlan !== undefined) {
      const tag = attrs.vlan;
      steps.push(
        reversible(
          `create vlan ${vlanDevice}`,
          () => this.devices.createVlan(vlanDevice, southbound, tag),
          () => this.devices.deleteLink(vlanDevice)
        )
      );
      stack.push(vlanDevice);
    }

    if (isBridged(attrs)) {
      steps.push(
        reversible(
          `create bridge ${name}`,
          () => this.devices.createBridge(name, attrs.switch ?? "legacy"),
          () => this.devices.deleteLink(name)
        )
      );
      if (port !== undefined) {
        steps.push(
          reversible(
            `attach ${port} to bridge ${name}`,
            () => this.devices.setMaster(port, name),
            () => this.devices.setMaster(port, null)
          )
        );
      }
      stack.push(name);
    }

    // bottom-up: an upper device cannot exceed the MTU of the one below it
    const mtu = attrs.mtu;
    if (mtu !== undefined) {
      for (const device of stack) {
        steps.push(this.setMtu(device, mtu));
      }
    }

    if (top !== undefined && ipConfig) {
      steps.push(
        reversible(
          `configure addressing of ${top}`,
          () => this.devices.configureIp(top, ipConfig),
          () => this.devices.flushIp(top, ipConfig)
        )
      );
    }

    if (port !== undefined && attrs.hostQos) {
      const qos = attrs.hostQos;
      steps.push(
        reversible(
          `set host QoS on ${port}`,
          () => this.devices.setHostQos(port, qos),
          () => this.devices.setHostQos(port, null)
        )
      );
    }

    for (const device of stack) {
      steps.push(this.linkUp(device));
    }

    // last: needs the device up and addressed
    const gateway = attrs.gateway;
    if (top !== undefined && ipConfig?.kind === "static" && gateway !== undefined) {
      steps.push({
        description: `configure source route of ${top}`,
        apply: async () => {
          const configured = await this.sourceRoutes.configure(
            top,
            ipConfig.address,
            netmaskOf(attrs),
            gateway
          );
          if (configured.isErr()) {
            return Result.err(configured.error);
          }
          if (configured.unwrap() === null) {
            return Result.ok(null);
          }
          const unconfigure: Undo = async () => {
            const removed = await this.sourceRoutes.remove(top);
            if (removed.isErr()) {
              return Result.err(removed.error);
            }
            return Result.ok(undefined);
          };
          return Result.ok(unconfigure);
        },
      });
    }

    return steps;
  }

  private setMtu(device: string, mtu: number): TopologyStep {
    return {
      description: `set mtu ${mtu} on ${device}`,
      apply: async () => {
        const previous = await this.links(device).mtu();
        if (previous.isErr()) {
          return Result.err(previous.error);
        }
        const oldMtu = previous.unwrap();
        if (oldMtu === mtu) {
          return Result.ok(null);
        }
        const set = await this.devices.setMtu(device, mtu);
        if (set.isErr()) {
          return Result.err(set.error);
        }
        const restore: Undo = () => this.devices.setMtu(device, oldMtu);
        return Result.ok(restore);
      },
    };
  }

  private linkUp(device: string): TopologyStep {
    return {
      description: `bring ${device} up`,
      apply: async () => {
        const link = this.links(device);
        const wasUp = await link.isAdminUp();
        if (wasUp.isErr()) {
          return Result.err(wasUp.error);
        }
        if (wasUp.unwrap()) {
          return Result.ok(null);
        }
        const up = await link.up();
        if (up.isErr()) {
          return Result.err(up.error);
        }
        const down: Undo = () => link.down();
        return Result.ok(down);
      },
    };
  }
}
