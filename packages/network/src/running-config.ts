/**
 * Running config: the committed desired state of networks and bonds.
 *
 * Transactions stage a copy with their changes applied and swap it in only
 * on commit, so a failed transaction leaves the committed state untouched.
 */

import { topDeviceOf } from "./devices";
import {
  type BondAttributes,
  type ChangeSet,
  type NetworkAttributes,
  isRemoval,
} from "./types";

export interface RunningConfigSnapshot {
  networks: Record<string, NetworkAttributes>;
  bonds: Record<string, BondAttributes>;
}

export class RunningConfig {
  private readonly networks: Map<string, NetworkAttributes>;
  private readonly bonds: Map<string, BondAttributes>;

  constructor(snapshot: Partial<RunningConfigSnapshot> = {}) {
    this.networks = new Map(
      Object.entries(snapshot.networks ?? {}).map(([name, attrs]) => [name, structuredClone(attrs)])
    );
    this.bonds = new Map(
      Object.entries(snapshot.bonds ?? {}).map(([name, attrs]) => [name, structuredClone(attrs)])
    );
  }

  static fromJSON(snapshot: Partial<RunningConfigSnapshot>): RunningConfig {
    return new RunningConfig(snapshot);
  }

  toJSON(): RunningConfigSnapshot {
    return {
      networks: Object.fromEntries(
        [...this.networks].map(([name, attrs]) => [name, structuredClone(attrs)])
      ),
      bonds: Object.fromEntries(
        [...this.bonds].map(([name, attrs]) => [name, structuredClone(attrs)])
      ),
    };
  }

  clone(): RunningConfig {
    return new RunningConfig(this.toJSON());
  }

  network(name: string): NetworkAttributes | undefined {
    return this.networks.get(name);
  }

  bond(name: string): BondAttributes | undefined {
    return this.bonds.get(name);
  }

  hasNetwork(name: string): boolean {
    return this.networks.has(name);
  }

  hasBond(name: string): boolean {
    return this.bonds.has(name);
  }

  networkEntries(): Array<[string, NetworkAttributes]> {
    return [...this.networks];
  }

  bondEntries(): Array<[string, BondAttributes]> {
    return [...this.bonds];
  }

  /**
   * Copy of this config with a change-set applied: removals dropped,
   * everything else added or replaced wholesale.
   */
  withChanges(changes: ChangeSet): RunningConfig {
    const staged = this.clone();
    for (const [name, request] of Object.entries(changes.bonds ?? {})) {
      if (isRemoval(request)) {
        staged.bonds.delete(name);
      } else {
        staged.bonds.set(name, structuredClone(request));
      }
    }
    for (const [name, request] of Object.entries(changes.networks ?? {})) {
      if (isRemoval(request)) {
        staged.networks.delete(name);
      } else {
        staged.networks.set(name, structuredClone(request));
      }
    }
    return staged;
  }

  /**
   * Devices carrying each network's addressing
   */
  topDevices(): string[] {
    const devices: string[] = [];
    for (const [name, attrs] of this.networks) {
      const top = topDeviceOf(name, attrs);
      if (top !== undefined) {
        devices.push(top);
      }
    }
    return devices;
  }
}
