/**
 * Capabilities the reconciler drives. Implementations run the actual
 * commands (see Iproute2Driver); tests substitute in-memory fakes.
 */

import type { Result } from "better-result";
import type { DriverError } from "@hostnet/errors";
import type {
  DeviceDescription,
  HostQos,
  IpConfig,
  LinkEvent,
  LinkProperties,
  LinkState,
  Route,
  Rule,
  SwitchKind,
} from "./types";

/** Stops a link event subscription */
export type LinkSubscription = () => void;

/**
 * Poll-mode (user-space datapath) devices have their own control path
 */
export interface PollModeDriver {
  isPollModeDevice(device: string): boolean;
  listDevices(): Promise<Result<string[], DriverError>>;
  setState(device: string, state: LinkState): Promise<Result<void, DriverError>>;
  query(device: string): Promise<Result<LinkProperties, DriverError>>;
  operUp(device: string): Promise<Result<boolean, DriverError>>;
}

export interface LinkControlDriver {
  setState(device: string, state: LinkState): Promise<Result<void, DriverError>>;
  /** Set the hardware address, on virtual function `vfIndex` of `device` when given */
  setAddress(device: string, address: string, vfIndex?: number): Promise<Result<void, DriverError>>;
  query(device: string): Promise<Result<LinkProperties, DriverError>>;
  /** Presence under the kernel's network device namespace */
  exists(device: string): Promise<boolean>;
  /** Start delivering link events for `device`; call the returned function to stop */
  subscribe(
    device: string,
    listener: (event: LinkEvent) => void
  ): Result<LinkSubscription, DriverError>;
  pollMode: PollModeDriver;
}

export interface DeviceControlDriver {
  createBond(
    name: string,
    members: string[],
    options: string,
    switchKind: SwitchKind
  ): Promise<Result<void, DriverError>>;
  setBondOptions(name: string, options: string): Promise<Result<void, DriverError>>;
  enslave(bond: string, nic: string): Promise<Result<void, DriverError>>;
  release(bond: string, nic: string): Promise<Result<void, DriverError>>;
  createVlan(name: string, base: string, tag: number): Promise<Result<void, DriverError>>;
  createBridge(name: string, switchKind: SwitchKind): Promise<Result<void, DriverError>>;
  setMaster(device: string, master: string | null): Promise<Result<void, DriverError>>;
  deleteLink(name: string): Promise<Result<void, DriverError>>;
  setMtu(device: string, mtu: number): Promise<Result<void, DriverError>>;
  configureIp(device: string, config: IpConfig): Promise<Result<void, DriverError>>;
  flushIp(device: string, config: IpConfig): Promise<Result<void, DriverError>>;
  setHostQos(device: string, qos: HostQos | null): Promise<Result<void, DriverError>>;
  /** null when the device does not exist */
  describe(device: string): Promise<Result<DeviceDescription | null, DriverError>>;
}

export interface RouteControlDriver {
  /** Install routes then rules; all or nothing */
  install(routes: Route[], rules: Rule[], device: string): Promise<Result<void, DriverError>>;
  remove(routes: Route[], rules: Rule[], device: string): Promise<Result<void, DriverError>>;
  listRoutesInTable(table: number): Promise<Result<Route[], DriverError>>;
  listRules(): Promise<Result<Rule[], DriverError>>;
}

/**
 * Answers which devices the virtualization control plane owns
 */
export interface TopologyOracle {
  listManagedDevices(): Promise<Result<string[], DriverError>>;
}
