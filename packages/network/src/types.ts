/**
 * Shared data model for links, routes and topology change-sets
 */

export type SwitchKind = "legacy" | "ovs";

/** Regular kernel netdev, or a user-space poll-mode device */
export type DeviceKind = "kernel" | "poll-mode";

export type LinkState = "up" | "down";

// Kernel interface flags (linux/if.h)
export const IFF_UP = 0x1;
export const IFF_BROADCAST = 0x2;
export const IFF_LOOPBACK = 0x8;
export const IFF_POINTOPOINT = 0x10;
export const IFF_RUNNING = 0x40;
export const IFF_NOARP = 0x80;
export const IFF_PROMISC = 0x100;
export const IFF_MULTICAST = 0x1000;
export const IFF_LOWER_UP = 0x10000;

/**
 * Fresh snapshot of a link, never cached
 */
export interface LinkProperties {
  flags: number;
  /** Hardware address */
  address: string;
  mtu: number;
}

export interface LinkEvent {
  device: string;
  flags: number;
}

export interface Route {
  /** Destination in CIDR form; "0.0.0.0/0" for the default route */
  network: string;
  via?: string;
  src?: string;
  device: string;
  table?: number;
  scope?: "link" | "host" | "global";
}

export interface Rule {
  source?: string;
  destination?: string;
  /** Incoming interface (`iif`) */
  srcDevice?: string;
  table?: number;
  priority?: number;
}

export type IpConfig =
  | { kind: "static"; address: string; prefixLen: number }
  | { kind: "dhcp" };

/** HFSC service curve: m1/m2 in kbit/s, d in microseconds */
export interface HfscCurve {
  m1?: number;
  d?: number;
  m2?: number;
}

export type QosCurveName = "ls" | "ul" | "rt";

export interface HostQos {
  out?: Partial<Record<QosCurveName, HfscCurve>>;
}

export interface NetworkAttributes {
  nic?: string;
  bonding?: string;
  vlan?: number;
  /** Default: true */
  bridged?: boolean;
  ipaddr?: string;
  netmask?: string;
  prefix?: number;
  gateway?: string;
  bootproto?: "none" | "dhcp";
  mtu?: number;
  switch?: SwitchKind;
  hostQos?: HostQos;
}

export interface BondAttributes {
  nics: string[];
  /** Space separated key=value tokens, e.g. "mode=4 miimon=100" */
  options?: string;
  switch?: SwitchKind;
}

export interface RemoveRequest {
  remove: true;
}

export type NetworkRequest = NetworkAttributes | RemoveRequest;
export type BondRequest = BondAttributes | RemoveRequest;

/**
 * A batch of network and bond changes applied as one transaction.
 * An entry naming an existing network or bond is an edit.
 */
export interface ChangeSet {
  networks?: Record<string, NetworkRequest>;
  bonds?: Record<string, BondRequest>;
}

export function isRemoval(request: NetworkRequest | BondRequest): request is RemoveRequest {
  return "remove" in request && request.remove === true;
}

/**
 * Kernel view of a single device as reported by the device driver
 */
export interface DeviceDescription {
  name: string;
  type: "nic" | "bond" | "vlan" | "bridge" | "other";
  master?: string;
  /** Bridge ports */
  ports?: string[];
  /** Bond members */
  members?: string[];
  bondOptions?: Record<string, string>;
  vlan?: { base: string; tag: number };
  /** IPv4 addresses in CIDR form */
  addresses: string[];
  dhcp: boolean;
  /** sysfs reports MTU as text */
  mtu: number | string;
  switch: SwitchKind;
  hostQos?: HostQos;
}
