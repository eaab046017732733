/**
 * Device naming for a network's stack: southbound (NIC or bond), optional
 * VLAN device on top, optional bridge on top of that.
 */

import { netmaskToPrefix, prefixToNetmask } from "./ipv4";
import type { IpConfig, NetworkAttributes } from "./types";

/** The NIC or bond a network sits on, if any */
export function southboundOf(attrs: NetworkAttributes): string | undefined {
  return attrs.bonding ?? attrs.nic;
}

export function vlanDeviceName(southbound: string, tag: number): string {
  return `${southbound}.${tag}`;
}

/** VLAN device of the network, if it is tagged */
export function vlanDeviceOf(attrs: NetworkAttributes): string | undefined {
  const southbound = southboundOf(attrs);
  if (southbound === undefined || attrs.vlan === undefined) {
    return undefined;
  }
  return vlanDeviceName(southbound, attrs.vlan);
}

export function isBridged(attrs: NetworkAttributes): boolean {
  return attrs.bridged ?? true;
}

/**
 * Device carrying the network's addressing: the bridge (named after the
 * network) when bridged, else the VLAN device, else the NIC or bond.
 */
export function topDeviceOf(name: string, attrs: NetworkAttributes): string | undefined {
  if (isBridged(attrs)) {
    return name;
  }
  return vlanDeviceOf(attrs) ?? southboundOf(attrs);
}

/** Device the bridge enslaves, or the top device for bridgeless networks */
export function portDeviceOf(attrs: NetworkAttributes): string | undefined {
  return vlanDeviceOf(attrs) ?? southboundOf(attrs);
}

/** Netmask of a static network, from either netmask or prefix */
export function netmaskOf(attrs: Pick<NetworkAttributes, "netmask" | "prefix">): string | undefined {
  if (attrs.netmask !== undefined) {
    return attrs.netmask;
  }
  return attrs.prefix === undefined ? undefined : prefixToNetmask(attrs.prefix);
}

/**
 * Addressing to put on the top device, or null when the network is unaddressed
 */
export function ipConfigOf(attrs: NetworkAttributes): IpConfig | null {
  if (attrs.bootproto === "dhcp") {
    return { kind: "dhcp" };
  }
  if (attrs.ipaddr === undefined) {
    return null;
  }
  const prefixLen = attrs.prefix ?? (attrs.netmask === undefined ? null : netmaskToPrefix(attrs.netmask));
  if (prefixLen === null) {
    return null;
  }
  return { kind: "static", address: attrs.ipaddr, prefixLen };
}
