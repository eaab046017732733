/**
 * Config Normalizer / Comparator
 *
 * Brings the desired config and the state read back from the kernel into
 * one canonical shape, then diffs them field by field. Pure: nothing here
 * touches a driver.
 */

import { isDeepStrictEqual } from "node:util";
import { Result } from "better-result";
import { type Drift, VerificationError, formatDrift } from "@hostnet/errors";
import { netmaskOf } from "./devices";
import type { RunningConfigSnapshot } from "./running-config";
import type { BondAttributes, HfscCurve, HostQos, NetworkAttributes, QosCurveName, SwitchKind } from "./types";

export const DEFAULT_MTU = 1500;

/** Network as read back from the kernel; MTU may come back as text */
export interface LiveNetwork extends Omit<NetworkAttributes, "mtu"> {
  mtu?: number | string;
}

export interface LiveBond {
  nics: string[];
  /** Either "key=value" tokens or the kernel's full option table */
  options?: string | Record<string, string>;
  switch?: SwitchKind;
}

export interface LiveState {
  networks: Record<string, LiveNetwork>;
  bonds: Record<string, LiveBond>;
}

export interface CanonicalNetwork {
  bridged: boolean;
  vlan?: number;
  nic?: string;
  bonding?: string;
  ipaddr?: string;
  netmask?: string;
  gateway?: string;
  bootproto: "none" | "dhcp";
  mtu: number;
  switch: SwitchKind;
  hostQos?: HostQos;
}

export interface CanonicalBond {
  nics: string[];
  /** Sorted key=value tokens */
  options: string[];
  switch: SwitchKind;
}

export interface NormalizeOptions {
  defaultMtu?: number;
}

const BOND_MODES = new Map<string, number>([
  ["balance-rr", 0],
  ["active-backup", 1],
  ["balance-xor", 2],
  ["broadcast", 3],
  ["802.3ad", 4],
  ["balance-tlb", 5],
  ["balance-alb", 6],
]);

const CURVES: QosCurveName[] = ["ls", "rt", "ul"];

function normalizeCurve(curve: HfscCurve): HfscCurve | undefined {
  const normalized: HfscCurve = {};
  if (curve.m1 !== undefined && curve.m1 !== 0) {
    normalized.m1 = curve.m1;
  }
  if (curve.d !== undefined && curve.d !== 0) {
    normalized.d = curve.d;
  }
  if (curve.m2 !== undefined) {
    normalized.m2 = curve.m2;
  }
  return Object.keys(normalized).length > 0 ? normalized : undefined;
}

/**
 * Drop zero-valued m1 and d (the kernel reports them, requests omit them)
 * and any curve left empty
 */
export function normalizeHostQos(qos: HostQos | undefined): HostQos | undefined {
  if (!qos?.out) {
    return undefined;
  }
  const out: Partial<Record<QosCurveName, HfscCurve>> = {};
  for (const name of CURVES) {
    const curve = qos.out[name];
    const normalized = curve ? normalizeCurve(curve) : undefined;
    if (normalized) {
      out[name] = normalized;
    }
  }
  return Object.keys(out).length > 0 ? { out } : undefined;
}

function normalizeMtu(mtu: number | string | undefined, defaultMtu: number): number {
  if (mtu === undefined) {
    return defaultMtu;
  }
  return typeof mtu === "number" ? mtu : Number(mtu.trim());
}

export function normalizeNetwork(
  attrs: NetworkAttributes | LiveNetwork,
  options: NormalizeOptions = {}
): CanonicalNetwork {
  const bootproto = attrs.bootproto ?? "none";
  const canonical: CanonicalNetwork = {
    bridged: attrs.bridged ?? true,
    bootproto,
    mtu: normalizeMtu(attrs.mtu, options.defaultMtu ?? DEFAULT_MTU),
    switch: attrs.switch ?? "legacy",
  };
  if (attrs.vlan !== undefined) {
    canonical.vlan = attrs.vlan;
  }
  if (attrs.nic !== undefined) {
    canonical.nic = attrs.nic;
  }
  if (attrs.bonding !== undefined) {
    canonical.bonding = attrs.bonding;
  }
  // leased addressing is not part of the intent
  if (bootproto !== "dhcp") {
    if (attrs.ipaddr !== undefined) {
      canonical.ipaddr = attrs.ipaddr;
    }
    const netmask = netmaskOf(attrs);
    if (netmask !== undefined) {
      canonical.netmask = netmask;
    }
    if (attrs.gateway !== undefined) {
      canonical.gateway = attrs.gateway;
    }
  }
  const hostQos = normalizeHostQos(attrs.hostQos);
  if (hostQos) {
    canonical.hostQos = hostQos;
  }
  return canonical;
}

function canonicalOptionValue(key: string, value: string): string {
  const parts = value.trim().split(/\s+/);
  // the kernel reports "<name> <number>", e.g. "802.3ad 4"
  if (parts.length === 2 && /^\d+$/.test(parts[1])) {
    return key === "mode" ? parts[1] : parts[0];
  }
  const mode = key === "mode" ? BOND_MODES.get(value.trim()) : undefined;
  if (mode !== undefined) {
    return String(mode);
  }
  return value.trim();
}

function optionEntries(options: string | Record<string, string> | undefined): Array<[string, string]> {
  if (options === undefined) {
    return [];
  }
  if (typeof options !== "string") {
    return Object.entries(options);
  }
  return options
    .split(/\s+/)
    .filter(Boolean)
    .map((token): [string, string] => {
      const index = token.indexOf("=");
      return index < 0 ? [token, ""] : [token.slice(0, index), token.slice(index + 1)];
    });
}

/**
 * Bond options as sorted key=value tokens. With `onlyKeys`, keys outside
 * the set are dropped.
 */
export function normalizeBondOptions(
  options: string | Record<string, string> | undefined,
  onlyKeys?: ReadonlySet<string>
): string[] {
  return optionEntries(options)
    .filter(([key]) => !onlyKeys || onlyKeys.has(key))
    .map(([key, value]) => `${key}=${canonicalOptionValue(key, value)}`)
    .sort();
}

export function normalizeBond(
  attrs: BondAttributes | LiveBond,
  onlyKeys?: ReadonlySet<string>
): CanonicalBond {
  return {
    nics: [...attrs.nics].sort(),
    options: normalizeBondOptions(attrs.options, onlyKeys),
    switch: attrs.switch ?? "legacy",
  };
}

function diffFields<T extends object>(
  entity: Drift["entity"],
  name: string,
  expected: T,
  actual: T
): Drift[] {
  const drifts: Drift[] = [];
  const fields = new Set([...Object.keys(expected), ...Object.keys(actual)]);
  for (const field of fields) {
    const want: unknown = Reflect.get(expected, field);
    const got: unknown = Reflect.get(actual, field);
    if (!isDeepStrictEqual(want, got)) {
      drifts.push({ entity, name, field, expected: want, actual: got });
    }
  }
  return drifts;
}

/**
 * Every difference between the desired config and the live state.
 * An empty list means converged.
 */
export function compareConfigs(
  desired: RunningConfigSnapshot,
  live: LiveState,
  options: NormalizeOptions = {}
): Drift[] {
  const drifts: Drift[] = [];

  for (const [name, attrs] of Object.entries(desired.networks)) {
    const actual = live.networks[name];
    if (!actual) {
      drifts.push({ entity: "network", name, field: "exists", expected: true, actual: false });
      continue;
    }
    drifts.push(
      ...diffFields("network", name, normalizeNetwork(attrs, options), normalizeNetwork(actual, options))
    );
  }
  for (const name of Object.keys(live.networks)) {
    if (!(name in desired.networks)) {
      drifts.push({ entity: "network", name, field: "exists", expected: false, actual: true });
    }
  }

  for (const [name, attrs] of Object.entries(desired.bonds)) {
    const actual = live.bonds[name];
    if (!actual) {
      drifts.push({ entity: "bond", name, field: "exists", expected: true, actual: false });
      continue;
    }
    // the kernel reports every option; compare only the requested ones
    const keys = new Set(optionEntries(attrs.options).map(([key]) => key));
    drifts.push(...diffFields("bond", name, normalizeBond(attrs, keys), normalizeBond(actual, keys)));
  }
  for (const name of Object.keys(live.bonds)) {
    if (!(name in desired.bonds)) {
      drifts.push({ entity: "bond", name, field: "exists", expected: false, actual: true });
    }
  }

  return drifts;
}

export function assertConverged(
  desired: RunningConfigSnapshot,
  live: LiveState,
  options: NormalizeOptions = {}
): Result<void, VerificationError> {
  const drifts = compareConfigs(desired, live, options);
  if (drifts.length === 0) {
    return Result.ok(undefined);
  }
  return Result.err(
    new VerificationError({
      message: `Live state differs from running config: ${drifts.map(formatDrift).join("; ")}`,
      drifts,
    })
  );
}
