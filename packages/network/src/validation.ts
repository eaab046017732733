/**
 * Change-set validation. Everything here runs before the first mutation;
 * the first failure aborts the transaction with nothing touched.
 */

import { Result } from "better-result";
import {
  InvalidNameError,
  NotFoundError,
  UsedDeviceError,
  ValidationError,
} from "@hostnet/errors";
import { isBridged, vlanDeviceOf } from "./devices";
import { isIPv4, netmaskToPrefix } from "./ipv4";
import type { LinkFactory } from "./link";
import type { RunningConfig } from "./running-config";
import { type BondAttributes, type ChangeSet, type NetworkAttributes, isRemoval } from "./types";

/** Kernel limit on interface names (IFNAMSIZ - 1) */
export const MAX_IFACE_NAME_LENGTH = 15;

const MAX_VLAN_TAG = 4094;

export type ChangeSetError = InvalidNameError | ValidationError | UsedDeviceError | NotFoundError;

export interface ValidationContext {
  running: RunningConfig;
  links: LinkFactory;
  /** Bond names are this prefix followed by digits */
  bondPrefix: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function isValidBondName(name: string, prefix = "bond"): boolean {
  return new RegExp(`^${escapeRegExp(prefix)}\\d+$`).test(name);
}

function addedNetworks(changes: ChangeSet): Array<[string, NetworkAttributes]> {
  const added: Array<[string, NetworkAttributes]> = [];
  for (const [name, request] of Object.entries(changes.networks ?? {})) {
    if (!isRemoval(request)) {
      added.push([name, request]);
    }
  }
  return added;
}

function addedBonds(changes: ChangeSet): Array<[string, BondAttributes]> {
  const added: Array<[string, BondAttributes]> = [];
  for (const [name, request] of Object.entries(changes.bonds ?? {})) {
    if (!isRemoval(request)) {
      added.push([name, request]);
    }
  }
  return added;
}

function removedBonds(changes: ChangeSet): Set<string> {
  return new Set(
    Object.entries(changes.bonds ?? {})
      .filter(([, request]) => isRemoval(request))
      .map(([name]) => name)
  );
}

/**
 * Every bond name, declared or referenced, must follow the naming convention
 */
export function checkNaming(
  changes: ChangeSet,
  bondPrefix: string
): Result<void, InvalidNameError> {
  const names = [
    ...Object.keys(changes.bonds ?? {}),
    ...addedNetworks(changes).flatMap(([, attrs]) => (attrs.bonding ? [attrs.bonding] : [])),
  ];
  for (const name of names) {
    if (!isValidBondName(name, bondPrefix)) {
      return Result.err(
        new InvalidNameError({
          message: `Bond name '${name}' is invalid: expected '${bondPrefix}' followed by digits`,
          bondName: name,
        })
      );
    }
  }
  return Result.ok(undefined);
}

function checkNetworkAttributes(
  name: string,
  attrs: NetworkAttributes
): string | null {
  if ((attrs.nic === undefined) === (attrs.bonding === undefined)) {
    return "exactly one of nic or bonding is required";
  }
  if (attrs.vlan !== undefined && !(Number.isInteger(attrs.vlan) && attrs.vlan >= 0 && attrs.vlan <= MAX_VLAN_TAG)) {
    return `vlan tag ${attrs.vlan} is not an integer in 0-${MAX_VLAN_TAG}`;
  }
  if (attrs.netmask !== undefined && attrs.prefix !== undefined) {
    return "netmask and prefix are mutually exclusive";
  }
  if (attrs.netmask !== undefined && netmaskToPrefix(attrs.netmask) === null) {
    return `netmask ${attrs.netmask} is invalid`;
  }
  if (attrs.prefix !== undefined && !(Number.isInteger(attrs.prefix) && attrs.prefix >= 0 && attrs.prefix <= 32)) {
    return `prefix ${attrs.prefix} is invalid`;
  }
  if (attrs.ipaddr !== undefined) {
    if (!isIPv4(attrs.ipaddr)) {
      return `ipaddr ${attrs.ipaddr} is not a valid IPv4 address`;
    }
    if (attrs.netmask === undefined && attrs.prefix === undefined) {
      return "static ipaddr requires netmask or prefix";
    }
    if (attrs.bootproto === "dhcp") {
      return "dhcp and static addressing are mutually exclusive";
    }
  }
  if (attrs.gateway !== undefined) {
    if (attrs.ipaddr === undefined) {
      return "gateway requires ipaddr";
    }
    if (!isIPv4(attrs.gateway)) {
      return `gateway ${attrs.gateway} is not a valid IPv4 address`;
    }
  }
  if (attrs.mtu !== undefined && !(Number.isInteger(attrs.mtu) && attrs.mtu > 0)) {
    return `mtu ${attrs.mtu} is not a positive integer`;
  }
  if (isBridged(attrs) && name.length > MAX_IFACE_NAME_LENGTH) {
    return `bridge name is longer than ${MAX_IFACE_NAME_LENGTH} characters`;
  }
  const vlanDevice = vlanDeviceOf(attrs);
  if (vlanDevice !== undefined && vlanDevice.length > MAX_IFACE_NAME_LENGTH) {
    return `vlan device name ${vlanDevice} is longer than ${MAX_IFACE_NAME_LENGTH} characters`;
  }
  return null;
}

function checkBondAttributes(attrs: BondAttributes): string | null {
  if (attrs.nics.length === 0) {
    return "bond requires at least one nic";
  }
  if (new Set(attrs.nics).size !== attrs.nics.length) {
    return "bond lists a nic more than once";
  }
  for (const token of (attrs.options ?? "").split(/\s+/).filter(Boolean)) {
    const [key, value] = token.split("=");
    if (!key || value === undefined || value === "") {
      return `bond option '${token}' is not key=value`;
    }
  }
  return null;
}

/**
 * Per-entity attribute checks, plus the checks that need the staged config
 */
export function checkParameters(
  changes: ChangeSet,
  running: RunningConfig
): Result<void, ValidationError> {
  const invalid = (entity: string, reason: string) =>
    Result.err(new ValidationError({ message: `${entity}: ${reason}`, entity }));

  for (const [name, request] of Object.entries(changes.bonds ?? {})) {
    if (isRemoval(request)) {
      if (!running.hasBond(name)) {
        return invalid(name, "cannot remove a bond that does not exist");
      }
      continue;
    }
    const reason = checkBondAttributes(request);
    if (reason) {
      return invalid(name, reason);
    }
  }

  const declaredBonds = new Map(addedBonds(changes));
  const removed = removedBonds(changes);

  for (const [name, request] of Object.entries(changes.networks ?? {})) {
    if (isRemoval(request)) {
      if (!running.hasNetwork(name)) {
        return invalid(name, "cannot remove a network that does not exist");
      }
      continue;
    }
    const reason = checkNetworkAttributes(name, request);
    if (reason) {
      return invalid(name, reason);
    }
    if (request.bonding !== undefined) {
      // a bond being removed is still "known" here; exclusivity reports it as in use
      const bond = declaredBonds.get(request.bonding) ?? running.bond(request.bonding);
      if (!bond) {
        return invalid(name, `bond ${request.bonding} does not exist and is not created`);
      }
      if (!removed.has(request.bonding) && (bond.switch ?? "legacy") !== (request.switch ?? "legacy")) {
        return invalid(
          name,
          `switch ${request.switch ?? "legacy"} does not match bond ${request.bonding} switch ${bond.switch ?? "legacy"}`
        );
      }
    }
  }

  // bonds may carry several networks: one untagged, the rest on distinct tags
  const staged = running.withChanges(changes);
  const slots = new Map<string, string>();
  for (const [name, attrs] of staged.networkEntries()) {
    if (attrs.bonding === undefined) {
      continue;
    }
    const slot = `${attrs.bonding}/${attrs.vlan ?? "untagged"}`;
    const other = slots.get(slot);
    if (other !== undefined) {
      return invalid(
        name,
        attrs.vlan === undefined
          ? `bond ${attrs.bonding} already carries untagged network ${other}`
          : `vlan ${attrs.vlan} on bond ${attrs.bonding} is already used by network ${other}`
      );
    }
    slots.set(slot, name);
  }

  return Result.ok(undefined);
}

/**
 * A NIC belongs to at most one bond or network. Claims are taken from the
 * running config without the entities this change-set removes or edits,
 * plus the change-set's own claims.
 */
export function checkExclusivity(
  changes: ChangeSet,
  running: RunningConfig
): Result<void, UsedDeviceError> {
  const staged = running.withChanges(changes);
  const claims = new Map<string, string>();

  const claim = (nic: string, owner: string): Result<void, UsedDeviceError> => {
    const current = claims.get(nic);
    if (current !== undefined && current !== owner) {
      return Result.err(
        new UsedDeviceError({
          message: `nic ${nic} is already in use by ${current}`,
          device: nic,
          owner: current,
          deviceType: "nic",
        })
      );
    }
    claims.set(nic, owner);
    return Result.ok(undefined);
  };

  // bonds first, so a conflict names the bond as the existing owner
  for (const [name, attrs] of staged.bondEntries()) {
    for (const nic of attrs.nics) {
      const claimed = claim(nic, `bond ${name}`);
      if (claimed.isErr()) {
        return Result.err(claimed.error);
      }
    }
  }
  for (const [name, attrs] of staged.networkEntries()) {
    if (attrs.nic !== undefined) {
      const claimed = claim(attrs.nic, `network ${name}`);
      if (claimed.isErr()) {
        return Result.err(claimed.error);
      }
    }
  }

  const removed = removedBonds(changes);
  for (const [name, attrs] of staged.networkEntries()) {
    if (attrs.bonding !== undefined && removed.has(attrs.bonding)) {
      return Result.err(
        new UsedDeviceError({
          message: `bond ${attrs.bonding} is still used by network ${name}`,
          device: attrs.bonding,
          owner: `network ${name}`,
          deviceType: "bond",
        })
      );
    }
  }

  return Result.ok(undefined);
}

/**
 * NICs newly claimed by the change-set must exist on the host
 */
export async function checkNicsExist(
  changes: ChangeSet,
  links: LinkFactory
): Promise<Result<void, NotFoundError>> {
  const nics = new Set<string>();
  for (const [, attrs] of addedBonds(changes)) {
    attrs.nics.forEach((nic) => nics.add(nic));
  }
  for (const [, attrs] of addedNetworks(changes)) {
    if (attrs.nic !== undefined) {
      nics.add(attrs.nic);
    }
  }

  for (const nic of nics) {
    if (!(await links(nic).exists())) {
      return Result.err(new NotFoundError({ message: `nic ${nic} does not exist`, device: nic }));
    }
  }
  return Result.ok(undefined);
}

/**
 * Run all checks in order: naming, parameters, exclusivity, existence
 */
export async function validateChangeSet(
  changes: ChangeSet,
  context: ValidationContext
): Promise<Result<void, ChangeSetError>> {
  const naming = checkNaming(changes, context.bondPrefix);
  if (naming.isErr()) {
    return Result.err(naming.error);
  }
  const parameters = checkParameters(changes, context.running);
  if (parameters.isErr()) {
    return Result.err(parameters.error);
  }
  const exclusivity = checkExclusivity(changes, context.running);
  if (exclusivity.isErr()) {
    return Result.err(exclusivity.error);
  }
  return checkNicsExist(changes, context.links);
}

