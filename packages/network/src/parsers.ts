/**
 * Parsers for iproute2 and tc text output
 */

import {
  IFF_BROADCAST,
  IFF_LOOPBACK,
  IFF_LOWER_UP,
  IFF_MULTICAST,
  IFF_NOARP,
  IFF_POINTOPOINT,
  IFF_PROMISC,
  IFF_RUNNING,
  IFF_UP,
  type HfscCurve,
  type HostQos,
  type QosCurveName,
  type Route,
  type Rule,
} from "./types";

const NAMED_TABLES: Record<string, number> = {
  default: 253,
  main: 254,
  local: 255,
};

const FLAG_NAMES: Record<string, number> = {
  UP: IFF_UP,
  BROADCAST: IFF_BROADCAST,
  LOOPBACK: IFF_LOOPBACK,
  POINTOPOINT: IFF_POINTOPOINT,
  RUNNING: IFF_RUNNING,
  NOARP: IFF_NOARP,
  PROMISC: IFF_PROMISC,
  MULTICAST: IFF_MULTICAST,
  LOWER_UP: IFF_LOWER_UP,
};

function parseTable(value: string): number | undefined {
  if (Object.prototype.hasOwnProperty.call(NAMED_TABLES, value)) {
    return NAMED_TABLES[value];
  }
  const table = Number(value);
  return Number.isInteger(table) ? table : undefined;
}

function parseDestination(value: string): string {
  if (value === "default") {
    return "0.0.0.0/0";
  }
  return value.includes("/") ? value : `${value}/32`;
}

/**
 * Parse one line of `ip -4 route show`:
 *
 *   default via 10.35.1.254 dev net1 table 170066177
 *   10.35.0.0/23 dev net1 proto kernel scope link src 10.35.1.1
 */
export function parseRoute(line: string): Route | null {
  const tokens = line.trim().split(/\s+/);
  // route type prefixes ("unicast", "local", ...) come before the destination
  if (["unicast", "local", "broadcast", "blackhole", "unreachable", "prohibit"].includes(tokens[0])) {
    tokens.shift();
  }
  const destination = tokens.shift();
  if (!destination) {
    return null;
  }

  const route: Partial<Route> = { network: parseDestination(destination) };
  for (let i = 0; i < tokens.length - 1; i++) {
    const value = tokens[i + 1];
    switch (tokens[i]) {
      case "via":
        route.via = value;
        break;
      case "dev":
        route.device = value;
        break;
      case "src":
        route.src = value;
        break;
      case "table":
        route.table = parseTable(value);
        break;
      case "scope":
        if (value === "link" || value === "host" || value === "global") {
          route.scope = value;
        }
        break;
      default:
        continue;
    }
    i++;
  }

  if (route.network === undefined || route.device === undefined) {
    return null;
  }
  const parsed: Route = { network: route.network, device: route.device };
  if (route.via !== undefined) parsed.via = route.via;
  if (route.src !== undefined) parsed.src = route.src;
  if (route.table !== undefined) parsed.table = route.table;
  if (route.scope !== undefined) parsed.scope = route.scope;
  return parsed;
}

/**
 * Parse one line of `ip -4 rule show`:
 *
 *   32764:	from all to 10.35.0.0/23 iif net1 lookup 170066177
 *   32765:	from 10.35.0.0/23 lookup 170066177
 */
export function parseRule(line: string): Rule | null {
  const match = /^(\d+):\s+(.*)$/.exec(line.trim());
  if (!match) {
    return null;
  }

  const rule: Rule = { priority: Number(match[1]) };
  const tokens = match[2].split(/\s+/);
  for (let i = 0; i < tokens.length - 1; i++) {
    const value = tokens[i + 1];
    switch (tokens[i]) {
      case "from":
        if (value !== "all") rule.source = value.includes("/") ? value : `${value}/32`;
        break;
      case "to":
        if (value !== "all") rule.destination = value.includes("/") ? value : `${value}/32`;
        break;
      case "iif":
      case "dev":
        rule.srcDevice = value;
        break;
      case "lookup":
      case "table":
        rule.table = parseTable(value);
        if (rule.table === undefined) delete rule.table;
        break;
      default:
        continue;
    }
    i++;
  }
  return rule;
}

/**
 * Flags from the `<UP,LOWER_UP,...>` list of `ip link`. "state UP" also
 * marks the link as running.
 */
export function parseLinkFlags(line: string): number {
  const list = /<([^>]*)>/.exec(line);
  let flags = 0;
  for (const name of list ? list[1].split(",") : []) {
    if (Object.prototype.hasOwnProperty.call(FLAG_NAMES, name)) {
      flags |= FLAG_NAMES[name];
    }
  }
  if (/\bstate UP\b/.test(line)) {
    flags |= IFF_RUNNING;
  }
  return flags;
}

export interface LinkLine {
  name: string;
  /** Lower device, for "eth0.100@eth0" */
  base?: string;
  flags: number;
  mtu?: number;
  master?: string;
  kind?: "bond" | "bridge" | "vlan";
  vlanId?: number;
}

/**
 * Parse one line of `ip -d -o link show`:
 *
 *   7: eth0.100@eth0: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 ... \    vlan protocol 802.1Q id 100 ...
 */
export function parseLinkLine(line: string): LinkLine | null {
  const header = /^(?:Deleted\s+)?\d+:\s+([^:@\s]+)(?:@([^:\s]+))?:/.exec(line.trim());
  if (!header) {
    return null;
  }

  const link: LinkLine = { name: header[1], flags: parseLinkFlags(line) };
  if (header[2] !== undefined && header[2] !== "NONE") {
    link.base = header[2];
  }
  const mtu = /\bmtu (\d+)/.exec(line);
  if (mtu) {
    link.mtu = Number(mtu[1]);
  }
  const master = /\bmaster (\S+)/.exec(line);
  if (master) {
    link.master = master[1];
  }

  const vlan = /\bvlan protocol \S+ id (\d+)/.exec(line);
  if (vlan) {
    link.kind = "vlan";
    link.vlanId = Number(vlan[1]);
  } else if (/\bbond mode /.test(line)) {
    link.kind = "bond";
  } else if (/\bbridge forward_delay /.test(line)) {
    link.kind = "bridge";
  }
  return link;
}

/**
 * Parse `ip -o -4 addr show` into CIDR addresses, noting leased ones
 */
export function parseAddresses(output: string): { addresses: string[]; dynamic: boolean } {
  const addresses: string[] = [];
  let dynamic = false;
  for (const line of output.split("\n")) {
    const inet = /\binet (\d+\.\d+\.\d+\.\d+\/\d+)/.exec(line);
    if (!inet) {
      continue;
    }
    addresses.push(inet[1]);
    if (/\bdynamic\b/.test(line)) {
      dynamic = true;
    }
  }
  return { addresses, dynamic };
}

const RATE_UNITS: Record<string, number> = {
  bit: 0.001,
  kbit: 1,
  mbit: 1000,
  gbit: 1000000,
  bps: 0.008,
  kbps: 8,
  mbps: 8000,
};

/**
 * tc rate in kbit/s: "8Mbit" -> 8000, "0bit" -> 0
 */
export function parseRate(value: string): number {
  const match = /^(\d+(?:\.\d+)?)([a-zA-Z]*)$/.exec(value);
  if (!match) {
    throw new Error(`Invalid rate: ${value}`);
  }
  const unit = match[2].toLowerCase() || "bit";
  if (!Object.prototype.hasOwnProperty.call(RATE_UNITS, unit)) {
    throw new Error(`Invalid rate unit: ${value}`);
  }
  return Number(match[1]) * RATE_UNITS[unit];
}

const TIME_UNITS: Record<string, number> = {
  us: 1,
  usec: 1,
  ms: 1000,
  msec: 1000,
  s: 1000000,
  sec: 1000000,
};

/**
 * tc time in microseconds: "5ms" -> 5000, "0us" -> 0
 */
export function parseTime(value: string): number {
  const match = /^(\d+(?:\.\d+)?)([a-z]*)$/.exec(value);
  if (!match) {
    throw new Error(`Invalid time: ${value}`);
  }
  const unit = match[2] || "us";
  if (!Object.prototype.hasOwnProperty.call(TIME_UNITS, unit)) {
    throw new Error(`Invalid time unit: ${value}`);
  }
  return Number(match[1]) * TIME_UNITS[unit];
}

function isCurveName(value: string): value is QosCurveName {
  return value === "ls" || value === "ul" || value === "rt";
}

/**
 * Parse an HFSC class line of `tc class show`:
 *
 *   class hfsc 1:1 parent 1: leaf 8001: ls m1 0bit d 0us m2 8Mbit ul m1 0bit d 0us m2 10Mbit
 *
 * Curves come back with every field, zero-valued ones included.
 */
export function parseHfscClass(line: string): HostQos | null {
  if (!/^class hfsc /.test(line.trim())) {
    return null;
  }
  const tokens = line.trim().split(/\s+/);
  const out: Partial<Record<QosCurveName, HfscCurve>> = {};

  for (let i = 0; i < tokens.length; i++) {
    const name = tokens[i];
    // "sc" sets rt and ls together
    if (!isCurveName(name) && name !== "sc") {
      continue;
    }
    const curve: HfscCurve = {};
    let j = i + 1;
    while (j < tokens.length - 1 && ["m1", "d", "m2"].includes(tokens[j])) {
      const value = tokens[j + 1];
      if (tokens[j] === "d") {
        curve.d = parseTime(value);
      } else if (tokens[j] === "m1") {
        curve.m1 = parseRate(value);
      } else {
        curve.m2 = parseRate(value);
      }
      j += 2;
    }
    if (name === "sc") {
      out.rt = { ...curve };
      out.ls = { ...curve };
    } else {
      out[name] = curve;
    }
    i = j - 1;
  }

  return Object.keys(out).length > 0 ? { out } : null;
}

/**
 * tc arguments for one HFSC curve: m1/m2 in kbit/s, d in microseconds
 */
export function formatHfscCurve(name: QosCurveName, curve: HfscCurve): string[] {
  const args: string[] = [name];
  if (curve.m1 !== undefined) args.push("m1", `${curve.m1}kbit`);
  if (curve.d !== undefined) args.push("d", `${curve.d}us`);
  args.push("m2", `${curve.m2 ?? 0}kbit`);
  return args;
}
