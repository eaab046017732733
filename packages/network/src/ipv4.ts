/**
 * IPv4 arithmetic used for routing tables and address validation
 */

/**
 * Check that a string is a dotted-quad IPv4 address
 */
export function isIPv4(ip: string): boolean {
  const parts = ip.split(".");
  return (
    parts.length === 4 &&
    parts.every((p) => /^\d{1,3}$/.test(p) && parseInt(p, 10) <= 255)
  );
}

/**
 * Convert an IP address string to a 32-bit number
 */
export function ipToNum(ip: string): number {
  if (!isIPv4(ip)) {
    throw new Error(`Invalid IPv4 address: ${ip}`);
  }
  const parts = ip.split(".").map((p) => parseInt(p, 10));
  return ((parts[0] << 24) | (parts[1] << 16) | (parts[2] << 8) | parts[3]) >>> 0;
}

/**
 * Convert a 32-bit number to an IP address string
 */
export function numToIP(num: number): string {
  return [
    (num >>> 24) & 0xff,
    (num >>> 16) & 0xff,
    (num >>> 8) & 0xff,
    num & 0xff,
  ].join(".");
}

/**
 * Convert prefix length to netmask string
 */
export function prefixToNetmask(prefixLen: number): string {
  const mask = prefixLen === 0 ? 0 : (0xffffffff << (32 - prefixLen)) >>> 0;
  return numToIP(mask);
}

/**
 * Convert a netmask to its prefix length, or null for a non-contiguous mask
 */
export function netmaskToPrefix(netmask: string): number | null {
  if (!isIPv4(netmask)) {
    return null;
  }
  const mask = ipToNum(netmask);
  const inverted = ~mask >>> 0;
  // contiguous masks invert to 2^n - 1
  if ((inverted & (inverted + 1)) !== 0) {
    return null;
  }
  return 32 - Math.log2(inverted + 1);
}

/**
 * Network CIDR of an address/mask pair, e.g. ("10.35.1.1", "255.255.254.0") -> "10.35.0.0/23"
 */
export function networkCidr(ip: string, netmask: string): string {
  const prefixLen = netmaskToPrefix(netmask);
  if (prefixLen === null) {
    throw new Error(`Invalid netmask: ${netmask}`);
  }
  const network = (ipToNum(ip) & ipToNum(netmask)) >>> 0;
  return `${numToIP(network)}/${prefixLen}`;
}

/**
 * Split "10.0.0.5/24" into its address and prefix length
 */
export function parseCIDR(cidr: string): { ip: string; prefixLen: number } {
  const [ip, prefixStr] = cidr.split("/");
  const prefixLen = prefixStr === undefined ? 32 : Number(prefixStr);
  if (!isIPv4(ip) || !Number.isInteger(prefixLen) || prefixLen < 0 || prefixLen > 32) {
    throw new Error(`Invalid CIDR: ${cidr}`);
  }
  return { ip, prefixLen };
}

/**
 * Routing table id owned by an address: the address's numeric value.
 * The same address always maps to the same table.
 */
export function tableIdFor(ip: string): number {
  return ipToNum(ip);
}
