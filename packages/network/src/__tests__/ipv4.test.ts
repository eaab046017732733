import { describe, it, expect } from "vitest";
import {
  isIPv4,
  ipToNum,
  netmaskToPrefix,
  networkCidr,
  numToIP,
  parseCIDR,
  prefixToNetmask,
  tableIdFor,
} from "../ipv4";

describe("ipv4", () => {
  it("validates dotted quads", () => {
    expect(isIPv4("10.35.1.1")).toBe(true);
    expect(isIPv4("255.255.255.255")).toBe(true);
    expect(isIPv4("256.0.0.1")).toBe(false);
    expect(isIPv4("10.0.0")).toBe(false);
    expect(isIPv4("fe80::1")).toBe(false);
    expect(isIPv4("10.0.0.1a")).toBe(false);
  });

  it("converts between addresses and numbers", () => {
    expect(ipToNum("10.35.1.1")).toBe(170066177);
    expect(numToIP(170066177)).toBe("10.35.1.1");
    expect(ipToNum("255.255.255.255")).toBe(0xffffffff);
    expect(() => ipToNum("300.1.1.1")).toThrow("Invalid IPv4 address: 300.1.1.1");
  });

  it("converts between prefixes and netmasks", () => {
    expect(prefixToNetmask(23)).toBe("255.255.254.0");
    expect(prefixToNetmask(0)).toBe("0.0.0.0");
    expect(prefixToNetmask(32)).toBe("255.255.255.255");
    expect(netmaskToPrefix("255.255.254.0")).toBe(23);
    expect(netmaskToPrefix("0.0.0.0")).toBe(0);
    expect(netmaskToPrefix("255.255.255.255")).toBe(32);
  });

  it("rejects non-contiguous netmasks", () => {
    expect(netmaskToPrefix("255.0.255.0")).toBeNull();
    expect(netmaskToPrefix("not-a-mask")).toBeNull();
    expect(() => networkCidr("10.0.0.1", "255.0.255.0")).toThrow("Invalid netmask: 255.0.255.0");
  });

  it("computes the network of an address", () => {
    expect(networkCidr("10.35.1.1", "255.255.254.0")).toBe("10.35.0.0/23");
    expect(networkCidr("192.168.10.5", "255.255.255.0")).toBe("192.168.10.0/24");
  });

  it("parses CIDR notation", () => {
    expect(parseCIDR("10.0.0.5/24")).toEqual({ ip: "10.0.0.5", prefixLen: 24 });
    expect(parseCIDR("10.0.0.5")).toEqual({ ip: "10.0.0.5", prefixLen: 32 });
    expect(() => parseCIDR("10.0.0.5/33")).toThrow("Invalid CIDR: 10.0.0.5/33");
  });

  it("derives a stable table per address", () => {
    expect(tableIdFor("10.35.1.1")).toBe(170066177);
    expect(tableIdFor("10.35.1.1")).toBe(tableIdFor("10.35.1.1"));
    expect(tableIdFor("10.35.1.2")).not.toBe(tableIdFor("10.35.1.1"));
  });
});
