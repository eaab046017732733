import { describe, it, expect } from "vitest";
import { VerificationError } from "@hostnet/errors";
import {
  assertConverged,
  compareConfigs,
  normalizeBond,
  normalizeBondOptions,
  normalizeHostQos,
  normalizeNetwork,
} from "../normalizer";
import type { RunningConfigSnapshot } from "../running-config";

describe("normalizeNetwork", () => {
  it("fills in defaults", () => {
    expect(normalizeNetwork({ nic: "eth0" })).toEqual({
      bridged: true,
      bootproto: "none",
      mtu: 1500,
      switch: "legacy",
      nic: "eth0",
    });
  });

  it("turns a prefix into a netmask", () => {
    const canonical = normalizeNetwork({ nic: "eth0", ipaddr: "10.0.0.5", prefix: 24 });

    expect(canonical.netmask).toBe("255.255.255.0");
    expect("prefix" in canonical).toBe(false);
  });

  it("ignores leased addressing", () => {
    const canonical = normalizeNetwork({
      nic: "eth0",
      bootproto: "dhcp",
      ipaddr: "192.0.2.50",
      netmask: "255.255.255.0",
      gateway: "192.0.2.1",
    });

    expect(canonical.ipaddr).toBeUndefined();
    expect(canonical.netmask).toBeUndefined();
    expect(canonical.gateway).toBeUndefined();
  });

  it("reads MTU reported as text", () => {
    expect(normalizeNetwork({ nic: "eth0", mtu: "9000\n" }).mtu).toBe(9000);
    expect(normalizeNetwork({ nic: "eth0" }, { defaultMtu: 9000 }).mtu).toBe(9000);
  });
});

describe("normalizeHostQos", () => {
  it("drops zero fields and empty curves", () => {
    expect(
      normalizeHostQos({ out: { ls: { m1: 0, d: 0, m2: 8000 }, ul: { m1: 0, d: 0 } } })
    ).toEqual({ out: { ls: { m2: 8000 } } });
  });

  it("treats an empty shape as no QoS", () => {
    expect(normalizeHostQos(undefined)).toBeUndefined();
    expect(normalizeHostQos({ out: {} })).toBeUndefined();
  });
});

describe("normalizeBondOptions", () => {
  it("sorts tokens and resolves mode names", () => {
    expect(normalizeBondOptions("mode=802.3ad miimon=100")).toEqual(["miimon=100", "mode=4"]);
  });

  it("reads the kernel's name-and-number values", () => {
    const kernel = { mode: "active-backup 1", miimon: "100", updelay: "0", xmit_hash_policy: "layer2+3 2" };

    expect(normalizeBondOptions(kernel)).toEqual([
      "miimon=100",
      "mode=1",
      "updelay=0",
      "xmit_hash_policy=layer2+3",
    ]);
    expect(normalizeBondOptions(kernel, new Set(["mode"]))).toEqual(["mode=1"]);
  });

  it("leaves unknown mode names alone", () => {
    expect(normalizeBondOptions("mode=fastest")).toEqual(["mode=fastest"]);
  });
});

describe("normalizeBond", () => {
  it("orders members", () => {
    expect(normalizeBond({ nics: ["eth2", "eth1"] })).toEqual({
      nics: ["eth1", "eth2"],
      options: [],
      switch: "legacy",
    });
  });
});

describe("compareConfigs", () => {
  const desired: RunningConfigSnapshot = {
    networks: {
      red: { nic: "eth0", ipaddr: "10.35.1.1", prefix: 23, gateway: "10.35.1.254" },
    },
    bonds: {
      bond0: { nics: ["eth1", "eth2"], options: "mode=4" },
    },
  };

  it("finds nothing when the live state matches", () => {
    const drifts = compareConfigs(desired, {
      networks: {
        red: {
          bridged: true,
          nic: "eth0",
          mtu: "1500",
          switch: "legacy",
          ipaddr: "10.35.1.1",
          netmask: "255.255.254.0",
          gateway: "10.35.1.254",
        },
      },
      bonds: {
        bond0: { nics: ["eth2", "eth1"], options: { mode: "802.3ad 4", miimon: "0" }, switch: "legacy" },
      },
    });

    expect(drifts).toEqual([]);
  });

  it("reports missing and unexpected entities", () => {
    const drifts = compareConfigs(desired, {
      networks: {},
      bonds: {
        bond0: { nics: ["eth1", "eth2"], options: { mode: "802.3ad 4" } },
        bond1: { nics: ["eth3"] },
      },
    });

    expect(drifts).toEqual([
      { entity: "network", name: "red", field: "exists", expected: true, actual: false },
      { entity: "bond", name: "bond1", field: "exists", expected: false, actual: true },
    ]);
  });

  it("reports each differing field", () => {
    const drifts = compareConfigs(desired, {
      networks: {
        red: { nic: "eth0", mtu: 9000, ipaddr: "10.35.1.1", netmask: "255.255.254.0", gateway: "10.35.1.254" },
      },
      bonds: {
        bond0: { nics: ["eth1"], options: { mode: "active-backup 1" } },
      },
    });

    expect(drifts).toEqual([
      { entity: "network", name: "red", field: "mtu", expected: 1500, actual: 9000 },
      { entity: "bond", name: "bond0", field: "nics", expected: ["eth1", "eth2"], actual: ["eth1"] },
      { entity: "bond", name: "bond0", field: "options", expected: ["mode=4"], actual: ["mode=1"] },
    ]);
  });
});

describe("assertConverged", () => {
  it("summarizes every drift in the error", () => {
    const result = assertConverged(
      { networks: { red: { nic: "eth0" } }, bonds: {} },
      { networks: {}, bonds: {} }
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(VerificationError.is(result.error)).toBe(true);
      expect(result.error.message).toBe(
        "Live state differs from running config: network red: exists expected true, got false"
      );
      expect(result.error.drifts).toHaveLength(1);
    }
  });

  it("passes a converged state", () => {
    expect(
      assertConverged({ networks: {}, bonds: {} }, { networks: {}, bonds: {} }).isOk()
    ).toBe(true);
  });
});
