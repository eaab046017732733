import { describe, it, expect } from "vitest";
import { RunningConfigOracle } from "../oracle";
import { RunningConfig } from "../running-config";

describe("RunningConfig", () => {
  it("copies the snapshot it is built from", () => {
    const snapshot = { networks: { red: { nic: "eth0" } }, bonds: { bond0: { nics: ["eth1"] } } };
    const config = RunningConfig.fromJSON(snapshot);

    snapshot.bonds.bond0.nics.push("eth2");
    snapshot.networks.red.nic = "eth9";

    expect(config.bond("bond0")?.nics).toEqual(["eth1"]);
    expect(config.network("red")?.nic).toBe("eth0");
  });

  it("stages changes without touching the original", () => {
    const config = new RunningConfig({
      networks: { red: { nic: "eth0", mtu: 9000 }, blue: { nic: "eth1" } },
    });

    const staged = config.withChanges({
      networks: { red: { nic: "eth0" }, blue: { remove: true }, green: { nic: "eth2", bridged: false } },
    });

    expect(staged.toJSON()).toEqual({
      networks: { red: { nic: "eth0" }, green: { nic: "eth2", bridged: false } },
      bonds: {},
    });
    expect(config.hasNetwork("blue")).toBe(true);
    expect(config.network("red")?.mtu).toBe(9000);
  });

  it("adds, edits and removes bonds", () => {
    const config = new RunningConfig({ bonds: { bond0: { nics: ["eth1"] }, bond1: { nics: ["eth3"] } } });

    const staged = config.withChanges({
      bonds: { bond0: { nics: ["eth1", "eth2"], options: "mode=1" }, bond1: { remove: true }, bond2: { nics: ["eth4"] } },
    });

    expect(staged.bondEntries()).toEqual([
      ["bond0", { nics: ["eth1", "eth2"], options: "mode=1" }],
      ["bond2", { nics: ["eth4"] }],
    ]);
  });

  it("names the device carrying each network's addressing", () => {
    const config = new RunningConfig({
      networks: {
        red: { nic: "eth0" },
        blue: { bonding: "bond0", vlan: 100, bridged: false },
        green: { nic: "eth1", bridged: false },
      },
    });

    expect(config.topDevices()).toEqual(["red", "bond0.100", "eth1"]);
  });

  it("clones independently", () => {
    const config = new RunningConfig({ networks: { red: { nic: "eth0" } } });
    const copy = config.clone();

    const staged = copy.withChanges({ networks: { red: { remove: true } } });

    expect(staged.hasNetwork("red")).toBe(false);
    expect(copy.hasNetwork("red")).toBe(true);
    expect(config.toJSON()).toEqual(copy.toJSON());
  });
});

describe("RunningConfigOracle", () => {
  it("answers from the current config each time", async () => {
    let config = new RunningConfig({ networks: { red: { nic: "eth0" } } });
    const oracle = new RunningConfigOracle(() => config);

    expect((await oracle.listManagedDevices()).unwrap()).toEqual(["red"]);

    config = config.withChanges({ networks: { blue: { nic: "eth1", vlan: 20, bridged: false } } });
    expect((await oracle.listManagedDevices()).unwrap()).toEqual(["red", "eth1.20"]);
  });
});
