import { describe, it, expect } from "vitest";
import { getErrorCode, InvalidNameError, NotFoundError, UsedDeviceError, ValidationError } from "@hostnet/errors";
import { openLink } from "../link";
import { RunningConfig } from "../running-config";
import type { ChangeSet } from "../types";
import {
  checkExclusivity,
  checkNaming,
  checkParameters,
  isValidBondName,
  validateChangeSet,
} from "../validation";
import { FakeKernel } from "./fake-kernel";

function parameterError(changes: ChangeSet, running = new RunningConfig()): string | undefined {
  const result = checkParameters(changes, running);
  return result.isErr() ? result.error.message : undefined;
}

describe("bond naming", () => {
  it.each(["bond0", "bond17"])("accepts %s", (name) => {
    expect(isValidBondName(name)).toBe(true);
    expect(checkNaming({ bonds: { [name]: { nics: ["eth0"] } } }, "bond").isOk()).toBe(true);
  });

  it.each(["bond", "bonda", "bond0a", "jamesbond007"])("rejects %s", (name) => {
    const result = checkNaming({ bonds: { [name]: { nics: ["eth0"] } } }, "bond");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(InvalidNameError.is(result.error)).toBe(true);
      expect(result.error.bondName).toBe(name);
      expect(getErrorCode(result.error)).toBe("ERR_BAD_BONDING");
    }
  });

  it("checks bonds referenced by networks", () => {
    const result = checkNaming({ networks: { red: { bonding: "bond0a" } } }, "bond");

    expect(result.isErr()).toBe(true);
  });

  it("honours a custom prefix", () => {
    expect(isValidBondName("agg3", "agg")).toBe(true);
    expect(isValidBondName("bond3", "agg")).toBe(false);
  });
});

describe("checkParameters", () => {
  it("accepts a well-formed change-set", () => {
    expect(
      parameterError({
        bonds: { bond0: { nics: ["eth1", "eth2"], options: "mode=4 miimon=100" } },
        networks: {
          red: { nic: "eth0", ipaddr: "10.0.0.5", prefix: 24, gateway: "10.0.0.1", mtu: 9000 },
          blue: { bonding: "bond0", vlan: 100, bootproto: "dhcp" },
          green: { bonding: "bond0", vlan: 200, bridged: false },
        },
      })
    ).toBeUndefined();
  });

  it("requires exactly one southbound device", () => {
    expect(parameterError({ networks: { red: { nic: "eth0", bonding: "bond0" } } })).toBe(
      "red: exactly one of nic or bonding is required"
    );
    expect(parameterError({ networks: { red: {} } })).toBe("red: exactly one of nic or bonding is required");
  });

  it("bounds the vlan tag", () => {
    expect(parameterError({ networks: { red: { nic: "eth0", vlan: 4095 } } })).toBe(
      "red: vlan tag 4095 is not an integer in 0-4094"
    );
    expect(parameterError({ networks: { red: { nic: "eth0", vlan: 0 } } })).toBeUndefined();
  });

  it("requires a mask with a static address", () => {
    expect(parameterError({ networks: { red: { nic: "eth0", ipaddr: "10.0.0.5" } } })).toBe(
      "red: static ipaddr requires netmask or prefix"
    );
  });

  it("rejects a non-contiguous netmask", () => {
    expect(
      parameterError({ networks: { red: { nic: "eth0", ipaddr: "10.0.0.5", netmask: "255.0.255.0" } } })
    ).toBe("red: netmask 255.0.255.0 is invalid");
  });

  it("requires an address with a gateway", () => {
    expect(parameterError({ networks: { red: { nic: "eth0", gateway: "10.0.0.1" } } })).toBe(
      "red: gateway requires ipaddr"
    );
  });

  it("rejects dhcp combined with a static address", () => {
    expect(
      parameterError({
        networks: { red: { nic: "eth0", bootproto: "dhcp", ipaddr: "10.0.0.5", prefix: 24 } },
      })
    ).toBe("red: dhcp and static addressing are mutually exclusive");
  });

  it("requires a positive integer mtu", () => {
    expect(parameterError({ networks: { red: { nic: "eth0", mtu: 0 } } })).toBe(
      "red: mtu 0 is not a positive integer"
    );
  });

  it("limits bridge names to the kernel's interface name length", () => {
    expect(parameterError({ networks: { "a-very-long-network": { nic: "eth0" } } })).toBe(
      "a-very-long-network: bridge name is longer than 15 characters"
    );
    expect(
      parameterError({ networks: { "a-very-long-network": { nic: "eth0", bridged: false } } })
    ).toBeUndefined();
  });

  it("requires bonds to have members", () => {
    expect(parameterError({ bonds: { bond0: { nics: [] } } })).toBe("bond0: bond requires at least one nic");
  });

  it("rejects malformed bond options", () => {
    expect(parameterError({ bonds: { bond0: { nics: ["eth1"], options: "mode" } } })).toBe(
      "bond0: bond option 'mode' is not key=value"
    );
  });

  it("rejects removal of unknown entities", () => {
    expect(parameterError({ networks: { red: { remove: true } } })).toBe(
      "red: cannot remove a network that does not exist"
    );
    expect(parameterError({ bonds: { bond0: { remove: true } } })).toBe(
      "bond0: cannot remove a bond that does not exist"
    );
  });

  it("rejects a reference to a bond that is not there", () => {
    expect(parameterError({ networks: { red: { bonding: "bond3" } } })).toBe(
      "red: bond bond3 does not exist and is not created"
    );
  });

  it("requires the network and its bond to share a switch kind", () => {
    expect(
      parameterError({
        bonds: { bond0: { nics: ["eth1"], switch: "ovs" } },
        networks: { red: { bonding: "bond0" } },
      })
    ).toBe("red: switch legacy does not match bond bond0 switch ovs");
  });

  it("allows one untagged network and distinct tags per bond", () => {
    const running = new RunningConfig({
      bonds: { bond0: { nics: ["eth1"] } },
      networks: { red: { bonding: "bond0" } },
    });

    expect(parameterError({ networks: { blue: { bonding: "bond0" } } }, running)).toBe(
      "blue: bond bond0 already carries untagged network red"
    );
    expect(parameterError({ networks: { blue: { bonding: "bond0", vlan: 10 } } }, running)).toBeUndefined();
  });
});

describe("checkExclusivity", () => {
  const running = new RunningConfig({
    bonds: { bond0: { nics: ["eth1", "eth2"] } },
    networks: {
      red: { nic: "eth0" },
      green: { bonding: "bond0" },
    },
  });

  it("rejects a nic already used by a network", () => {
    const result = checkExclusivity({ networks: { blue: { nic: "eth0" } } }, running);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(UsedDeviceError.is(result.error)).toBe(true);
      expect(result.error.device).toBe("eth0");
      expect(result.error.owner).toBe("network red");
      expect(result.error.message).toBe("nic eth0 is already in use by network red");
      expect(getErrorCode(result.error)).toBe("ERR_USED_NIC");
    }
  });

  it("rejects a nic already enslaved to a bond", () => {
    const result = checkExclusivity({ networks: { blue: { nic: "eth2" } } }, running);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.owner).toBe("bond bond0");
    }
  });

  it("rejects a new bond taking a network's nic", () => {
    const result = checkExclusivity({ bonds: { bond1: { nics: ["eth0", "eth3"] } } }, running);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.device).toBe("eth0");
    }
  });

  it("frees the nics of entities removed in the same change-set", () => {
    const result = checkExclusivity(
      { networks: { red: { remove: true }, blue: { nic: "eth0" } } },
      running
    );

    expect(result.isOk()).toBe(true);
  });

  it("frees the nics an edit stops using", () => {
    const result = checkExclusivity(
      {
        bonds: { bond0: { nics: ["eth1"] } },
        networks: { blue: { nic: "eth2" } },
      },
      running
    );

    expect(result.isOk()).toBe(true);
  });

  it("rejects two networks on the same nic", () => {
    const result = checkExclusivity(
      { networks: { blue: { nic: "eth5", vlan: 10 }, yellow: { nic: "eth5", vlan: 20 } } },
      running
    );

    expect(result.isErr()).toBe(true);
  });

  it("rejects removing a bond a network still uses", () => {
    const result = checkExclusivity({ bonds: { bond0: { remove: true } } }, running);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.deviceType).toBe("bond");
      expect(result.error.message).toBe("bond bond0 is still used by network green");
      expect(getErrorCode(result.error)).toBe("ERR_USED_BOND");
    }
  });
});

describe("validateChangeSet", () => {
  function context(running = new RunningConfig()) {
    const kernel = new FakeKernel().addNic("eth0").addNic("eth1");
    return { kernel, running, links: (device: string) => openLink(device, kernel), bondPrefix: "bond" };
  }

  it("rejects nics that do not exist", async () => {
    const result = await validateChangeSet({ networks: { red: { nic: "eth9" } } }, context());

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(NotFoundError.is(result.error)).toBe(true);
      expect(getErrorCode(result.error)).toBe("ERR_BAD_NIC");
    }
  });

  it("reports naming before parameters", async () => {
    const result = await validateChangeSet(
      { bonds: { jamesbond007: { nics: [] } } },
      context()
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(InvalidNameError.is(result.error)).toBe(true);
    }
  });

  it("reports parameters before exclusivity", async () => {
    const running = new RunningConfig({ networks: { red: { nic: "eth0" } } });
    const result = await validateChangeSet(
      { networks: { blue: { nic: "eth0", vlan: 5000 } } },
      context(running)
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(ValidationError.is(result.error)).toBe(true);
    }
  });

  it("accepts a valid change-set without touching the kernel", async () => {
    const ctx = context();
    const result = await validateChangeSet(
      { bonds: { bond0: { nics: ["eth0", "eth1"] } }, networks: { red: { bonding: "bond0" } } },
      ctx
    );

    expect(result.isOk()).toBe(true);
    expect(ctx.kernel.mutations).toEqual([]);
  });
});
