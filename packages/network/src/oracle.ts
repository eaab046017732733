import { Result } from "better-result";
import type { DriverError } from "@hostnet/errors";
import type { TopologyOracle } from "./drivers";
import type { RunningConfig } from "./running-config";

/**
 * Oracle backed by the running config: a device is managed when it
 * carries one of the committed networks.
 */
export class RunningConfigOracle implements TopologyOracle {
  constructor(private readonly config: () => RunningConfig) {}

  async listManagedDevices(): Promise<Result<string[], DriverError>> {
    return Result.ok(this.config().topDevices());
  }
}
