/**
 * Host Network Manager
 *
 * Entry point for reconciling host networking with a desired topology.
 *
 * Usage:
 *   const manager = createIproute2Manager(config);
 *
 *   const result = await manager.applyTopology({
 *     networks: { mgmt: { nic: "eth0", ipaddr: "10.35.1.1", netmask: "255.255.254.0", gateway: "10.35.1.254" } },
 *   });
 *
 *   // Compare the committed config with what the kernel reports
 *   const live = await manager.queryLiveState();
 */

import { Result } from "better-result";
import type { DriverError, RollbackError, VerificationError } from "@hostnet/errors";
import { type Logger, createLogger, generateTransactionId, silentLogger } from "@hostnet/logger";
import { DEFAULT_CONFIG, type HostNetConfig } from "./config";
import type { DeviceControlDriver, LinkControlDriver, RouteControlDriver, TopologyOracle } from "./drivers";
import { Iproute2Driver } from "./iproute2";
import { type LinkFactory, openLink } from "./link";
import { LiveStateReader } from "./live-state";
import { type LiveState, assertConverged } from "./normalizer";
import { RunningConfigOracle } from "./oracle";
import { RunningConfig, type RunningConfigSnapshot } from "./running-config";
import { SourceRouteManager } from "./source-route";
import { TopologyPlanner } from "./topology";
import { type TransactionError, runTransaction } from "./transaction";
import type { ChangeSet } from "./types";
import { type ChangeSetError, validateChangeSet } from "./validation";

export interface HostNetworkManagerDeps {
  link: LinkControlDriver;
  devices: DeviceControlDriver;
  routes: RouteControlDriver;
  /** Defaults to an oracle answering from the running config */
  oracle?: TopologyOracle;
  config?: Partial<HostNetConfig>;
  /** Committed state to start from */
  running?: RunningConfig;
  logger?: Logger;
}

export interface ApplyOptions {
  /** Compare live state with the staged config before committing (default: true) */
  verify?: boolean;
  /** Aborts blocking link-up waits */
  signal?: AbortSignal;
}

export interface TransactionReport {
  transactionId: string;
  /** Steps applied */
  steps: number;
  running: RunningConfigSnapshot;
}

export interface TopologyFailure {
  transactionId: string;
  error: ChangeSetError | TransactionError;
  rollbackErrors: RollbackError[];
  /** Step that failed; absent when validation rejected the change-set */
  failedStep?: string;
}

export class HostNetworkManager {
  private running: RunningConfig;
  private readonly config: HostNetConfig;
  private readonly logger: Logger;
  private readonly sourceRoutes: SourceRouteManager;
  private readonly liveState: LiveStateReader;

  constructor(private readonly deps: HostNetworkManagerDeps) {
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
    this.running = deps.running?.clone() ?? new RunningConfig();
    this.logger = (deps.logger ?? silentLogger).child({ component: "manager" });
    this.sourceRoutes = new SourceRouteManager(
      deps.routes,
      this.linkFactory(),
      deps.oracle ?? new RunningConfigOracle(() => this.running),
      {
        autostartDir: this.config.autostartDir,
        autostartPrefix: this.config.autostartPrefix,
        logger: deps.logger,
      }
    );
    this.liveState = new LiveStateReader({ devices: deps.devices, sourceRoutes: this.sourceRoutes });
  }

  /** Copy of the committed config */
  runningConfig(): RunningConfig {
    return this.running.clone();
  }

  get sourceRouteManager(): SourceRouteManager {
    return this.sourceRoutes;
  }

  /**
   * Apply a change-set as one transaction. Nothing is touched when
   * validation fails; any later failure rolls back every applied step.
   */
  async applyTopology(
    changes: ChangeSet,
    options: ApplyOptions = {}
  ): Promise<Result<TransactionReport, TopologyFailure>> {
    const transactionId = generateTransactionId();
    const logger = (this.deps.logger ?? silentLogger).child({ transactionId, component: "transaction" });
    const links = this.linkFactory(options.signal, logger);

    logger.info("Applying topology change", {
      networks: Object.keys(changes.networks ?? {}),
      bonds: Object.keys(changes.bonds ?? {}),
    });

    const validated = await validateChangeSet(changes, {
      running: this.running,
      links,
      bondPrefix: this.config.bondPrefix,
    });
    if (validated.isErr()) {
      logger.warn("Change-set rejected", { error: validated.error.message, tag: validated.error._tag });
      return Result.err({ transactionId, error: validated.error, rollbackErrors: [] });
    }

    const staged = this.running.withChanges(changes);
    const planner = new TopologyPlanner({
      devices: this.deps.devices,
      links,
      sourceRoutes: this.sourceRoutes,
      logger,
    });
    const steps = planner.plan(changes, this.running);

    const applied = await runTransaction(steps, {
      logger,
      verify: options.verify === false ? undefined : () => this.verifyStaged(staged),
    });
    if (applied.isErr()) {
      const failure = applied.error;
      logger.error("Topology change rolled back", {
        error: failure.error.message,
        failedStep: failure.failedStep,
        rollbackErrors: failure.rollbackErrors.length,
      });
      return Result.err({ transactionId, ...failure });
    }

    this.running = staged;
    logger.info("Topology change committed", { steps: applied.unwrap() });
    return Result.ok({ transactionId, steps: applied.unwrap(), running: staged.toJSON() });
  }

  /**
   * Networks and bonds of the running config as the kernel reports them
   */
  async queryLiveState(): Promise<Result<LiveState, DriverError>> {
    return this.readLive(this.running);
  }

  verifyConvergence(desired: RunningConfigSnapshot, live: LiveState): Result<void, VerificationError> {
    return assertConverged(desired, live, { defaultMtu: this.config.defaultMtu });
  }

  private async verifyStaged(staged: RunningConfig): Promise<Result<void, TransactionError>> {
    const live = await this.readLive(staged);
    if (live.isErr()) {
      return Result.err(live.error);
    }
    const converged = this.verifyConvergence(staged.toJSON(), live.unwrap());
    if (converged.isErr()) {
      return Result.err(converged.error);
    }
    return Result.ok(undefined);
  }

  private readLive(config: RunningConfig): Promise<Result<LiveState, DriverError>> {
    const snapshot = config.toJSON();
    return this.liveState.read(snapshot.networks, Object.keys(snapshot.bonds));
  }

  private linkFactory(signal?: AbortSignal, logger?: Logger): LinkFactory {
    return (device) =>
      openLink(device, this.deps.link, {
        upTimeoutMs: this.config.upTimeoutMs,
        signal,
        logger: logger ?? this.deps.logger,
      });
  }
}

/**
 * Manager driving the host through iproute2
 */
export function createIproute2Manager(
  config: HostNetConfig = DEFAULT_CONFIG,
  logger: Logger = createLogger({ component: "hostnet" }, { level: config.logLevel })
): HostNetworkManager {
  const driver = new Iproute2Driver({ sysfsNet: config.sysfsNet, logger });
  return new HostNetworkManager({
    link: driver,
    devices: driver,
    routes: driver,
    config,
    logger,
  });
}
