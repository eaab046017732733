/**
 * @hostnet/network
 *
 * Host network topology reconciliation.
 *
 * Features:
 * - Link up/down with blocking administrative and operational waits
 * - Per-address policy routing (source routes) with discovery-based removal
 * - Transactional network and bond changes with rollback
 * - Normalized comparison of running config and live kernel state
 *
 * @example
 * ```typescript
 * import { getErrorCode } from "@hostnet/errors";
 * import { createIproute2Manager, loadConfig } from "@hostnet/network";
 *
 * const manager = createIproute2Manager(loadConfig().unwrap());
 *
 * const result = await manager.applyTopology({
 *   bonds: { bond0: { nics: ["eth1", "eth2"], options: "mode=4 miimon=100" } },
 *   networks: {
 *     storage: { bonding: "bond0", vlan: 100, ipaddr: "10.0.0.5", prefix: 24, gateway: "10.0.0.1" },
 *   },
 * });
 * if (result.isErr()) {
 *   console.error(getErrorCode(result.error.error), result.error.error.message);
 * }
 * ```
 */

// Data model
export {
  IFF_BROADCAST,
  IFF_LOOPBACK,
  IFF_LOWER_UP,
  IFF_MULTICAST,
  IFF_NOARP,
  IFF_POINTOPOINT,
  IFF_PROMISC,
  IFF_RUNNING,
  IFF_UP,
  isRemoval,
  type BondAttributes,
  type BondRequest,
  type ChangeSet,
  type DeviceDescription,
  type DeviceKind,
  type HfscCurve,
  type HostQos,
  type IpConfig,
  type LinkEvent,
  type LinkProperties,
  type LinkState,
  type NetworkAttributes,
  type NetworkRequest,
  type QosCurveName,
  type RemoveRequest,
  type Route,
  type Rule,
  type SwitchKind,
} from "./types";

// Driver capabilities
export type {
  DeviceControlDriver,
  LinkControlDriver,
  LinkSubscription,
  PollModeDriver,
  RouteControlDriver,
  TopologyOracle,
} from "./drivers";

// Links
export {
  DEFAULT_UP_TIMEOUT_MS,
  Link,
  isLinkUp,
  openLink,
  randomIfaceName,
  type LinkFactory,
  type LinkOptions,
} from "./link";

// Source routing
export {
  SourceRouteManager,
  buildSourceRoute,
  type DiscoveredSourceRoute,
  type SourceRouteManagerOptions,
  type SourceRouteRecord,
  type SourceRouteRemoval,
} from "./source-route";

// Topology transactions
export { RunningConfig, type RunningConfigSnapshot } from "./running-config";
export { RunningConfigOracle } from "./oracle";
export {
  MAX_IFACE_NAME_LENGTH,
  checkExclusivity,
  checkNaming,
  checkNicsExist,
  checkParameters,
  isValidBondName,
  validateChangeSet,
  type ChangeSetError,
  type ValidationContext,
} from "./validation";
export {
  runTransaction,
  type StepError,
  type TopologyStep,
  type TransactionError,
  type TransactionFailure,
  type TransactionOptions,
  type Undo,
} from "./transaction";
export { TopologyPlanner, type TopologyPlannerDeps } from "./topology";
export {
  ipConfigOf,
  isBridged,
  netmaskOf,
  portDeviceOf,
  southboundOf,
  topDeviceOf,
  vlanDeviceName,
  vlanDeviceOf,
} from "./devices";

// Normalization and live state
export {
  DEFAULT_MTU,
  assertConverged,
  compareConfigs,
  normalizeBond,
  normalizeBondOptions,
  normalizeHostQos,
  normalizeNetwork,
  type CanonicalBond,
  type CanonicalNetwork,
  type LiveBond,
  type LiveNetwork,
  type LiveState,
  type NormalizeOptions,
} from "./normalizer";
export { LiveStateReader, type LiveStateReaderDeps } from "./live-state";

// iproute2 driver
export { Iproute2Driver, type Iproute2DriverOptions } from "./iproute2";
export { runCommand, watchLines, type CommandRunner, type LineWatcher } from "./command";
export {
  formatHfscCurve,
  parseAddresses,
  parseHfscClass,
  parseLinkFlags,
  parseLinkLine,
  parseRate,
  parseRoute,
  parseRule,
  parseTime,
  type LinkLine,
} from "./parsers";

// IPv4 helpers
export {
  ipToNum,
  isIPv4,
  netmaskToPrefix,
  networkCidr,
  numToIP,
  parseCIDR,
  prefixToNetmask,
  tableIdFor,
} from "./ipv4";

// Configuration and manager
export { DEFAULT_CONFIG, loadConfig, type HostNetConfig } from "./config";
export {
  HostNetworkManager,
  createIproute2Manager,
  type ApplyOptions,
  type HostNetworkManagerDeps,
  type TopologyFailure,
  type TransactionReport,
} from "./manager";
