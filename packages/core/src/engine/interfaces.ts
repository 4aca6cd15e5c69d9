/**
 * Collaborator contracts consumed by the Reconciliation Engine.
 *
 * Implementations live outside the core (GCE, wg-quick, ipinfo). All
 * remote calls are keyed by instance name and zone and are safe to make
 * against an instance that does not exist.
 */

import type { NetworkTier } from "../config/vpn-config";
import type { Peer } from "../peers/peer";
import type { RemoteStatus } from "../state/state-record";

export interface InstanceLocator {
  name: string;
  zone: string;
}

export interface FirewallSpec {
  name: string;
  /** UDP port opened to the instance tags */
  port: number;
}

export interface InstanceCreateSpec extends InstanceLocator {
  region: string;
  machineType: string;
  sourceImage: string;
  diskSizeGb: number;
  tags: string[];
  networkTier: NetworkTier;
  bootScript: string;
  /** Ensured before the instance is created; null leaves firewalls alone */
  firewall: FirewallSpec | null;
}

export interface InstanceRef extends InstanceLocator {
  /** True when the instance already existed and create was a no-op */
  alreadyExisted: boolean;
}

export interface InstanceDescription {
  status: RemoteStatus;
  /** Raw provider status, e.g. STAGING or TERMINATED */
  providerStatus: string;
  externalIp: string | null;
}

/** "not-found" means there was nothing to act on; it is not a failure. */
export type Ack = "ok" | "not-found";

export interface RemoteControlGateway {
  create(spec: InstanceCreateSpec): Promise<InstanceRef>;
  delete(instance: InstanceLocator): Promise<Ack>;
  start(instance: InstanceLocator): Promise<Ack>;
  stop(instance: InstanceLocator): Promise<Ack>;
  /** null when the instance does not exist */
  describe(instance: InstanceLocator): Promise<InstanceDescription | null>;
  /** Instances in any zone whose name starts with `${namePrefix}-` */
  findInstances(namePrefix: string): Promise<InstanceLocator[]>;
  /** Throws ResourceNotFoundError when the instance does not exist */
  readBootOutput(instance: InstanceLocator): Promise<string>;
  listRegions(): Promise<string[]>;
  listZones(region: string): Promise<string[]>;
}

export interface LocalTunnelController {
  /** No-op when the interface is already up */
  up(configPath: string): Promise<void>;
  /** No-op when the interface is already down */
  down(configPath: string): Promise<void>;
  isUp(interfaceName: string): Promise<boolean>;
}

export interface PublicAddress {
  ip: string;
  country: string | null;
}

export interface PublicAddressLookup {
  /** null when the lookup service could not be reached */
  lookup(): Promise<PublicAddress | null>;
}

export interface ConnectivityProbe {
  /** null when the check itself could not run */
  isReachable(host: string): Promise<boolean | null>;
}

/** Produces the startup script for a new instance with the given peers baked in. */
export interface BootScriptProvider {
  build(peers: readonly Peer[]): Promise<string>;
}
