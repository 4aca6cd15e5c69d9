/**
 * GCE Gateway
 *
 * Remote control of a single WireGuard VM on Google Compute Engine.
 *
 *   Client → Firewall (udp/<port>, tag-scoped) → VM (ephemeral public IP) → wg0
 *
 * Every call is keyed by instance name and zone and classifies client
 * library failures into the VPN error taxonomy. Calls against an instance
 * that does not exist report that instead of failing.
 */

import { silentLog } from "@vpnkeeper/core";
import type {
  Ack,
  InstanceCreateSpec,
  InstanceDescription,
  InstanceLocator,
  InstanceRef,
  RemoteControlGateway,
  RemoteStatus,
  VpnError,
} from "@vpnkeeper/core";
import { classifyGcpError, isAlreadyExistsError } from "../../utils/provider-utils";
import type { GceConfig } from "./gce-config";
import { GceManagerFactory } from "./gce-manager-factory";
import type { GceManagers } from "./gce-manager-factory";
import type { IGceComputeManager, IGceNetworkManager } from "./managers/interfaces";
import type { FirewallRule, GceInstanceStatus, GceLogCallback } from "./types";

const DEFAULT_NETWORK_NAME = "default";

const STATUS_MAP: Record<GceInstanceStatus, RemoteStatus> = {
  RUNNING: "RUNNING",
  TERMINATED: "STOPPED",
  STOPPED: "STOPPED",
  SUSPENDED: "STOPPED",
  PROVISIONING: "UNKNOWN",
  STAGING: "UNKNOWN",
  STOPPING: "UNKNOWN",
  SUSPENDING: "UNKNOWN",
  REPAIRING: "UNKNOWN",
};

function isGceInstanceStatus(status: string): status is GceInstanceStatus {
  return Object.prototype.hasOwnProperty.call(STATUS_MAP, status);
}

export function toRemoteStatus(providerStatus: string): RemoteStatus {
  return isGceInstanceStatus(providerStatus) ? STATUS_MAP[providerStatus] : "UNKNOWN";
}

export interface GceGatewayOptions {
  config: GceConfig;
  managers?: GceManagers;
  log?: GceLogCallback;
}

export class GceRemoteGateway implements RemoteControlGateway {
  private readonly config: GceConfig;
  private readonly networkName: string;
  private readonly log: GceLogCallback;

  // Managers
  private readonly networkManager: IGceNetworkManager;
  private readonly computeManager: IGceComputeManager;

  constructor(options: GceGatewayOptions) {
    this.config = options.config;
    this.networkName = options.config.networkName ?? DEFAULT_NETWORK_NAME;
    this.log = options.log ?? silentLog;

    const managers =
      options.managers ?? GceManagerFactory.createManagers({ ...options.config, log: this.log });
    this.networkManager = managers.networkManager;
    this.computeManager = managers.computeManager;
  }

  async create(spec: InstanceCreateSpec): Promise<InstanceRef> {
    if (spec.firewall) {
      const rule: FirewallRule = {
        protocol: "udp",
        ports: [String(spec.firewall.port)],
        sourceRanges: ["0.0.0.0/0"],
        targetTags: spec.tags,
        description: "WireGuard VPN",
      };
      try {
        await this.networkManager.ensureFirewall(spec.firewall.name, this.networkName, [rule]);
      } catch (error: unknown) {
        throw this.classify(error, spec.firewall.name);
      }
    }

    try {
      await this.computeManager.insertInstance({
        name: spec.name,
        zone: spec.zone,
        machineType: spec.machineType,
        sourceImage: spec.sourceImage,
        bootDiskSizeGb: spec.diskSizeGb,
        networkName: this.networkName,
        networkTier: spec.networkTier,
        networkTags: spec.tags,
        startupScript: spec.bootScript,
      });
    } catch (error: unknown) {
      if (isAlreadyExistsError(error)) {
        this.log(`Instance ${spec.name} already exists in ${spec.zone}`, "stdout");
        return { name: spec.name, zone: spec.zone, alreadyExisted: true };
      }
      throw this.classify(error, spec.name);
    }

    return { name: spec.name, zone: spec.zone, alreadyExisted: false };
  }

  async describe(instance: InstanceLocator): Promise<InstanceDescription | null> {
    try {
      const info = await this.computeManager.getInstance(instance.name, instance.zone);
      if (!info) return null;
      return {
        status: toRemoteStatus(info.status),
        providerStatus: info.status,
        externalIp: info.natIp,
      };
    } catch (error: unknown) {
      throw this.classify(error, instance.name);
    }
  }

  start(instance: InstanceLocator): Promise<Ack> {
    return this.act(instance, () => this.computeManager.startInstance(instance.name, instance.zone));
  }

  stop(instance: InstanceLocator): Promise<Ack> {
    return this.act(instance, () => this.computeManager.stopInstance(instance.name, instance.zone));
  }

  delete(instance: InstanceLocator): Promise<Ack> {
    return this.act(instance, () => this.computeManager.deleteInstance(instance.name, instance.zone));
  }

  async findInstances(namePrefix: string): Promise<InstanceLocator[]> {
    try {
      return await this.computeManager.findInstances(namePrefix);
    } catch (error: unknown) {
      throw this.classify(error, `instances named ${namePrefix}-*`);
    }
  }

  async readBootOutput(instance: InstanceLocator): Promise<string> {
    try {
      return await this.computeManager.getSerialPortOutput(instance.name, instance.zone);
    } catch (error: unknown) {
      throw this.classify(error, instance.name);
    }
  }

  async listRegions(): Promise<string[]> {
    try {
      return await this.computeManager.listRegions();
    } catch (error: unknown) {
      throw this.classify(error, `projects/${this.config.projectId}/regions`);
    }
  }

  async listZones(region: string): Promise<string[]> {
    try {
      return await this.computeManager.listZones(region);
    } catch (error: unknown) {
      throw this.classify(error, `regions/${region}`);
    }
  }

  /** Runs a power or delete call; a missing instance acks "not-found". */
  private async act(instance: InstanceLocator, call: () => Promise<void>): Promise<Ack> {
    try {
      await call();
      return "ok";
    } catch (error: unknown) {
      const classified = this.classify(error, instance.name);
      if (classified.kind === "RESOURCE_NOT_FOUND") {
        this.log(`Instance ${instance.name} not found in ${instance.zone}`, "stderr");
        return "not-found";
      }
      throw classified;
    }
  }

  private classify(error: unknown, resourceName: string): VpnError {
    return classifyGcpError(error, resourceName, this.config.projectId);
  }
}
