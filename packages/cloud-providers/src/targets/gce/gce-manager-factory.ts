/**
 * GCE Manager Factory
 *
 * Creates and wires up the GCE managers with their SDK clients.
 */

import {
  InstancesClient,
  FirewallsClient,
  RegionsClient,
  ZonesClient,
  GlobalOperationsClient,
  ZoneOperationsClient,
} from "@google-cloud/compute";

import { GceOperationManager } from "./managers/gce-operation-manager";
import { GceNetworkManager } from "./managers/gce-network-manager";
import { GceComputeManager } from "./managers/gce-compute-manager";
import type { IGceOperationManager, IGceNetworkManager, IGceComputeManager } from "./managers/interfaces";
import type { GceConfig } from "./gce-config";
import type { GceLogCallback } from "./types";

export interface GceManagerFactoryConfig extends GceConfig {
  log: GceLogCallback;
}

/**
 * Collection of all GCE managers.
 */
export interface GceManagers {
  /** Operation manager for waiting on async GCE operations */
  operationManager: IGceOperationManager;
  /** Network manager for firewall rules */
  networkManager: IGceNetworkManager;
  /** Compute manager for the VM and the region/zone catalogue */
  computeManager: IGceComputeManager;
}

export class GceManagerFactory {
  static createManagers(config: GceManagerFactoryConfig): GceManagers {
    const { projectId, keyFilePath, log } = config;

    const clientOptions = keyFilePath ? { keyFilename: keyFilePath } : {};

    // SDK clients
    const instancesClient = new InstancesClient(clientOptions);
    const firewallsClient = new FirewallsClient(clientOptions);
    const regionsClient = new RegionsClient(clientOptions);
    const zonesClient = new ZonesClient(clientOptions);
    const globalOperationsClient = new GlobalOperationsClient(clientOptions);
    const zoneOperationsClient = new ZoneOperationsClient(clientOptions);

    // Operation manager (dependency for other managers)
    const operationManager = new GceOperationManager(
      globalOperationsClient,
      zoneOperationsClient,
      projectId,
      log,
      {
        timeoutMs: config.operationTimeoutMs,
        pollIntervalMs: config.operationPollIntervalMs,
      }
    );

    const networkManager = new GceNetworkManager(firewallsClient, operationManager, projectId, log);

    const computeManager = new GceComputeManager(
      instancesClient,
      regionsClient,
      zonesClient,
      operationManager,
      projectId,
      log
    );

    return { operationManager, networkManager, computeManager };
  }
}
