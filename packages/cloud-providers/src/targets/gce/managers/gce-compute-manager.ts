/**
 * GCE Compute Manager
 *
 * Manages the single VPN VM: insert, power changes, delete, serial console
 * reads, plus the region and zone catalogue used by the zone picker.
 */

import { InstancesClient, RegionsClient, ZonesClient } from "@google-cloud/compute";
import type { GceInstanceInfo, GceInstanceLocation, GceLogCallback, VmInstanceConfig } from "../types";
import type { IGceComputeManager, IGceOperationManager } from "./interfaces";
import { isNotFoundError } from "../../../utils/provider-utils";

/** Serial port the startup script writes its public key announcement to. */
const CONSOLE_SERIAL_PORT = 1;

export class GceComputeManager implements IGceComputeManager {
  constructor(
    private readonly instancesClient: InstancesClient,
    private readonly regionsClient: RegionsClient,
    private readonly zonesClient: ZonesClient,
    private readonly operationManager: IGceOperationManager,
    private readonly project: string,
    private readonly log: GceLogCallback
  ) {}

  async insertInstance(config: VmInstanceConfig): Promise<void> {
    const { zone } = config;

    this.log(`Inserting instance ${config.name} (${config.machineType}) in ${zone}`, "stdout");

    const [operation] = await this.instancesClient.insert({
      project: this.project,
      zone,
      instanceResource: {
        name: config.name,
        machineType: `projects/${this.project}/zones/${zone}/machineTypes/${config.machineType}`,
        canIpForward: true,
        tags: { items: config.networkTags },
        disks: [
          {
            boot: true,
            autoDelete: true,
            type: "PERSISTENT",
            initializeParams: {
              sourceImage: config.sourceImage,
              diskSizeGb: String(config.bootDiskSizeGb),
              diskType: `projects/${this.project}/zones/${zone}/diskTypes/pd-balanced`,
            },
          },
        ],
        networkInterfaces: [
          {
            network: `projects/${this.project}/global/networks/${config.networkName}`,
            accessConfigs: [
              {
                name: "External NAT",
                type: "ONE_TO_ONE_NAT",
                networkTier: config.networkTier,
              },
            ],
          },
        ],
        metadata: {
          items: [{ key: "startup-script", value: config.startupScript }],
        },
      },
    });

    await this.operationManager.waitForOperation(
      operation,
      { kind: "zone", zone },
      { description: `create instance ${config.name}` }
    );
  }

  async getInstance(name: string, zone: string): Promise<GceInstanceInfo | null> {
    try {
      const [instance] = await this.instancesClient.get({
        project: this.project,
        zone,
        instance: name,
      });
      return {
        name: instance.name ?? name,
        status: String(instance.status ?? "UNKNOWN"),
        natIp: instance.networkInterfaces?.[0]?.accessConfigs?.[0]?.natIP ?? null,
      };
    } catch (error: unknown) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  }

  async startInstance(name: string, zone: string): Promise<void> {
    const [operation] = await this.instancesClient.start({
      project: this.project,
      zone,
      instance: name,
    });
    await this.operationManager.waitForOperation(
      operation,
      { kind: "zone", zone },
      { description: `start instance ${name}` }
    );
  }

  async stopInstance(name: string, zone: string): Promise<void> {
    const [operation] = await this.instancesClient.stop({
      project: this.project,
      zone,
      instance: name,
    });
    await this.operationManager.waitForOperation(
      operation,
      { kind: "zone", zone },
      { description: `stop instance ${name}` }
    );
  }

  async deleteInstance(name: string, zone: string): Promise<void> {
    const [operation] = await this.instancesClient.delete({
      project: this.project,
      zone,
      instance: name,
    });
    await this.operationManager.waitForOperation(
      operation,
      { kind: "zone", zone },
      { description: `delete instance ${name}` }
    );
  }

  async findInstances(namePrefix: string): Promise<GceInstanceLocation[]> {
    const found: GceInstanceLocation[] = [];
    const pages = this.instancesClient.aggregatedListAsync({
      project: this.project,
      filter: `name eq ${namePrefix}-.*`,
    });
    for await (const [scope, scoped] of pages) {
      // scope is "zones/<zone>"; instance.zone is a full URL ending in the same
      const zone = scope.split("/").pop() ?? scope;
      for (const instance of scoped.instances ?? []) {
        if (instance.name) {
          found.push({ name: instance.name, zone: instance.zone?.split("/").pop() ?? zone });
        }
      }
    }
    return found.sort((a, b) => a.name.localeCompare(b.name));
  }

  async getSerialPortOutput(name: string, zone: string): Promise<string> {
    const [output] = await this.instancesClient.getSerialPortOutput({
      project: this.project,
      zone,
      instance: name,
      port: CONSOLE_SERIAL_PORT,
    });
    return output.contents ?? "";
  }

  async listRegions(): Promise<string[]> {
    const names: string[] = [];
    for await (const region of this.regionsClient.listAsync({ project: this.project })) {
      if (region.name) names.push(region.name);
    }
    return names.sort();
  }

  async listZones(region: string): Promise<string[]> {
    const names: string[] = [];
    for await (const zone of this.zonesClient.listAsync({ project: this.project })) {
      // zone.region is a full URL ending in /regions/<name>
      const zoneRegion = zone.region?.split("/").pop();
      if (zone.name && zoneRegion === region) names.push(zone.name);
    }
    return names.sort();
  }
}
