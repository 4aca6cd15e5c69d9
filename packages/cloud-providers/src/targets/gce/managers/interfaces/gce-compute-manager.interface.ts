/**
 * GCE Compute Manager Interface
 *
 * Single-VM operations plus the region and zone catalogue.
 */

import type { GceInstanceInfo, GceInstanceLocation, VmInstanceConfig } from "../../types";

export interface IGceComputeManager {
  /** Insert a VM and wait for the insert operation. */
  insertInstance(config: VmInstanceConfig): Promise<void>;
  /** null when the instance does not exist */
  getInstance(name: string, zone: string): Promise<GceInstanceInfo | null>;
  startInstance(name: string, zone: string): Promise<void>;
  stopInstance(name: string, zone: string): Promise<void>;
  deleteInstance(name: string, zone: string): Promise<void>;
  /** Instances in any zone whose name starts with `${namePrefix}-`. */
  findInstances(namePrefix: string): Promise<GceInstanceLocation[]>;
  /** Contents of serial port 1 (the console the startup script writes to). */
  getSerialPortOutput(name: string, zone: string): Promise<string>;
  /** Region names, sorted. */
  listRegions(): Promise<string[]>;
  /** Zone names within a region, sorted. */
  listZones(region: string): Promise<string[]>;
}
