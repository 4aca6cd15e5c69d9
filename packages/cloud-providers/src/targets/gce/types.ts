/**
 * GCE Gateway Type Definitions
 *
 * Shared types for the GCE gateway and its managers.
 */

import type { LogCallback } from "@vpnkeeper/core";

export type GceLogCallback = LogCallback;

/**
 * Instance status values reported by the Compute Engine API.
 */
export type GceInstanceStatus =
  | "PROVISIONING"
  | "STAGING"
  | "RUNNING"
  | "STOPPING"
  | "STOPPED"
  | "SUSPENDING"
  | "SUSPENDED"
  | "REPAIRING"
  | "TERMINATED";

/**
 * The parts of an instance resource the gateway reads.
 */
export interface GceInstanceLocation {
  name: string;
  zone: string;
}

export interface GceInstanceInfo {
  name: string;
  /** Raw status string; "UNKNOWN" when the API omitted it */
  status: string;
  /** Ephemeral external address of the first access config */
  natIp: string | null;
}

/**
 * Firewall rule definition.
 */
export interface FirewallRule {
  /** TCP/UDP ports to allow */
  ports: string[];
  /** IP protocol (tcp, udp, icmp, ...) */
  protocol: string;
  /** Source IP ranges in CIDR notation */
  sourceRanges: string[];
  /** Target network tags */
  targetTags: string[];
  description?: string;
}

/**
 * Everything needed to insert a single VM.
 */
export interface VmInstanceConfig {
  name: string;
  zone: string;
  machineType: string;
  sourceImage: string;
  bootDiskSizeGb: number;
  networkName: string;
  networkTier: "PREMIUM" | "STANDARD";
  networkTags: string[];
  startupScript: string;
}
