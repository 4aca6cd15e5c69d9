/**
 * Configuration for the GCE gateway.
 *
 * One VM with an ephemeral public IP on the project's default network.
 * WireGuard listens on a UDP port opened by a tag-scoped firewall rule.
 */
export interface GceConfig {
  /** GCP project ID */
  projectId: string;

  // -- Authentication --

  /**
   * Path to service account key file (JSON).
   * Optional; uses Application Default Credentials if not provided.
   */
  keyFilePath?: string;

  // -- Network --

  /**
   * VPC network the instance and firewall rule attach to.
   * Default: "default"
   */
  networkName?: string;

  // -- Operations --

  /** Give up waiting on a single zone or global operation after this long. Default: 10 minutes */
  operationTimeoutMs?: number;

  /** Interval between operation status checks. Default: 5 seconds */
  operationPollIntervalMs?: number;
}
