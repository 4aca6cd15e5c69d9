/**
 * GCE Network Manager Interface
 */

import type { FirewallRule } from "../../types";

export interface IGceNetworkManager {
  /**
   * Ensure a firewall rule exists on a VPC network, creating it if necessary.
   * An existing rule with the same name is left untouched.
   *
   * @returns true when the rule was created
   */
  ensureFirewall(name: string, networkName: string, rules: FirewallRule[]): Promise<boolean>;
}
