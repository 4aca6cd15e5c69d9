/**
 * GCE Network Manager
 *
 * Firewall rules only. The VPN VM sits on an existing network with an
 * ephemeral public IP, so there is no VPC or subnet to manage.
 */

import { FirewallsClient } from "@google-cloud/compute";
import type { FirewallRule, GceLogCallback } from "../types";
import type { IGceNetworkManager, IGceOperationManager } from "./interfaces";
import { isNotFoundError } from "../../../utils/provider-utils";

export class GceNetworkManager implements IGceNetworkManager {
  constructor(
    private readonly firewallsClient: FirewallsClient,
    private readonly operationManager: IGceOperationManager,
    private readonly project: string,
    private readonly log: GceLogCallback
  ) {}

  async ensureFirewall(name: string, networkName: string, rules: FirewallRule[]): Promise<boolean> {
    // GCE applies sourceRanges to every allowed entry in a firewall resource.
    if (rules.length > 1) {
      const firstRanges = JSON.stringify([...rules[0].sourceRanges].sort());
      for (const rule of rules.slice(1)) {
        if (JSON.stringify([...rule.sourceRanges].sort()) !== firstRanges) {
          throw new Error(
            "Cannot create a single GCE firewall with different sourceRanges per rule. " +
              "Use separate ensureFirewall() calls for rules with different source ranges."
          );
        }
      }
    }

    try {
      await this.firewallsClient.get({
        project: this.project,
        firewall: name,
      });
      return false;
    } catch (error: unknown) {
      if (!isNotFoundError(error)) throw error;
    }

    this.log(`Creating firewall rule ${name}`, "stdout");

    const allowed = rules.map((rule) => ({
      IPProtocol: rule.protocol,
      ports: rule.ports,
    }));
    const sourceRanges = rules.flatMap((rule) => rule.sourceRanges);
    const targetTags = rules.flatMap((rule) => rule.targetTags);

    const [operation] = await this.firewallsClient.insert({
      project: this.project,
      firewallResource: {
        name,
        network: `projects/${this.project}/global/networks/${networkName}`,
        description: rules[0]?.description ?? "WireGuard VPN",
        direction: "INGRESS",
        allowed,
        sourceRanges: [...new Set(sourceRanges)],
        targetTags: targetTags.length > 0 ? [...new Set(targetTags)] : undefined,
      },
    });
    await this.operationManager.waitForOperation(
      operation,
      { kind: "global" },
      { description: `create firewall rule ${name}` }
    );
    return true;
  }
}
