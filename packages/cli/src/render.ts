/**
 * Plain-text rendering of engine results. Every function returns lines so
 * handlers decide where they go.
 */

import chalk from "chalk";
import { describeLifecycleState } from "@vpnkeeper/core";
import type { LifecycleState, PublicAddress, StateSnapshot, StatusReport } from "@vpnkeeper/core";

const REGIONAL_INDICATOR_A = 0x1f1e6;
const LABEL_WIDTH = 12;

/** Emoji flag for an ISO 3166 alpha-2 code; empty for anything else. */
export function countryFlag(code: string | null | undefined): string {
  if (!code || !/^[A-Za-z]{2}$/.test(code)) return "";
  const upper = code.toUpperCase();
  return String.fromCodePoint(
    REGIONAL_INDICATOR_A + upper.charCodeAt(0) - 65,
    REGIONAL_INDICATOR_A + upper.charCodeAt(1) - 65
  );
}

export function stateLabel(state: LifecycleState): string {
  const label = describeLifecycleState(state);
  switch (state) {
    case "RUNNING_CONNECTED":
      return chalk.green(label);
    case "RUNNING_DISCONNECTED":
      return chalk.yellow(label);
    case "PROVISIONING":
    case "DELETING":
      return chalk.cyan(label);
    case "STOPPED":
    case "ABSENT":
      return chalk.gray(label);
  }
}

function field(label: string, value: string): string {
  return `  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function formatAddress(address: PublicAddress | null): string {
  if (!address) return chalk.gray("unknown");
  if (!address.country) return address.ip;
  return `${address.ip} ${countryFlag(address.country)} ${address.country}`;
}

export function snapshotLines(snapshot: StateSnapshot): string[] {
  const lines = [field("State", stateLabel(snapshot.state))];
  const { server } = snapshot;

  if (server) {
    lines.push(field("Instance", server.instanceName));
    lines.push(field("Zone", server.zone));
    lines.push(field("Machine", `${server.machineType} (${server.networkTier.toLowerCase()} tier)`));
    lines.push(field("Address", server.publicIp ?? chalk.gray("pending")));
    lines.push(field("Public key", server.publicKey ?? chalk.gray("pending")));
  }
  if (snapshot.remote && snapshot.remote.status === "UNKNOWN") {
    lines.push(field("Provider", snapshot.remote.providerStatus));
  }

  for (const correction of snapshot.corrections) {
    lines.push(chalk.gray(`  ↻ ${correction}`));
  }
  for (const drift of snapshot.unresolvedDrift) {
    lines.push(chalk.yellow(`  ⚠ ${drift}`));
  }
  return lines;
}

const BANNER_TITLES: Record<LifecycleState, string> = {
  ABSENT: "Not deployed",
  PROVISIONING: "Provisioning",
  STOPPED: "Stopped",
  RUNNING_DISCONNECTED: "Ready",
  RUNNING_CONNECTED: "Connected",
  DELETING: "Deleting",
};

export function bannerTitle(state: LifecycleState): string {
  return BANNER_TITLES[state];
}

/** One line under the menu banner: address, instance and zone. */
export function bannerSummary(snapshot: StateSnapshot): string {
  const { server } = snapshot;
  if (!server) return "No VPN server. Deploy one to get started.";
  const address = server.publicIp ?? "no address yet";
  return `${address} | ${server.instanceName} | ${server.zone}`;
}

function routingLabel(routed: boolean | null): string {
  if (routed === null) return chalk.gray("unknown");
  return routed ? chalk.green("through the VPN") : chalk.yellow("not through the VPN");
}

function internetLabel(reachable: boolean | null): string {
  if (reachable === null) return chalk.gray("unknown");
  return reachable ? chalk.green("reachable") : chalk.red("unreachable");
}

export function statusLines(report: StatusReport): string[] {
  const lines = snapshotLines(report.snapshot);
  lines.push(field("Internet", internetLabel(report.internetReachable)));
  lines.push(field("Egress IP", formatAddress(report.egress)));
  lines.push(field("Routing", routingLabel(report.routedThroughTunnel)));
  for (const warning of report.warnings) {
    lines.push(chalk.yellow(`  ⚠ ${warning}`));
  }
  return lines;
}
