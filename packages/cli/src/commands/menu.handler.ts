/**
 * Menu Command Handler
 *
 * Interactive loop: show the banner, offer the actions valid for the
 * current lifecycle state, run the chosen one, repeat until Exit.
 */

import chalk from "chalk";
import { isVpnError } from "@vpnkeeper/core";
import type { LifecycleState, StateSnapshot } from "@vpnkeeper/core";
import type { IOutputService } from "../interfaces/output.interface";
import type { IPromptService, PromptChoice } from "../interfaces/prompt.interface";
import { regionLabel, zoneLabel } from "../regions";
import { bannerSummary, bannerTitle } from "../render";
import type { VpnCommandHandler } from "./vpn.handler";

export type MenuAction =
  | "deploy"
  | "start"
  | "stop"
  | "delete"
  | "connect"
  | "disconnect"
  | "status"
  | "view-config"
  | "refresh"
  | "exit";

function serverActions(state: LifecycleState): PromptChoice<MenuAction>[] {
  switch (state) {
    case "ABSENT":
      return [{ name: "Deploy", value: "deploy" }];
    case "PROVISIONING":
      return [
        { name: "Resume deploy", value: "deploy" },
        { name: "Delete VPN server", value: "delete" },
      ];
    case "STOPPED":
      return [
        { name: "Start VPN server", value: "start" },
        { name: "Delete VPN server", value: "delete" },
      ];
    case "RUNNING_DISCONNECTED":
      return [
        { name: "Connect", value: "connect" },
        { name: "Stop VPN server", value: "stop" },
        { name: "Delete VPN server", value: "delete" },
      ];
    case "RUNNING_CONNECTED":
      return [
        { name: "Disconnect", value: "disconnect" },
        { name: "Disconnect & stop VPN server", value: "stop" },
        { name: "Delete VPN server", value: "delete" },
      ];
    case "DELETING":
      return [{ name: "Finish deleting VPN server", value: "delete" }];
  }
}

export function menuChoices(state: LifecycleState): PromptChoice<MenuAction>[] {
  return [
    ...serverActions(state),
    { name: "Run status check", value: "status" },
    { name: "View WireGuard config", value: "view-config" },
    { name: "Refresh", value: "refresh" },
    { name: "Exit", value: "exit" },
  ];
}

export class MenuHandler {
  constructor(
    private readonly output: IOutputService,
    private readonly prompt: IPromptService,
    private readonly vpn: VpnCommandHandler
  ) {}

  async execute(): Promise<void> {
    for (;;) {
      const snapshot = await this.vpn.inspect();
      this.showBanner(snapshot);

      const action = await this.prompt.select("Choose an action:", menuChoices(snapshot.state));
      if (action === "exit") {
        this.output.dim("Goodbye.");
        return;
      }

      try {
        await this.perform(action, snapshot.state);
      } catch (error: unknown) {
        // Cancellation ends the loop; other VPN errors only end the action
        if (!isVpnError(error) || error.kind === "CANCELLED") throw error;
        this.output.error(error.message, error.suggestions);
      }
      this.output.newline();
    }
  }

  /** Region then zone; null when the provider offers none. */
  async pickZone(): Promise<string | null> {
    const regions = await this.vpn.listRegions();
    if (regions.length === 0) {
      this.output.warn("No regions available in this project");
      return null;
    }
    const region = await this.prompt.select(
      "Select a region:",
      regions.map((name) => ({ name: regionLabel(name), value: name }))
    );

    const zones = await this.vpn.listZones(region);
    if (zones.length === 0) {
      this.output.warn(`No zones found in ${region}`);
      return null;
    }
    return this.prompt.select(
      "Select a zone:",
      zones.map((name) => ({ name: zoneLabel(name), value: name }))
    );
  }

  private showBanner(snapshot: StateSnapshot): void {
    this.output.newline();
    this.output.header(`═══ ${bannerTitle(snapshot.state)} ═══`);
    this.output.line(chalk.white(bannerSummary(snapshot)));
    this.output.newline();
  }

  private async perform(action: Exclude<MenuAction, "exit">, state: LifecycleState): Promise<void> {
    switch (action) {
      case "deploy":
        return this.deployInteractively(state);
      case "start":
        await this.vpn.start();
        return;
      case "stop":
        await this.vpn.stop();
        return;
      case "delete":
        await this.vpn.delete();
        return;
      case "connect":
        await this.vpn.connect();
        return;
      case "disconnect":
        await this.vpn.disconnect();
        return;
      case "status":
        return this.vpn.status();
      case "view-config":
        return this.vpn.viewConfig();
      case "refresh":
        return;
    }
  }

  private async deployInteractively(state: LifecycleState): Promise<void> {
    if (state === "ABSENT") {
      const zone = await this.pickZone();
      if (!zone) return;
      await this.vpn.deploy({ zone });
    } else {
      // Resume in the recorded zone
      await this.vpn.deploy();
    }

    if (await this.prompt.confirm("Deployment finished. Connect now?", true)) {
      await this.vpn.connect();
    }
  }
}
