/**
 * Local tunnel control through wg-quick.
 *
 * `wg-quick up|down <config>` switches the tunnel and `wg show interfaces`
 * tells whether it is up. On macOS wg-quick names the interface utunN
 * rather than after the config file, so matchAnyInterface treats any
 * WireGuard interface as ours.
 */

import path from "path";
import { LocalToolError, silentLog } from "@vpnkeeper/core";
import type { LocalTunnelController, LogCallback } from "@vpnkeeper/core";
import { createCommandRunner, elevated } from "./command-runner";
import type { CommandRunner } from "./command-runner";

export interface WgQuickControllerOptions {
  useSudo: boolean;
  matchAnyInterface: boolean;
  /** Interface name when it differs from the config file name */
  interfaceName?: string;
  run?: CommandRunner;
  log?: LogCallback;
}

export class WgQuickController implements LocalTunnelController {
  private readonly run: CommandRunner;
  private readonly log: LogCallback;

  constructor(private readonly options: WgQuickControllerOptions) {
    this.run = options.run ?? createCommandRunner();
    this.log = options.log ?? silentLog;
  }

  async up(configPath: string): Promise<void> {
    const interfaceName = this.interfaceFor(configPath);
    if (await this.isUp(interfaceName)) {
      this.log(`Interface ${interfaceName} is already up`, "stdout");
      return;
    }

    await this.wgQuick("up", configPath);

    if (!(await this.isUp(interfaceName))) {
      throw new LocalToolError(
        `wg-quick up ${configPath}`,
        `interface ${interfaceName} is not listed by 'wg show interfaces' after bringing it up`
      );
    }
  }

  async down(configPath: string): Promise<void> {
    const interfaceName = this.interfaceFor(configPath);
    if (!(await this.isUp(interfaceName))) {
      this.log(`Interface ${interfaceName} is already down`, "stdout");
      return;
    }

    await this.wgQuick("down", configPath);
  }

  async isUp(interfaceName: string): Promise<boolean> {
    const interfaces = await this.listInterfaces();
    if (this.options.matchAnyInterface) return interfaces.length > 0;
    return interfaces.includes(interfaceName);
  }

  private interfaceFor(configPath: string): string {
    return this.options.interfaceName ?? interfaceNameOf(configPath);
  }

  private async listInterfaces(): Promise<string[]> {
    const [cmd, args] = elevated(this.options.useSudo, "wg", ["show", "interfaces"]);
    const { stdout } = await this.run(cmd, args);
    return stdout.split(/\s+/).filter((name) => name.length > 0);
  }

  private async wgQuick(action: "up" | "down", configPath: string): Promise<void> {
    const [cmd, args] = elevated(this.options.useSudo, "wg-quick", [action, configPath]);
    this.log(`Running ${[cmd, ...args].join(" ")}`, "stdout");
    const { stderr } = await this.run(cmd, args);
    // wg-quick narrates each ip/wg call on stderr
    for (const line of stderr.split("\n")) {
      if (line.trim()) this.log(line, "stdout");
    }
  }
}

/** wg-quick names the interface after the config file. */
export function interfaceNameOf(configPath: string): string {
  return path.basename(configPath, path.extname(configPath));
}
