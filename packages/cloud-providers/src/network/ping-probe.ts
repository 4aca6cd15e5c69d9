import { LocalToolError } from "@vpnkeeper/core";
import type { ConnectivityProbe } from "@vpnkeeper/core";
import { createCommandRunner } from "../wireguard/command-runner";
import type { CommandRunner } from "../wireguard/command-runner";

/** One ICMP echo with a two second wait. */
export function pingArgs(host: string, platform: NodeJS.Platform = process.platform): string[] {
  // BSD ping takes -t for the overall timeout; Linux -W is per reply
  return platform === "darwin" ? ["-c", "1", "-t", "2", host] : ["-c", "1", "-W", "2", host];
}

export class PingProbe implements ConnectivityProbe {
  constructor(private readonly run: CommandRunner = createCommandRunner(10_000)) {}

  /** null when ping itself could not be started */
  async isReachable(host: string): Promise<boolean | null> {
    try {
      await this.run("ping", pingArgs(host));
      return true;
    } catch (error: unknown) {
      if (!(error instanceof LocalToolError)) throw error;
      // Non-zero exit means no reply
      return error.failure === "exit" ? false : null;
    }
  }
}
