/**
 * VPN Command Handler
 *
 * One method per engine operation. Each runs under a spinner, fails with
 * the engine's VpnError, and prints the resulting state.
 */

import { OperationCancelledError, PreconditionError } from "@vpnkeeper/core";
import type {
  OperationOptions,
  OperationOutcome,
  ReconciliationEngine,
  StateSnapshot,
} from "@vpnkeeper/core";
import type { IOutputService } from "../interfaces/output.interface";
import type { IPromptService } from "../interfaces/prompt.interface";
import { snapshotLines, statusLines } from "../render";

export type VpnEngine = Pick<
  ReconciliationEngine,
  | "inspect"
  | "deploy"
  | "deployAndConnect"
  | "start"
  | "stop"
  | "delete"
  | "connect"
  | "disconnect"
  | "statusCheck"
  | "viewConfig"
  | "listRegions"
  | "listZones"
  | "tunnelConfigPath"
>;

export interface DeployCommandOptions {
  zone?: string;
}

export interface DeleteCommandOptions {
  yes?: boolean;
}

export interface ViewConfigCommandOptions {
  showSecrets?: boolean;
}

export class VpnCommandHandler {
  constructor(
    private readonly output: IOutputService,
    private readonly prompt: IPromptService,
    private readonly engine: VpnEngine,
    private readonly signal?: AbortSignal
  ) {}

  async deploy(options: DeployCommandOptions = {}): Promise<StateSnapshot> {
    const snapshot = await this.run("Deploying VPN server...", (opts) =>
      this.engine.deploy({ zone: options.zone }, opts)
    );
    this.output.success("VPN server deployed");
    this.printSnapshot(snapshot);
    return snapshot;
  }

  async deployAndConnect(options: DeployCommandOptions = {}): Promise<StateSnapshot> {
    const snapshot = await this.run("Deploying VPN server...", (opts) =>
      this.engine.deployAndConnect({ zone: options.zone }, opts)
    );
    this.output.success("VPN server deployed and tunnel connected");
    this.printSnapshot(snapshot);
    return snapshot;
  }

  async start(): Promise<StateSnapshot> {
    const snapshot = await this.run("Starting VPN server...", (opts) => this.engine.start(opts));
    this.output.success("VPN server started");
    this.printSnapshot(snapshot);
    return snapshot;
  }

  async stop(): Promise<StateSnapshot> {
    const snapshot = await this.run("Stopping VPN server...", (opts) => this.engine.stop(opts));
    this.output.success("VPN server stopped");
    this.printSnapshot(snapshot);
    return snapshot;
  }

  /** Returns null when the user declined the confirmation. */
  async delete(options: DeleteCommandOptions = {}): Promise<StateSnapshot | null> {
    if (!options.yes) {
      if (!this.prompt.interactive) {
        throw new PreconditionError("Refusing to delete the VPN server without confirmation", [
          "Pass --yes to delete from a script",
        ]);
      }
      const confirmed = await this.prompt.confirm(
        "This deletes the VPN server and its address. Continue?",
        false
      );
      if (!confirmed) {
        this.output.warn("Delete cancelled");
        return null;
      }
    }

    const snapshot = await this.run("Deleting VPN server...", (opts) => this.engine.delete(opts));
    this.output.success("VPN server deleted");
    this.printSnapshot(snapshot);
    return snapshot;
  }

  async connect(): Promise<StateSnapshot> {
    const snapshot = await this.run("Connecting tunnel...", (opts) => this.engine.connect(opts));
    this.output.success(`Tunnel up using ${this.engine.tunnelConfigPath}`);
    this.printSnapshot(snapshot);
    return snapshot;
  }

  async disconnect(): Promise<StateSnapshot> {
    const snapshot = await this.run("Disconnecting tunnel...", (opts) => this.engine.disconnect(opts));
    this.output.success("Tunnel down");
    this.printSnapshot(snapshot);
    return snapshot;
  }

  async status(): Promise<void> {
    const report = await this.run("Checking status...", (opts) => this.engine.statusCheck(opts));
    this.output.header("VPN Status", "📊");
    for (const line of statusLines(report)) {
      this.output.line(line);
    }
  }

  /** Current state without the connectivity checks. */
  async inspect(): Promise<StateSnapshot> {
    return this.run("Reading state...", (opts) => this.engine.inspect(opts));
  }

  async viewConfig(options: ViewConfigCommandOptions = {}): Promise<void> {
    const text = await this.run("Reading tunnel config...", () =>
      this.engine.viewConfig({ showSecrets: options.showSecrets === true })
    );
    this.output.dim(`# ${this.engine.tunnelConfigPath}`);
    for (const line of text.split("\n")) {
      this.output.line(line);
    }
  }

  async listRegions(): Promise<string[]> {
    return this.run("Listing regions...", (opts) => this.engine.listRegions(opts));
  }

  async listZones(region: string): Promise<string[]> {
    return this.run(`Listing zones in ${region}...`, (opts) => this.engine.listZones(region, opts));
  }

  printSnapshot(snapshot: StateSnapshot): void {
    for (const line of snapshotLines(snapshot)) {
      this.output.line(line);
    }
  }

  private async run<T>(
    text: string,
    operation: (options: OperationOptions) => Promise<OperationOutcome<T>>
  ): Promise<T> {
    if (this.signal?.aborted) {
      throw new OperationCancelledError();
    }

    this.output.startSpinner(text);
    let outcome: OperationOutcome<T>;
    try {
      outcome = await operation({ signal: this.signal });
    } finally {
      this.output.stopSpinner();
    }

    if (!outcome.success) throw outcome.error;
    return outcome.value;
  }
}
