/**
 * Reconciliation Engine.
 *
 * Every operation starts by re-deriving the lifecycle state from the three
 * sources of truth (provider, local tunnel, state file), acts only if the
 * derived state allows it, and re-derives again before returning. The
 * provider is authoritative for the server, the local controller for the
 * tunnel; the state file is a cache that gets corrected, never trusted.
 */

import type { VpnConfig } from "../config/vpn-config";
import { regionOfZone, tunnelInterfaceName } from "../config/vpn-config";
import {
  BootTimeoutError,
  ConfigFormatError,
  PreconditionError,
  ResourceNotFoundError,
  TransientProviderError,
  isVpnError,
} from "../errors";
import type { LogCallback } from "../logging";
import { silentLog } from "../logging";
import { parseBootPublicKey } from "../peers/boot-script";
import type { StateStore } from "../state/file-state-store";
import type { ManagedStateRecord, RemoteStatus, ServerIdentity } from "../state/state-record";
import {
  formatEndpoint,
  patchLocalConfig,
  readServerPeer,
  readTunnelConfig,
  redactTunnelConfig,
} from "../tunnel-config/patch";
import type { Sleeper } from "../utils/retry";
import { pollUntil, sleep as defaultSleep, withRetry } from "../utils/retry";
import type {
  BootScriptProvider,
  ConnectivityProbe,
  InstanceDescription,
  InstanceLocator,
  LocalTunnelController,
  PublicAddressLookup,
  RemoteControlGateway,
} from "./interfaces";
import { deriveLifecycleState, describeLifecycleState } from "./lifecycle";
import { instanceNameFor, sanitizeName } from "./naming";
import type {
  DeployParams,
  OperationOptions,
  OperationOutcome,
  StateSnapshot,
  StatusReport,
} from "./types";

const DEPLOY_STEPS = 6;

export interface ReconciliationEngineDeps {
  config: VpnConfig;
  gateway: RemoteControlGateway;
  tunnel: LocalTunnelController;
  store: StateStore;
  bootScript: BootScriptProvider;
  addressLookup: PublicAddressLookup;
  connectivity: ConnectivityProbe;
  log?: LogCallback;
  sleep?: Sleeper;
  now?: () => Date;
}

export interface ViewConfigOptions {
  showSecrets?: boolean;
}

export class ReconciliationEngine {
  private readonly config: VpnConfig;
  private readonly gateway: RemoteControlGateway;
  private readonly tunnel: LocalTunnelController;
  private readonly store: StateStore;
  private readonly bootScript: BootScriptProvider;
  private readonly addressLookup: PublicAddressLookup;
  private readonly connectivity: ConnectivityProbe;
  private readonly log: LogCallback;
  private readonly sleep: Sleeper;
  private readonly now: () => Date;
  private busy = false;

  constructor(deps: ReconciliationEngineDeps) {
    this.config = deps.config;
    this.gateway = deps.gateway;
    this.tunnel = deps.tunnel;
    this.store = deps.store;
    this.bootScript = deps.bootScript;
    this.addressLookup = deps.addressLookup;
    this.connectivity = deps.connectivity;
    this.log = deps.log ?? silentLog;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  get tunnelConfigPath(): string {
    return this.config.tunnelConfigPath;
  }

  // ── Public operations ────────────────────────────────────────────────

  /** computeCurrentState wrapped as an outcome, for callers that only display it. */
  inspect(options: OperationOptions = {}): Promise<OperationOutcome> {
    return this.execute("inspect", () => this.computeCurrentState(options));
  }

  deploy(params: DeployParams = {}, options: OperationOptions = {}): Promise<OperationOutcome> {
    return this.execute("deploy", () => this.runDeploy(params, options));
  }

  deployAndConnect(
    params: DeployParams = {},
    options: OperationOptions = {}
  ): Promise<OperationOutcome> {
    return this.execute("deploy and connect", async () => {
      await this.runDeploy(params, options);
      return this.runConnect(options);
    });
  }

  start(options: OperationOptions = {}): Promise<OperationOutcome> {
    return this.execute("start", () => this.runPowerChange("start", options));
  }

  stop(options: OperationOptions = {}): Promise<OperationOutcome> {
    return this.execute("stop", () => this.runPowerChange("stop", options));
  }

  delete(options: OperationOptions = {}): Promise<OperationOutcome> {
    return this.execute("delete", () => this.runDelete(options));
  }

  connect(options: OperationOptions = {}): Promise<OperationOutcome> {
    return this.execute("connect", () => this.runConnect(options));
  }

  disconnect(options: OperationOptions = {}): Promise<OperationOutcome> {
    return this.execute("disconnect", () => this.runDisconnect(options));
  }

  statusCheck(options: OperationOptions = {}): Promise<OperationOutcome<StatusReport>> {
    return this.execute("status check", () => this.runStatusCheck(options));
  }

  viewConfig(viewOptions: ViewConfigOptions = {}): Promise<OperationOutcome<string>> {
    return this.execute("view config", async () => {
      const text = await readTunnelConfig(this.config.tunnelConfigPath);
      return viewOptions.showSecrets ? text : redactTunnelConfig(text);
    });
  }

  listRegions(options: OperationOptions = {}): Promise<OperationOutcome<string[]>> {
    return this.execute("list regions", () =>
      this.callProvider("list regions", () => this.gateway.listRegions(), options.signal)
    );
  }

  listZones(region: string, options: OperationOptions = {}): Promise<OperationOutcome<string[]>> {
    return this.execute("list zones", () =>
      this.callProvider(`list zones in ${region}`, () => this.gateway.listZones(region), options.signal)
    );
  }

  // ── State derivation ─────────────────────────────────────────────────

  /**
   * Query the provider and the local controller, correct the state file
   * to match them, and return the derived lifecycle state. Provider and
   * local tool failures propagate.
   */
  async computeCurrentState(options: OperationOptions = {}): Promise<StateSnapshot> {
    const { signal } = options;
    const record = await this.store.load();
    const corrections: string[] = [];
    const unresolvedDrift: string[] = [];
    let server: ServerIdentity | null = record.server ? { ...record.server } : null;

    const locator = server ? locatorOf(server) : await this.findUnrecorded(unresolvedDrift, signal);
    let remote = locator
      ? await this.callProvider(`describe ${locator.name}`, () => this.gateway.describe(locator), signal)
      : null;
    const interfaceName = tunnelInterfaceName(this.config);
    const tunnelUp = await this.tunnel.isUp(interfaceName);

    if (record.localConnected !== tunnelUp) {
      corrections.push(
        `Tunnel ${interfaceName} was recorded as ${record.localConnected ? "up" : "down"} but is ${tunnelUp ? "up" : "down"}`
      );
    }

    if (remote && locator) {
      const observed: string[] = [];
      try {
        const next = await this.observeRemote(
          server ?? this.rebuildIdentity(locator, remote),
          remote,
          observed,
          signal
        );
        if (!server) {
          corrections.push(
            `Found instance ${locator.name} at the provider with no local record; rebuilt the record`
          );
        }
        corrections.push(...observed);
        server = next;
      } catch (error) {
        if (!(error instanceof ResourceNotFoundError)) throw error;
        this.log(`Instance ${locator.name} disappeared while it was being inspected`, "stderr");
        remote = null;
      }
    }

    if (!remote) {
      if (server) {
        if (server.deleteRequestedAt) {
          this.log(`Instance ${server.instanceName} is gone; finishing the recorded delete`, "stdout");
        } else {
          corrections.push(
            `Instance ${server.instanceName} no longer exists at the provider; cleared it from local state`
          );
        }
        server = null;
      }
      if (tunnelUp) {
        unresolvedDrift.push(`Tunnel ${interfaceName} is up but no server is deployed`);
      }
    }

    let configRepaired = false;
    let tunnelCurrent = false;
    let tunnelEndpoint = tunnelUp ? record.tunnelEndpoint : null;

    if (server && remote?.status === "RUNNING" && !server.deleteRequestedAt) {
      const publicIp = server.publicIp;
      const publicKey = server.publicKey;
      if (publicIp !== null && publicKey !== null) {
        const endpoint = formatEndpoint(publicIp, this.config.wireguardPort);
        try {
          const patched = await patchLocalConfig(this.config.tunnelConfigPath, publicKey, endpoint);
          if (patched.changed) {
            configRepaired = true;
            corrections.push(
              `Tunnel config pointed at ${patched.previous.endpoint}; updated it to ${endpoint}`
            );
            if (tunnelUp && tunnelEndpoint === null) {
              tunnelEndpoint = patched.previous.endpoint;
            }
          }
          if (tunnelUp) {
            // An interface brought up outside this tool is taken to match the config
            if (tunnelEndpoint === null) tunnelEndpoint = endpoint;
            tunnelCurrent = tunnelEndpoint === endpoint;
            if (!tunnelCurrent) {
              unresolvedDrift.push(
                "Tunnel is up with a stale peer section; disconnect and connect again"
              );
            }
          }
        } catch (error) {
          if (!(error instanceof ConfigFormatError)) throw error;
          unresolvedDrift.push(error.message);
        }
      }
    } else if (server && remote && tunnelUp && remote.status !== "RUNNING") {
      unresolvedDrift.push(
        `Tunnel ${interfaceName} is up but instance ${server.instanceName} is ${remote.providerStatus}`
      );
    }

    const state = deriveLifecycleState({ server, remote, tunnelUp, tunnelCurrent });
    const reconciledAt = this.now().toISOString();
    await this.store.save({
      version: 1,
      server,
      localConnected: tunnelUp,
      tunnelEndpoint,
      lastReconciledAt: reconciledAt,
    });

    for (const line of corrections) this.log(`Drift corrected: ${line}`, "stderr");
    for (const line of unresolvedDrift) this.log(`Drift unresolved: ${line}`, "stderr");

    return {
      state,
      server,
      remote,
      tunnelUp,
      drifted: corrections.length > 0 || unresolvedDrift.length > 0,
      configRepaired,
      corrections,
      unresolvedDrift,
      reconciledAt,
    };
  }

  /**
   * Fold what the provider reported into the identity: status, address and,
   * for a running instance, the key announced on the serial console.
   */
  private async observeRemote(
    server: ServerIdentity,
    remote: InstanceDescription,
    corrections: string[],
    signal: AbortSignal | undefined
  ): Promise<ServerIdentity> {
    const next: ServerIdentity = { ...server, lastObservedStatus: remote.status };
    if (server.lastObservedStatus !== null && server.lastObservedStatus !== remote.status) {
      corrections.push(
        `Instance ${server.instanceName} was recorded as ${server.lastObservedStatus} but is ${remote.providerStatus}`
      );
    }

    if (remote.status !== "RUNNING" || server.deleteRequestedAt) {
      return next;
    }

    if (remote.externalIp !== null && remote.externalIp !== server.publicIp) {
      if (server.publicIp !== null) {
        corrections.push(`Server address changed from ${server.publicIp} to ${remote.externalIp}`);
      }
      next.publicIp = remote.externalIp;
    }

    const output = await this.callProvider(
      `read boot output of ${server.instanceName}`,
      () => this.gateway.readBootOutput(locatorOf(server)),
      signal
    );
    const announcedKey = parseBootPublicKey(output);
    if (announcedKey !== undefined && announcedKey !== server.publicKey) {
      if (server.publicKey !== null) {
        corrections.push(`Server public key changed from ${server.publicKey} to ${announcedKey}`);
      }
      next.publicKey = announcedKey;
    }

    return next;
  }

  private rebuildIdentity(locator: InstanceLocator, remote: InstanceDescription): ServerIdentity {
    return {
      instanceName: locator.name,
      region: regionOfZone(locator.zone),
      zone: locator.zone,
      machineType: this.config.machineType,
      networkTier: this.config.networkTier,
      publicIp: remote.externalIp,
      publicKey: null,
      createdAt: this.now().toISOString(),
      lastObservedStatus: null,
      deleteRequestedAt: null,
    };
  }

  // ── Operations ───────────────────────────────────────────────────────

  private async runDeploy(params: DeployParams, options: OperationOptions): Promise<StateSnapshot> {
    const { signal } = options;
    const current = await this.computeCurrentState(options);
    const zone = params.zone ?? this.config.zone;
    let server: ServerIdentity;

    if (current.state === "ABSENT") {
      const name = instanceNameFor(this.config.instancePrefix, zone);
      const region = regionOfZone(zone);
      const bootScript = await this.bootScript.build(this.config.peers);

      this.step(1, `Creating instance ${name} in ${zone}`);
      const ref = await this.callProvider(
        `create ${name}`,
        () =>
          this.gateway.create({
            name,
            zone,
            region,
            machineType: this.config.machineType,
            sourceImage: this.config.sourceImage,
            diskSizeGb: this.config.bootDiskSizeGb,
            tags: this.config.machineTags,
            networkTier: this.config.networkTier,
            bootScript,
            firewall: this.config.manageFirewall
              ? {
                  name: sanitizeName(`${this.config.instancePrefix}-allow-wireguard`),
                  port: this.config.wireguardPort,
                }
              : null,
          }),
        signal
      );
      if (ref.alreadyExisted) {
        this.log(`Instance ${name} already existed; adopting it`, "stderr");
      }

      server = {
        instanceName: ref.name,
        region,
        zone: ref.zone,
        machineType: this.config.machineType,
        networkTier: this.config.networkTier,
        publicIp: null,
        publicKey: null,
        createdAt: this.now().toISOString(),
        lastObservedStatus: null,
        deleteRequestedAt: null,
      };
      this.step(2, `Recording ${name} as provisioning`);
      await this.saveServer(server);
    } else if (current.state === "PROVISIONING" && current.server) {
      server = current.server;
      if (params.zone && params.zone !== server.zone) {
        throw new PreconditionError(
          `Cannot deploy to ${params.zone}: ${server.instanceName} is still provisioning in ${server.zone}`,
          ["Run deploy without a zone to resume it, or delete it first"]
        );
      }
      this.log(`Resuming provisioning of ${server.instanceName}`, "stdout");
    } else {
      throw new PreconditionError(
        `Cannot deploy: a server is already ${describeLifecycleState(current.state)}`,
        ["Delete the existing server before deploying a new one"]
      );
    }

    const locator = locatorOf(server);

    this.step(3, `Waiting for ${locator.name} to report RUNNING`);
    const running = await pollUntil(
      async () => {
        const remote = await this.callProvider(
          `describe ${locator.name}`,
          () => this.gateway.describe(locator),
          signal
        );
        if (!remote) throw new ResourceNotFoundError(locator.name);
        return remote.status === "RUNNING" && remote.externalIp !== null
          ? remote.externalIp
          : undefined;
      },
      { ...this.config.polling.running, signal, sleep: this.sleep }
    );
    if (!running.done) {
      throw new BootTimeoutError(locator.name, "running", running.attempts);
    }

    this.step(4, `Waiting for ${locator.name} to publish its public key`);
    const announced = await pollUntil(
      async () =>
        parseBootPublicKey(
          await this.callProvider(
            `read boot output of ${locator.name}`,
            () => this.gateway.readBootOutput(locator),
            signal
          )
        ),
      {
        ...this.config.polling.bootKey,
        signal,
        sleep: this.sleep,
        onAttempt: (attempt, max) => {
          if (attempt > 1) this.log(`  still booting (check ${attempt}/${max})`, "stdout");
        },
      }
    );
    if (!announced.done) {
      throw new BootTimeoutError(locator.name, "public-key", announced.attempts);
    }

    server = {
      ...server,
      publicIp: running.value,
      publicKey: announced.value,
      lastObservedStatus: "RUNNING",
    };
    this.step(5, `Recording server identity ${running.value}`);
    await this.saveServer(server);

    const endpoint = formatEndpoint(running.value, this.config.wireguardPort);
    this.step(6, `Pointing ${this.config.tunnelConfigPath} at ${endpoint}`);
    await patchLocalConfig(this.config.tunnelConfigPath, announced.value, endpoint);

    return this.computeCurrentState(options);
  }

  private async runPowerChange(
    action: "start" | "stop",
    options: OperationOptions
  ): Promise<StateSnapshot> {
    const current = await this.computeCurrentState(options);
    const required: RemoteStatus = action === "start" ? "STOPPED" : "RUNNING";
    const server = current.server;

    if (!server || current.state === "DELETING" || current.remote?.status !== required) {
      throw new PreconditionError(
        `Cannot ${action}: server is ${describeLifecycleState(current.state)}`
      );
    }

    if (action === "stop" && current.tunnelUp) {
      this.log("Disconnecting the tunnel before stopping the server", "stdout");
      await this.tunnel.down(this.config.tunnelConfigPath);
      await this.markTunnelDown();
    }

    this.log(`${action === "start" ? "Starting" : "Stopping"} ${server.instanceName}`, "stdout");
    const ack = await this.callProvider(
      `${action} ${server.instanceName}`,
      () => (action === "start" ? this.gateway.start(locatorOf(server)) : this.gateway.stop(locatorOf(server))),
      options.signal
    );

    if (ack === "ok") {
      const expected: RemoteStatus = action === "start" ? "RUNNING" : "STOPPED";
      await this.saveServer({ ...server, lastObservedStatus: expected });
    } else {
      this.log(`Instance ${server.instanceName} disappeared before it could ${action}`, "stderr");
    }

    return this.computeCurrentState(options);
  }

  private async runDelete(options: OperationOptions): Promise<StateSnapshot> {
    const current = await this.computeCurrentState(options);
    const server = current.server;
    if (!server) {
      throw new PreconditionError("Cannot delete: no server is deployed");
    }

    if (current.tunnelUp) {
      this.log("Disconnecting the tunnel before deleting the server", "stdout");
      await this.tunnel.down(this.config.tunnelConfigPath);
      await this.markTunnelDown();
    }

    await this.saveServer({ ...server, deleteRequestedAt: this.now().toISOString() });

    this.log(`Deleting ${server.instanceName}`, "stdout");
    const ack = await this.callProvider(
      `delete ${server.instanceName}`,
      () => this.gateway.delete(locatorOf(server)),
      options.signal
    );
    if (ack === "not-found") {
      this.log(`Instance ${server.instanceName} was already gone`, "stderr");
    }

    await this.saveServer(null);
    return this.computeCurrentState(options);
  }

  private async runConnect(options: OperationOptions): Promise<StateSnapshot> {
    const current = await this.computeCurrentState(options);

    if (current.state === "RUNNING_CONNECTED") {
      this.log("Tunnel is already connected", "stdout");
      return current;
    }
    if (current.state !== "RUNNING_DISCONNECTED") {
      throw new PreconditionError(
        `Cannot connect: server is ${describeLifecycleState(current.state)}`,
        current.state === "STOPPED" ? ["Start the server first"] : []
      );
    }

    // Missing directives are fatal here, not just reported
    const peer = readServerPeer(
      await readTunnelConfig(this.config.tunnelConfigPath),
      this.config.tunnelConfigPath
    );

    if (current.unresolvedDrift.length > 0) {
      throw new PreconditionError(
        `Cannot connect while drift is unresolved: ${current.unresolvedDrift.join("; ")}`
      );
    }

    this.log(`Bringing up tunnel from ${this.config.tunnelConfigPath}`, "stdout");
    await this.tunnel.up(this.config.tunnelConfigPath);
    await this.updateRecord((record) => ({
      ...record,
      localConnected: true,
      tunnelEndpoint: peer.endpoint,
    }));

    return this.computeCurrentState(options);
  }

  private async runDisconnect(options: OperationOptions): Promise<StateSnapshot> {
    const interfaceName = tunnelInterfaceName(this.config);
    if (await this.tunnel.isUp(interfaceName)) {
      this.log(`Tearing down tunnel ${interfaceName}`, "stdout");
      await this.tunnel.down(this.config.tunnelConfigPath);
    } else {
      this.log("Tunnel is already down", "stdout");
    }
    await this.markTunnelDown();

    return this.computeCurrentState(options);
  }

  private async runStatusCheck(options: OperationOptions): Promise<StatusReport> {
    const snapshot = await this.computeCurrentState(options);
    const internetReachable = await this.connectivity.isReachable(this.config.connectivityCheckHost);
    const egress = await this.addressLookup.lookup();
    const serverIp = snapshot.server?.publicIp ?? null;

    const routedThroughTunnel = egress && serverIp ? egress.ip === serverIp : null;
    const warnings: string[] = [];

    if (internetReachable === false) {
      warnings.push(`No reply from ${this.config.connectivityCheckHost}; internet access looks down`);
    } else if (internetReachable === null) {
      warnings.push(`Could not run the connectivity check against ${this.config.connectivityCheckHost}`);
    }
    if (!egress) {
      warnings.push("Could not determine the public IP address");
    }
    if (snapshot.state === "RUNNING_CONNECTED" && routedThroughTunnel === false && egress) {
      warnings.push(`Tunnel is up but traffic leaves from ${egress.ip}, not ${serverIp}`);
    }

    return { snapshot, internetReachable, egress, routedThroughTunnel, warnings };
  }

  // ── Helpers ──────────────────────────────────────────────────────────

  private async execute<T>(name: string, operation: () => Promise<T>): Promise<OperationOutcome<T>> {
    if (this.busy) {
      return {
        success: false,
        error: new PreconditionError(`Cannot ${name}: another operation is still running`),
      };
    }

    this.busy = true;
    try {
      return { success: true, value: await operation() };
    } catch (error) {
      if (!isVpnError(error)) throw error;
      this.log(`${capitalize(name)} failed: ${error.message}`, "stderr");
      return { success: false, error };
    } finally {
      this.busy = false;
    }
  }

  private callProvider<T>(
    description: string,
    operation: () => Promise<T>,
    signal: AbortSignal | undefined
  ): Promise<T> {
    return withRetry(operation, {
      ...this.config.polling.providerRetry,
      description,
      signal,
      sleep: this.sleep,
      shouldRetry: (error) => error instanceof TransientProviderError,
      onRetry: (error, attempt, delayMs) => {
        this.log(
          `${description} failed (attempt ${attempt}/${this.config.polling.providerRetry.maxAttempts}): ${error.message}. Retrying in ${delayMs}ms...`,
          "stderr"
        );
      },
    });
  }

  /**
   * With no record, look for instances this tool would have named in any
   * zone. The configured zone wins when there are several; the rest are
   * reported, never adopted.
   */
  private async findUnrecorded(
    unresolvedDrift: string[],
    signal: AbortSignal | undefined
  ): Promise<InstanceLocator | null> {
    const prefix = sanitizeName(this.config.instancePrefix);
    const found = await this.callProvider(
      `find instances named ${prefix}-*`,
      () => this.gateway.findInstances(prefix),
      signal
    );
    const candidates = found
      .filter((c) => c.name === instanceNameFor(this.config.instancePrefix, c.zone))
      .sort((a, b) => a.zone.localeCompare(b.zone));
    if (candidates.length === 0) return null;

    const chosen = candidates.find((c) => c.zone === this.config.zone) ?? candidates[0];
    const others = candidates.filter((c) => c !== chosen);
    if (others.length > 0) {
      unresolvedDrift.push(
        `Found more than one server instance; managing ${chosen.name} and ignoring ${others
          .map((c) => c.name)
          .join(", ")}`
      );
    }
    return chosen;
  }

  private step(index: number, message: string): void {
    this.log(`[${index}/${DEPLOY_STEPS}] ${message}`, "stdout");
  }

  private markTunnelDown(): Promise<void> {
    return this.updateRecord((record) => ({ ...record, localConnected: false, tunnelEndpoint: null }));
  }

  private saveServer(server: ServerIdentity | null): Promise<void> {
    return this.updateRecord((record) => ({ ...record, server }));
  }

  private async updateRecord(
    mutate: (record: ManagedStateRecord) => ManagedStateRecord
  ): Promise<void> {
    await this.store.save(mutate(await this.store.load()));
  }
}

function locatorOf(server: ServerIdentity): InstanceLocator {
  return { name: server.instanceName, zone: server.zone };
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
