/**
 * Wires the engine from the config file and the global options.
 */

import {
  FileStateStore,
  ReconciliationEngine,
  loadVpnConfig,
  resolveConfigPaths,
} from "@vpnkeeper/core";
import type { LogCallback } from "@vpnkeeper/core";
import {
  GceRemoteGateway,
  IpInfoLookup,
  PingProbe,
  StartupScriptBuilder,
  WgQuickController,
} from "@vpnkeeper/cloud-providers";

export type GlobalOptions = {
  config?: string;
  state?: string;
  verbose?: boolean;
};

export function configPathFor(options: GlobalOptions): string {
  return resolveConfigPaths({ configPath: options.config }).configPath;
}

export async function createEngine(options: GlobalOptions, log: LogCallback): Promise<ReconciliationEngine> {
  const paths = resolveConfigPaths({ configPath: options.config, statePath: options.state });
  const config = await loadVpnConfig(paths.configPath);

  return new ReconciliationEngine({
    config,
    gateway: new GceRemoteGateway({
      config: { projectId: config.projectId, keyFilePath: config.keyFilePath },
      log,
    }),
    tunnel: new WgQuickController({
      useSudo: config.useSudo,
      matchAnyInterface: config.matchAnyInterface,
      interfaceName: config.interfaceName,
      log,
    }),
    store: new FileStateStore(paths.statePath, log),
    bootScript: new StartupScriptBuilder({
      listenPort: config.wireguardPort,
      templatePath: config.bootScriptPath,
    }),
    addressLookup: new IpInfoLookup({ url: config.ipInfoService, log }),
    connectivity: new PingProbe(),
    log,
  });
}
