// GCE gateway
export { GceRemoteGateway, toRemoteStatus } from "./targets/gce/gce-gateway";
export type { GceGatewayOptions } from "./targets/gce/gce-gateway";
export type { GceConfig } from "./targets/gce/gce-config";
export { GceManagerFactory } from "./targets/gce/gce-manager-factory";
export type { GceManagers, GceManagerFactoryConfig } from "./targets/gce/gce-manager-factory";
export type {
  IGceComputeManager,
  IGceNetworkManager,
  IGceOperationManager,
} from "./targets/gce/managers/interfaces";
export type { GceInstanceInfo, GceInstanceLocation, GceInstanceStatus, FirewallRule, VmInstanceConfig } from "./targets/gce/types";

// Startup script
export {
  StartupScriptBuilder,
  buildWireguardStartupScript,
} from "./base/startup-script-builder";
export type { StartupScriptBuilderOptions, WireguardScriptOptions } from "./base/startup-script-builder";

// Local tunnel
export { WgQuickController, interfaceNameOf } from "./wireguard/wg-quick-controller";
export type { WgQuickControllerOptions } from "./wireguard/wg-quick-controller";
export { createCommandRunner } from "./wireguard/command-runner";
export type { CommandRunner, CommandResult } from "./wireguard/command-runner";

// Network checks
export { IpInfoLookup } from "./network/ipinfo-lookup";
export type { IpInfoLookupOptions } from "./network/ipinfo-lookup";
export { PingProbe } from "./network/ping-probe";

// Errors
export {
  ProviderErrorType,
  classifyGcpError,
  isAlreadyExistsError,
  isNotFoundError,
} from "./utils/provider-utils";
