export type { IGceOperationManager } from "./gce-operation-manager.interface";
export type { IGceComputeManager } from "./gce-compute-manager.interface";
export type { IGceNetworkManager } from "./gce-network-manager.interface";
