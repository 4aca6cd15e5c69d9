export * from "./errors";
export * from "./logging";
export * from "./config/vpn-config";
export * from "./peers/peer";
export * from "./peers/boot-script";
export * from "./tunnel-config/document";
export * from "./tunnel-config/patch";
export * from "./state/state-record";
export * from "./state/file-state-store";
export * from "./engine/interfaces";
export * from "./engine/types";
export * from "./engine/lifecycle";
export * from "./engine/naming";
export * from "./engine/reconciliation-engine";
export * from "./utils/retry";
export * from "./utils/atomic-write";

export const VPNKEEPER_VERSION = "0.1.0";
