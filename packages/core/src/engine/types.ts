import { z } from "zod";
import type { VpnError } from "../errors";
import type { ServerIdentity } from "../state/state-record";
import type { InstanceDescription, PublicAddress } from "./interfaces";

export const LifecycleState = z.enum([
  "ABSENT",
  "PROVISIONING",
  "STOPPED",
  "RUNNING_DISCONNECTED",
  "RUNNING_CONNECTED",
  "DELETING",
]);

export type LifecycleState = z.infer<typeof LifecycleState>;

export interface StateSnapshot {
  state: LifecycleState;
  server: ServerIdentity | null;
  /** What the provider reported this pass; null when the instance is absent */
  remote: InstanceDescription | null;
  tunnelUp: boolean;
  /** Some pair of sources disagreed during this pass */
  drifted: boolean;
  /** The tunnel config peer section was rewritten to match the server */
  configRepaired: boolean;
  /** Divergences that were corrected automatically */
  corrections: string[];
  /** Divergences that need the user; connect is refused while any remain */
  unresolvedDrift: string[];
  reconciledAt: string;
}

export interface StatusReport {
  snapshot: StateSnapshot;
  /** null when the connectivity check could not run */
  internetReachable: boolean | null;
  egress: PublicAddress | null;
  /** Egress matches the server address */
  routedThroughTunnel: boolean | null;
  warnings: string[];
}

export interface DeployParams {
  /** Zone to deploy into; the configured zone when omitted */
  zone?: string;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export type OperationOutcome<T = StateSnapshot> =
  | { success: true; value: T }
  | { success: false; error: VpnError };
