import type { ServerIdentity } from "../state/state-record";
import { isIdentityComplete } from "../state/state-record";
import type { InstanceDescription } from "./interfaces";
import type { LifecycleState } from "./types";

export interface LifecycleInputs {
  server: ServerIdentity | null;
  remote: InstanceDescription | null;
  tunnelUp: boolean;
  /** The live tunnel was brought up against the server's current endpoint */
  tunnelCurrent: boolean;
}

/**
 * Derive the lifecycle state from what was observed. The provider decides
 * running/stopped; the local controller only decides connected or not.
 * Transitional provider states (STAGING, STOPPING, ...) read as PROVISIONING.
 */
export function deriveLifecycleState(inputs: LifecycleInputs): LifecycleState {
  const { server, remote } = inputs;

  if (!server || !remote) return "ABSENT";
  if (server.deleteRequestedAt) return "DELETING";

  switch (remote.status) {
    case "STOPPED":
      return "STOPPED";
    case "UNKNOWN":
      return "PROVISIONING";
    case "RUNNING":
      if (!isIdentityComplete(server)) return "PROVISIONING";
      return inputs.tunnelUp && inputs.tunnelCurrent
        ? "RUNNING_CONNECTED"
        : "RUNNING_DISCONNECTED";
  }
}

const STATE_LABELS: Record<LifecycleState, string> = {
  ABSENT: "not deployed",
  PROVISIONING: "provisioning",
  STOPPED: "stopped",
  RUNNING_DISCONNECTED: "running (disconnected)",
  RUNNING_CONNECTED: "running (connected)",
  DELETING: "being deleted",
};

export function describeLifecycleState(state: LifecycleState): string {
  return STATE_LABELS[state];
}
