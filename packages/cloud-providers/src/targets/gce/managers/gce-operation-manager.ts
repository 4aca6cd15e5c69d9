/**
 * GCE Operation Manager
 *
 * Waits on the long-running operations returned by instance and firewall
 * calls. Instance operations are zonal; firewall operations are global.
 */

import { GlobalOperationsClient, ZoneOperationsClient } from "@google-cloud/compute";
import { ProviderRequestError, TransientProviderError } from "@vpnkeeper/core";
import type { GceLogCallback } from "../types";
import type { IGceOperationManager } from "./interfaces";

const DEFAULT_POLL_INTERVAL_MS = 5_000;
const DEFAULT_TIMEOUT_MS = 600_000; // 10 minutes

export type OperationScope = { kind: "global" } | { kind: "zone"; zone: string };

export interface WaitOptions {
  /** Human-readable description for logging */
  description?: string;
}

export interface OperationManagerTimings {
  timeoutMs?: number;
  pollIntervalMs?: number;
}

interface OperationResult {
  status?: unknown;
  progress?: number | null;
  error?: { errors?: Array<{ code?: string | null; message?: string | null }> | null } | null;
}

function operationNameOf(operation: unknown): string | undefined {
  if (typeof operation !== "object" || operation === null || !("name" in operation)) {
    return undefined;
  }
  const name = operation.name;
  return typeof name === "string" && name.length > 0 ? name : undefined;
}

/**
 * Manages GCE operation polling for global and zone scopes.
 */
export class GceOperationManager implements IGceOperationManager {
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly globalOpsClient: GlobalOperationsClient,
    private readonly zoneOpsClient: ZoneOperationsClient,
    private readonly project: string,
    private readonly log: GceLogCallback,
    timings: OperationManagerTimings = {}
  ) {
    this.timeoutMs = timings.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.pollIntervalMs = timings.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /**
   * Wait for a GCE operation to complete.
   *
   * @param operation - The operation object returned from a GCE API call
   */
  async waitForOperation(
    operation: unknown,
    scope: OperationScope,
    options: WaitOptions = {}
  ): Promise<void> {
    const fullName = operationNameOf(operation);
    if (!fullName) return;

    const operationName = fullName.split("/").pop() ?? fullName;
    const description = options.description ?? operationName;

    let lastStatus = "";
    const start = Date.now();

    while (Date.now() - start < this.timeoutMs) {
      const result = await this.getOperationStatus(operationName, scope);

      const status = String(result.status ?? "UNKNOWN");
      const progress = result.progress ?? 0;

      if (status !== lastStatus) {
        const elapsed = Math.round((Date.now() - start) / 1000);
        this.log(
          `  [${description}] ${status}${progress > 0 ? ` (${progress}%)` : ""} - ${elapsed}s elapsed`,
          "stdout"
        );
        lastStatus = status;
      }

      if (status === "DONE") {
        const failure = result.error?.errors?.[0];
        if (failure) {
          const errorMsg = failure.message ?? "Operation failed";
          this.log(`  [${description}] FAILED: ${errorMsg}`, "stderr");
          throw new ProviderRequestError(`${description} failed: ${errorMsg}`);
        }
        return;
      }

      await this.sleep(this.pollIntervalMs);
    }

    this.log(`  [${description}] TIMEOUT after ${this.timeoutMs / 1000}s`, "stderr");
    throw new TransientProviderError(`Operation timed out: ${operationName}`);
  }

  private async getOperationStatus(
    operationName: string,
    scope: OperationScope
  ): Promise<OperationResult> {
    switch (scope.kind) {
      case "global": {
        const [result] = await this.globalOpsClient.get({
          project: this.project,
          operation: operationName,
        });
        return result;
      }
      case "zone": {
        const [result] = await this.zoneOpsClient.get({
          project: this.project,
          zone: scope.zone,
          operation: operationName,
        });
        return result;
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
