/**
 * GCE Operation Manager Interface
 *
 * Waits on long-running GCE operations so managers can be tested
 * without polling real operation endpoints.
 */

import type { OperationScope, WaitOptions } from "../gce-operation-manager";

export interface IGceOperationManager {
  /**
   * Wait for a GCE operation to complete.
   *
   * @param operation - The operation object returned from a GCE API call
   * @param scope - Global for firewalls, zonal for instances
   * @throws ProviderRequestError if the operation finishes with an error
   * @throws TransientProviderError if the operation does not finish in time
   */
  waitForOperation(operation: unknown, scope: OperationScope, options?: WaitOptions): Promise<void>;
}
