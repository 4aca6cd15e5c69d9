/**
 * Error taxonomy shared by the engine, the gateways and the CLI.
 *
 * Every error carries a `kind` so callers can switch on it without
 * `instanceof` chains, plus optional suggestions the CLI prints under the
 * message.
 */

export type VpnErrorKind =
  | "TRANSIENT_PROVIDER"
  | "PROVIDER_REQUEST"
  | "RESOURCE_NOT_FOUND"
  | "BOOT_TIMEOUT"
  | "CONFIG_FORMAT"
  | "LOCAL_TOOL"
  | "PRECONDITION"
  | "CANCELLED"
  | "CONFIGURATION";

export abstract class VpnError extends Error {
  abstract readonly kind: VpnErrorKind;

  constructor(
    message: string,
    public readonly suggestions: string[] = [],
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Network or timeout failure talking to the cloud API. Safe to retry. */
export class TransientProviderError extends VpnError {
  readonly kind = "TRANSIENT_PROVIDER" as const;
}

/** The provider rejected the request (permissions, quota, bad input). */
export class ProviderRequestError extends VpnError {
  readonly kind = "PROVIDER_REQUEST" as const;
}

export class ResourceNotFoundError extends VpnError {
  readonly kind = "RESOURCE_NOT_FOUND" as const;

  constructor(public readonly resourceName: string, originalError?: Error) {
    super(`Resource "${resourceName}" was not found`, [], originalError);
  }
}

export type BootStage = "running" | "public-key";

export class BootTimeoutError extends VpnError {
  readonly kind = "BOOT_TIMEOUT" as const;

  constructor(
    public readonly instanceName: string,
    public readonly stage: BootStage,
    attempts: number
  ) {
    super(
      stage === "running"
        ? `Instance "${instanceName}" did not reach RUNNING after ${attempts} checks`
        : `Instance "${instanceName}" did not publish its WireGuard public key after ${attempts} checks`,
      [
        "Inspect the serial console output of the instance for startup script errors",
        "Run 'vpnkeeper deploy' again to resume from the recorded provisioning state",
      ]
    );
  }
}

const PEER_SECTION_HINT =
  "The file needs a [Peer] section with exactly one PublicKey and one Endpoint line";

export class ConfigFormatError extends VpnError {
  readonly kind = "CONFIG_FORMAT" as const;

  constructor(
    public readonly path: string,
    detail: string,
    suggestions: string[] = [PEER_SECTION_HINT],
    originalError?: Error
  ) {
    super(`Tunnel config ${path}: ${detail}`, suggestions, originalError);
  }
}

/** "spawn" when the program could not be started at all, e.g. not installed. */
export type LocalToolFailure = "exit" | "spawn";

export class LocalToolError extends VpnError {
  readonly kind = "LOCAL_TOOL" as const;

  constructor(
    public readonly command: string,
    public readonly output: string,
    originalError?: Error,
    public readonly failure: LocalToolFailure = "exit"
  ) {
    super(`${command} failed: ${output}`, [], originalError);
  }
}

export class PreconditionError extends VpnError {
  readonly kind = "PRECONDITION" as const;
}

export class OperationCancelledError extends VpnError {
  readonly kind = "CANCELLED" as const;

  constructor() {
    super("Operation cancelled; state is kept as of the last completed step");
  }
}

export class ConfigurationError extends VpnError {
  readonly kind = "CONFIGURATION" as const;
}

export function isVpnError(error: unknown): error is VpnError {
  return error instanceof VpnError;
}

/** The errno-style code of a Node.js system error, e.g. ENOENT. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
