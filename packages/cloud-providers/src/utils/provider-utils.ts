/**
 * Shared utilities for the cloud gateway
 *
 * Maps errors raised by the Google Cloud client libraries (gRPC status
 * codes, HTTP status codes, or Node socket errors) onto the VPN error
 * taxonomy so the engine can decide what to retry.
 */

import {
  ProviderRequestError,
  ResourceNotFoundError,
  TransientProviderError,
  isVpnError,
  toError,
} from "@vpnkeeper/core";
import type { VpnError } from "@vpnkeeper/core";

/**
 * Standard error types for provider calls
 */
export enum ProviderErrorType {
  AUTHENTICATION = "AUTHENTICATION",
  AUTHORIZATION = "AUTHORIZATION",
  NOT_FOUND = "NOT_FOUND",
  ALREADY_EXISTS = "ALREADY_EXISTS",
  QUOTA_EXCEEDED = "QUOTA_EXCEEDED",
  NETWORK = "NETWORK",
  UNKNOWN = "UNKNOWN",
}

// gRPC status codes
const GRPC_DEADLINE_EXCEEDED = 4;
const GRPC_NOT_FOUND = 5;
const GRPC_ALREADY_EXISTS = 6;
const GRPC_PERMISSION_DENIED = 7;
const GRPC_RESOURCE_EXHAUSTED = 8;
const GRPC_ABORTED = 10;
const GRPC_UNAVAILABLE = 14;
const GRPC_UNAUTHENTICATED = 16;

const RETRYABLE_HTTP_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_SOCKET_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "ENOTFOUND",
]);

function errorCode(error: unknown): number | string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  const code = error.code;
  return typeof code === "number" || typeof code === "string" ? code : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify a raw client-library error without converting it.
 */
export function providerErrorType(error: unknown): ProviderErrorType {
  const code = errorCode(error);
  const message = errorMessage(error);

  if (
    code === GRPC_NOT_FOUND ||
    code === 404 ||
    message.includes("NOT_FOUND") ||
    message.includes("was not found")
  ) {
    return ProviderErrorType.NOT_FOUND;
  }
  if (code === GRPC_ALREADY_EXISTS || code === 409 || message.includes("already exists")) {
    return ProviderErrorType.ALREADY_EXISTS;
  }
  if (code === GRPC_UNAUTHENTICATED || code === 401) {
    return ProviderErrorType.AUTHENTICATION;
  }
  if (code === GRPC_PERMISSION_DENIED || code === 403) {
    return ProviderErrorType.AUTHORIZATION;
  }
  if (code === GRPC_RESOURCE_EXHAUSTED || message.includes("QUOTA_EXCEEDED")) {
    return ProviderErrorType.QUOTA_EXCEEDED;
  }
  if (
    code === GRPC_DEADLINE_EXCEEDED ||
    code === GRPC_ABORTED ||
    code === GRPC_UNAVAILABLE ||
    (typeof code === "number" && RETRYABLE_HTTP_CODES.has(code)) ||
    (typeof code === "string" && RETRYABLE_SOCKET_CODES.has(code))
  ) {
    return ProviderErrorType.NETWORK;
  }
  return ProviderErrorType.UNKNOWN;
}

export function isNotFoundError(error: unknown): boolean {
  return providerErrorType(error) === ProviderErrorType.NOT_FOUND;
}

export function isAlreadyExistsError(error: unknown): boolean {
  return providerErrorType(error) === ProviderErrorType.ALREADY_EXISTS;
}

/**
 * Convert a client-library error into a VpnError. Errors that already
 * belong to the taxonomy pass through unchanged.
 *
 * @param resourceName - Reported by ResourceNotFoundError
 */
export function classifyGcpError(error: unknown, resourceName: string, projectId: string): VpnError {
  if (isVpnError(error)) return error;

  const cause = toError(error);
  const message = errorMessage(error);

  switch (providerErrorType(error)) {
    case ProviderErrorType.NOT_FOUND:
      return new ResourceNotFoundError(resourceName, cause);
    case ProviderErrorType.NETWORK:
      return new TransientProviderError(
        `Google Cloud API unavailable: ${message}`,
        ["Check your internet connection", "Try again in a few moments"],
        cause
      );
    case ProviderErrorType.AUTHENTICATION:
      return new ProviderRequestError(
        "Google Cloud credentials are missing or expired",
        [
          "Run 'gcloud auth application-default login'",
          "Or set keyFilePath in the config to a service account key file",
        ],
        cause
      );
    case ProviderErrorType.AUTHORIZATION:
      return new ProviderRequestError(
        `Insufficient permissions in project ${projectId}: ${message}`,
        [
          "Grant the Compute Instance Admin (v1) role to the account in use",
          "Check that the Compute Engine API is enabled for the project",
        ],
        cause
      );
    case ProviderErrorType.QUOTA_EXCEEDED:
      return new ProviderRequestError(
        `Compute Engine quota exceeded: ${message}`,
        ["Pick another zone or request a quota increase"],
        cause
      );
    case ProviderErrorType.ALREADY_EXISTS:
    case ProviderErrorType.UNKNOWN:
      return new ProviderRequestError(message, [], cause);
  }
}
