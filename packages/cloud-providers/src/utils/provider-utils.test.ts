import { ConfigFormatError, ProviderRequestError, ResourceNotFoundError, TransientProviderError } from "@vpnkeeper/core";
import {
  ProviderErrorType,
  classifyGcpError,
  isAlreadyExistsError,
  isNotFoundError,
  providerErrorType,
} from "./provider-utils";

function withCode(code: number | string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("providerErrorType", () => {
  it.each([
    [withCode(5, "5 NOT_FOUND: missing"), ProviderErrorType.NOT_FOUND],
    [withCode(404, "Not Found"), ProviderErrorType.NOT_FOUND],
    [new Error("The resource 'projects/p/zones/z/instances/x' was not found"), ProviderErrorType.NOT_FOUND],
    [withCode(6, "6 ALREADY_EXISTS"), ProviderErrorType.ALREADY_EXISTS],
    [withCode(409, "Conflict"), ProviderErrorType.ALREADY_EXISTS],
    [withCode(16, "16 UNAUTHENTICATED"), ProviderErrorType.AUTHENTICATION],
    [withCode(403, "Forbidden"), ProviderErrorType.AUTHORIZATION],
    [withCode(8, "8 RESOURCE_EXHAUSTED"), ProviderErrorType.QUOTA_EXCEEDED],
    [withCode(14, "14 UNAVAILABLE"), ProviderErrorType.NETWORK],
    [withCode(503, "Service Unavailable"), ProviderErrorType.NETWORK],
    [withCode("ECONNRESET", "read ECONNRESET"), ProviderErrorType.NETWORK],
    [withCode("ENOTFOUND", "getaddrinfo ENOTFOUND compute.googleapis.com"), ProviderErrorType.NETWORK],
    [withCode(3, "3 INVALID_ARGUMENT: bad machine type"), ProviderErrorType.UNKNOWN],
    ["plain string", ProviderErrorType.UNKNOWN],
  ])("classifies %p", (error, expected) => {
    expect(providerErrorType(error)).toBe(expected);
  });

  it("exposes the not-found and already-exists shortcuts", () => {
    expect(isNotFoundError(withCode(5, "gone"))).toBe(true);
    expect(isNotFoundError(withCode(6, "there"))).toBe(false);
    expect(isAlreadyExistsError(withCode(6, "there"))).toBe(true);
  });
});

describe("classifyGcpError", () => {
  it("passes VPN errors through", () => {
    const original = new ConfigFormatError("/etc/wireguard/wg0.conf", "no [Peer] section");

    expect(classifyGcpError(original, "x", "test-project")).toBe(original);
  });

  it("maps not found to ResourceNotFoundError naming the resource", () => {
    const error = classifyGcpError(withCode(5, "5 NOT_FOUND"), "vpn-server-us-central1-a", "test-project");

    expect(error).toBeInstanceOf(ResourceNotFoundError);
    expect(error.message).toBe('Resource "vpn-server-us-central1-a" was not found');
  });

  it("maps network failures to TransientProviderError and keeps the cause", () => {
    const cause = withCode("ETIMEDOUT", "connect ETIMEDOUT");
    const error = classifyGcpError(cause, "x", "test-project");

    expect(error).toBeInstanceOf(TransientProviderError);
    expect(error.message).toBe("Google Cloud API unavailable: connect ETIMEDOUT");
    expect(error.originalError).toBe(cause);
  });

  it("suggests logging in when credentials are missing", () => {
    const error = classifyGcpError(withCode(401, "Unauthorized"), "x", "test-project");

    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error.suggestions[0]).toBe("Run 'gcloud auth application-default login'");
  });

  it("keeps the message of unrecognised errors", () => {
    const error = classifyGcpError(withCode(3, "3 INVALID_ARGUMENT: bad machine type"), "x", "test-project");

    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error.message).toBe("3 INVALID_ARGUMENT: bad machine type");
    expect(error.suggestions).toEqual([]);
  });
});
