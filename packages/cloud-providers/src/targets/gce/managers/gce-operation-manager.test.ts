import { ProviderRequestError, TransientProviderError } from "@vpnkeeper/core";
import { GceOperationManager } from "./gce-operation-manager";

jest.mock("@google-cloud/compute", () => ({
  GlobalOperationsClient: jest.fn(),
  ZoneOperationsClient: jest.fn(),
}));

function createManager(timings = { pollIntervalMs: 1, timeoutMs: 1_000 }) {
  const globalOpsClient = { get: jest.fn() };
  const zoneOpsClient = { get: jest.fn() };
  const log = jest.fn();

  const manager = new GceOperationManager(
    globalOpsClient as never,
    zoneOpsClient as never,
    "test-project",
    log,
    timings
  );

  return { manager, globalOpsClient, zoneOpsClient, log };
}

describe("GceOperationManager", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("should poll a zone operation until DONE", async () => {
    const { manager, zoneOpsClient, log } = createManager();
    zoneOpsClient.get
      .mockResolvedValueOnce([{ status: "RUNNING", progress: 40 }])
      .mockResolvedValueOnce([{ status: "DONE", progress: 100 }]);

    await manager.waitForOperation(
      { name: "projects/test-project/zones/us-central1-a/operations/op-123" },
      { kind: "zone", zone: "us-central1-a" },
      { description: "create instance" }
    );

    expect(zoneOpsClient.get).toHaveBeenCalledTimes(2);
    expect(zoneOpsClient.get).toHaveBeenCalledWith({
      project: "test-project",
      zone: "us-central1-a",
      operation: "op-123",
    });
    expect(log.mock.calls.map(([line]) => line)).toEqual([
      expect.stringMatching(/^ {2}\[create instance\] RUNNING \(40%\) - \d+s elapsed$/),
      expect.stringMatching(/^ {2}\[create instance\] DONE \(100%\) - \d+s elapsed$/),
    ]);
  });

  it("should use the global client for global operations", async () => {
    const { manager, globalOpsClient, zoneOpsClient } = createManager();
    globalOpsClient.get.mockResolvedValue([{ status: "DONE" }]);

    await manager.waitForOperation({ name: "op-fw" }, { kind: "global" });

    expect(globalOpsClient.get).toHaveBeenCalledWith({ project: "test-project", operation: "op-fw" });
    expect(zoneOpsClient.get).not.toHaveBeenCalled();
  });

  it("should return immediately for an operation without a name", async () => {
    const { manager, globalOpsClient } = createManager();

    await manager.waitForOperation({}, { kind: "global" });
    await manager.waitForOperation(undefined, { kind: "global" });

    expect(globalOpsClient.get).not.toHaveBeenCalled();
  });

  it("should raise ProviderRequestError when the operation reports an error", async () => {
    const { manager, zoneOpsClient } = createManager();
    zoneOpsClient.get.mockResolvedValue([
      { status: "DONE", error: { errors: [{ code: "ZONE_RESOURCE_POOL_EXHAUSTED", message: "No capacity" }] } },
    ]);

    const error = await manager
      .waitForOperation({ name: "op-1" }, { kind: "zone", zone: "us-central1-a" }, { description: "create instance" })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error).toMatchObject({ message: "create instance failed: No capacity" });
  });

  it("should raise TransientProviderError on timeout", async () => {
    const { manager, zoneOpsClient } = createManager({ pollIntervalMs: 5, timeoutMs: 20 });
    zoneOpsClient.get.mockResolvedValue([{ status: "RUNNING" }]);

    await expect(
      manager.waitForOperation({ name: "op-slow" }, { kind: "zone", zone: "us-central1-a" })
    ).rejects.toBeInstanceOf(TransientProviderError);
  });
});
