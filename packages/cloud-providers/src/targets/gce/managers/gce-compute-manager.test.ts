import { GceComputeManager } from "./gce-compute-manager";
import type { IGceOperationManager } from "./interfaces";
import type { VmInstanceConfig } from "../types";

// ── Mock SDK imports ───────────────────────────────────────────────────

jest.mock("@google-cloud/compute", () => ({
  InstancesClient: jest.fn(),
  RegionsClient: jest.fn(),
  ZonesClient: jest.fn(),
}));

// ── Test helpers ───────────────────────────────────────────────────────

async function* listOf<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

function createManager() {
  const instancesClient = {
    insert: jest.fn().mockResolvedValue([{ name: "op-insert" }]),
    get: jest.fn(),
    start: jest.fn().mockResolvedValue([{ name: "op-start" }]),
    stop: jest.fn().mockResolvedValue([{ name: "op-stop" }]),
    delete: jest.fn().mockResolvedValue([{ name: "op-delete" }]),
    getSerialPortOutput: jest.fn(),
    aggregatedListAsync: jest.fn(),
  };
  const regionsClient = { listAsync: jest.fn() };
  const zonesClient = { listAsync: jest.fn() };
  const operationManager: IGceOperationManager = {
    waitForOperation: jest.fn().mockResolvedValue(undefined),
  };
  const log = jest.fn();

  const manager = new GceComputeManager(
    instancesClient as never,
    regionsClient as never,
    zonesClient as never,
    operationManager,
    "test-project",
    log
  );

  return { manager, instancesClient, regionsClient, zonesClient, operationManager };
}

const VM_CONFIG: VmInstanceConfig = {
  name: "vpn-server-us-central1-a",
  zone: "us-central1-a",
  machineType: "e2-medium",
  sourceImage: "projects/debian-cloud/global/images/family/debian-12",
  bootDiskSizeGb: 10,
  networkName: "default",
  networkTier: "STANDARD",
  networkTags: ["wireguard"],
  startupScript: "#!/bin/bash\necho hi",
};

// ── Tests ──────────────────────────────────────────────────────────────

describe("GceComputeManager", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("insertInstance", () => {
    it("should insert a forwarding VM with the startup script and wait on the zone operation", async () => {
      const { manager, instancesClient, operationManager } = createManager();

      await manager.insertInstance(VM_CONFIG);

      const request = instancesClient.insert.mock.calls[0][0];
      expect(request.project).toBe("test-project");
      expect(request.zone).toBe("us-central1-a");
      expect(request.instanceResource).toMatchObject({
        name: "vpn-server-us-central1-a",
        machineType: "projects/test-project/zones/us-central1-a/machineTypes/e2-medium",
        canIpForward: true,
        tags: { items: ["wireguard"] },
        metadata: { items: [{ key: "startup-script", value: "#!/bin/bash\necho hi" }] },
      });
      expect(request.instanceResource.networkInterfaces).toEqual([
        {
          network: "projects/test-project/global/networks/default",
          accessConfigs: [{ name: "External NAT", type: "ONE_TO_ONE_NAT", networkTier: "STANDARD" }],
        },
      ]);
      expect(request.instanceResource.disks[0].initializeParams).toEqual({
        sourceImage: "projects/debian-cloud/global/images/family/debian-12",
        diskSizeGb: "10",
        diskType: "projects/test-project/zones/us-central1-a/diskTypes/pd-balanced",
      });
      expect(operationManager.waitForOperation).toHaveBeenCalledWith(
        { name: "op-insert" },
        { kind: "zone", zone: "us-central1-a" },
        { description: "create instance vpn-server-us-central1-a" }
      );
    });
  });

  describe("getInstance", () => {
    it("should read status and the NAT address", async () => {
      const { manager, instancesClient } = createManager();
      instancesClient.get.mockResolvedValue([
        {
          name: "vpn-server-us-central1-a",
          status: "RUNNING",
          networkInterfaces: [{ accessConfigs: [{ natIP: "34.1.2.3" }] }],
        },
      ]);

      await expect(manager.getInstance("vpn-server-us-central1-a", "us-central1-a")).resolves.toEqual({
        name: "vpn-server-us-central1-a",
        status: "RUNNING",
        natIp: "34.1.2.3",
      });
    });

    it("should report a stopped instance without an address", async () => {
      const { manager, instancesClient } = createManager();
      instancesClient.get.mockResolvedValue([
        { name: "vpn-server-us-central1-a", status: "TERMINATED", networkInterfaces: [{ accessConfigs: [{}] }] },
      ]);

      await expect(manager.getInstance("vpn-server-us-central1-a", "us-central1-a")).resolves.toEqual({
        name: "vpn-server-us-central1-a",
        status: "TERMINATED",
        natIp: null,
      });
    });

    it("should return null when the instance does not exist", async () => {
      const { manager, instancesClient } = createManager();
      instancesClient.get.mockRejectedValue(Object.assign(new Error("5 NOT_FOUND: gone"), { code: 5 }));

      await expect(manager.getInstance("vpn-server-us-central1-a", "us-central1-a")).resolves.toBeNull();
    });

    it("should propagate other errors", async () => {
      const { manager, instancesClient } = createManager();
      instancesClient.get.mockRejectedValue(new Error("socket hang up"));

      await expect(manager.getInstance("vpn-server-us-central1-a", "us-central1-a")).rejects.toThrow(
        "socket hang up"
      );
    });
  });

  describe("power and delete", () => {
    it.each([
      ["startInstance", "start", "op-start", "start instance vpn-server-us-central1-a"],
      ["stopInstance", "stop", "op-stop", "stop instance vpn-server-us-central1-a"],
      ["deleteInstance", "delete", "op-delete", "delete instance vpn-server-us-central1-a"],
    ] as const)("%s waits on the %s operation", async (method, clientMethod, opName, description) => {
      const { manager, instancesClient, operationManager } = createManager();

      await manager[method]("vpn-server-us-central1-a", "us-central1-a");

      expect(instancesClient[clientMethod]).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-central1-a",
        instance: "vpn-server-us-central1-a",
      });
      expect(operationManager.waitForOperation).toHaveBeenCalledWith(
        { name: opName },
        { kind: "zone", zone: "us-central1-a" },
        { description }
      );
    });
  });

  describe("getSerialPortOutput", () => {
    it("should read serial port 1", async () => {
      const { manager, instancesClient } = createManager();
      instancesClient.getSerialPortOutput.mockResolvedValue([{ contents: "[PUBLIC_KEY] SERVERPUB=\n" }]);

      await expect(manager.getSerialPortOutput("vpn-server-us-central1-a", "us-central1-a")).resolves.toBe(
        "[PUBLIC_KEY] SERVERPUB=\n"
      );
      expect(instancesClient.getSerialPortOutput).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-central1-a",
        instance: "vpn-server-us-central1-a",
        port: 1,
      });
    });

    it("should return an empty string when the console is empty", async () => {
      const { manager, instancesClient } = createManager();
      instancesClient.getSerialPortOutput.mockResolvedValue([{}]);

      await expect(manager.getSerialPortOutput("vpn-server-us-central1-a", "us-central1-a")).resolves.toBe("");
    });
  });

  describe("findInstances", () => {
    it("should search every zone by name prefix and report each zone", async () => {
      const { manager, instancesClient } = createManager();
      instancesClient.aggregatedListAsync.mockReturnValue(
        listOf([
          ["zones/us-central1-a", { instances: [] }],
          [
            "zones/europe-west1-b",
            {
              instances: [
                {
                  name: "vpn-server-europe-west1-b",
                  zone: "https://www.googleapis.com/compute/v1/projects/test-project/zones/europe-west1-b",
                },
              ],
            },
          ],
          ["zones/asia-east1-a", { instances: [{ name: "vpn-server-asia-east1-a" }, {}] }],
          ["zones/us-east1-b", {}],
        ])
      );

      await expect(manager.findInstances("vpn-server")).resolves.toEqual([
        { name: "vpn-server-asia-east1-a", zone: "asia-east1-a" },
        { name: "vpn-server-europe-west1-b", zone: "europe-west1-b" },
      ]);
      expect(instancesClient.aggregatedListAsync).toHaveBeenCalledWith({
        project: "test-project",
        filter: "name eq vpn-server-.*",
      });
    });
  });

  describe("catalogue", () => {
    it("should list region names sorted", async () => {
      const { manager, regionsClient } = createManager();
      regionsClient.listAsync.mockReturnValue(
        listOf([{ name: "us-central1" }, { name: "asia-east1" }, {}, { name: "europe-west1" }])
      );

      await expect(manager.listRegions()).resolves.toEqual(["asia-east1", "europe-west1", "us-central1"]);
      expect(regionsClient.listAsync).toHaveBeenCalledWith({ project: "test-project" });
    });

    it("should keep only zones in the requested region", async () => {
      const { manager, zonesClient } = createManager();
      const regionUrl = (region: string) =>
        `https://www.googleapis.com/compute/v1/projects/test-project/regions/${region}`;
      zonesClient.listAsync.mockReturnValue(
        listOf([
          { name: "us-central1-f", region: regionUrl("us-central1") },
          { name: "us-central1-a", region: regionUrl("us-central1") },
          { name: "us-central2-a", region: regionUrl("us-central2") },
          { name: "europe-west1-b", region: regionUrl("europe-west1") },
        ])
      );

      await expect(manager.listZones("us-central1")).resolves.toEqual(["us-central1-a", "us-central1-f"]);
    });
  });
});
