import fs from "fs-extra";
import os from "os";
import path from "path";
import { FileStateStore } from "./file-state-store";
import type { ManagedStateRecord } from "./state-record";
import { emptyStateRecord } from "./state-record";

describe("FileStateStore", () => {
  let tmpDir: string;
  let statePath: string;
  let logged: string[];
  let store: FileStateStore;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "vpnkeeper-state-"));
    statePath = path.join(tmpDir, "nested", "state.json");
    logged = [];
    store = new FileStateStore(statePath, (line) => logged.push(line));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  const record: ManagedStateRecord = {
    version: 1,
    localConnected: true,
    tunnelEndpoint: "34.1.2.3:51820",
    lastReconciledAt: "2026-01-01T00:00:00.000Z",
    server: {
      instanceName: "vpn-server-us-central1-a",
      region: "us-central1",
      zone: "us-central1-a",
      machineType: "e2-medium",
      networkTier: "PREMIUM",
      publicIp: "34.1.2.3",
      publicKey: "SERVERPUB=",
      createdAt: "2026-01-01T00:00:00.000Z",
      lastObservedStatus: "RUNNING",
      deleteRequestedAt: null,
    },
  };

  it("returns an empty record when no file exists", async () => {
    expect(await store.load()).toEqual(emptyStateRecord());
    expect(logged).toEqual([]);
  });

  it("round-trips a saved record", async () => {
    await store.save(record);

    expect(await store.load()).toEqual(record);
    const raw = await fs.readFile(statePath, "utf-8");
    expect(raw.endsWith("}\n")).toBe(true);
    expect(JSON.parse(raw)).toEqual(record);
  });

  it("fills defaults for fields written by older versions", async () => {
    await fs.outputJson(statePath, { version: 1, server: null });

    expect(await store.load()).toEqual(emptyStateRecord());
  });

  it("falls back to an empty record for a corrupt file", async () => {
    await fs.outputFile(statePath, "{ not json");

    expect(await store.load()).toEqual(emptyStateRecord());
    expect(logged).toHaveLength(1);
    expect(logged[0]).toContain("is unreadable");
  });

  it("falls back to an empty record for an unexpected shape", async () => {
    await fs.outputJson(statePath, { version: 7, server: "yes" });

    expect(await store.load()).toEqual(emptyStateRecord());
    expect(logged).toEqual([
      `State file ${statePath} has an unexpected shape; rebuilding from the provider`,
    ]);
  });

  it("refuses to save an invalid record", async () => {
    const server = record.server;
    if (!server) throw new Error("fixture has no server");
    const invalid: ManagedStateRecord = { ...record, server: { ...server, instanceName: "" } };

    await expect(store.save(invalid)).rejects.toMatchObject({ kind: "CONFIGURATION" });
    await expect(store.save(invalid)).rejects.toThrow(
      "Refusing to write an invalid state record: server.instanceName:"
    );
    expect(await fs.pathExists(statePath)).toBe(false);
  });

  it("reports a state file that cannot be written as a configuration error", async () => {
    await fs.outputFile(path.join(tmpDir, "blocker"), "not a directory");
    const blockedPath = path.join(tmpDir, "blocker", "state.json");
    const blocked = new FileStateStore(blockedPath);

    await expect(blocked.save(record)).rejects.toMatchObject({
      kind: "CONFIGURATION",
      suggestions: ["Check that the directory is writable, or pass --state with another path"],
    });
    await expect(blocked.save(record)).rejects.toThrow(`Cannot write state file ${blockedPath}: `);
  });
});
