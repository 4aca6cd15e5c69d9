import fs from "fs-extra";
import os from "os";
import path from "path";
import { ConfigurationError } from "../errors";
import {
  loadVpnConfig,
  parseVpnConfig,
  regionOfZone,
  resolveConfigPaths,
  starterConfig,
  tunnelInterfaceName,
} from "./vpn-config";

describe("parseVpnConfig", () => {
  it("applies defaults", () => {
    const config = parseVpnConfig({ projectId: "test-project" });

    expect(config).toMatchObject({
      zone: "us-central1-a",
      networkTier: "PREMIUM",
      machineTags: ["wireguard"],
      instancePrefix: "vpn-server",
      machineType: "e2-medium",
      wireguardPort: 51820,
      peers: [],
      tunnelConfigPath: "/etc/wireguard/wg0.conf",
      matchAnyInterface: false,
      useSudo: true,
    });
    expect(config.polling.running.maxAttempts).toBe(20);
    expect(config.polling.bootKey.initialDelayMs).toBe(5000);
  });

  it("lists every problem in one error", () => {
    let caught: unknown;
    try {
      parseVpnConfig({ zone: "moon", wireguardPort: 70000 }, "config.json");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      suggestions: [
        "projectId: Required",
        "zone: zone must look like us-central1-a",
        "wireguardPort: Number must be less than or equal to 65535",
      ],
    });
  });

  it("accepts the starter config", () => {
    expect(parseVpnConfig(starterConfig("test-project")).projectId).toBe("test-project");
  });
});

describe("loadVpnConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vpnkeeper-config-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("reads a JSON file", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeJson(file, { projectId: "test-project", zone: "europe-west1-b" });

    const config = await loadVpnConfig(file);

    expect(config.zone).toBe("europe-west1-b");
  });

  it("points at init when the file is missing", async () => {
    await expect(loadVpnConfig(path.join(dir, "missing.json"))).rejects.toMatchObject({
      kind: "CONFIGURATION",
      suggestions: ["Run 'vpnkeeper init' to create one"],
    });
  });

  it("rejects malformed JSON", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, "{ projectId: ");

    await expect(loadVpnConfig(file)).rejects.toThrow(`Config file ${file} is not valid JSON`);
  });
});

describe("resolveConfigPaths", () => {
  it("uses VPNKEEPER_HOME when set", () => {
    expect(resolveConfigPaths({}, { VPNKEEPER_HOME: "/srv/vpn" })).toEqual({
      configPath: path.join("/srv/vpn", "config.json"),
      statePath: path.join("/srv/vpn", "state.json"),
    });
  });

  it("prefers explicit paths", () => {
    expect(
      resolveConfigPaths({ statePath: "/tmp/state.json" }, { VPNKEEPER_HOME: "/srv/vpn" }).statePath
    ).toBe("/tmp/state.json");
  });
});

describe("helpers", () => {
  it("derives the region from a zone", () => {
    expect(regionOfZone("us-central1-a")).toBe("us-central1");
    expect(regionOfZone("northamerica-northeast1-b")).toBe("northamerica-northeast1");
  });

  it("derives the interface name from the config file", () => {
    const config = parseVpnConfig({ projectId: "test-project", tunnelConfigPath: "/etc/wireguard/home.conf" });

    expect(tunnelInterfaceName(config)).toBe("home");
    expect(tunnelInterfaceName({ ...config, interfaceName: "utun4" })).toBe("utun4");
  });
});
