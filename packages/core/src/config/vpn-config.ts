import { z } from "zod";
import fs from "fs-extra";
import os from "os";
import path from "path";
import { ConfigurationError } from "../errors";
import { PeerListSchema } from "../peers/peer";

export const NetworkTier = z.enum(["PREMIUM", "STANDARD"]);
export type NetworkTier = z.infer<typeof NetworkTier>;

const BackoffSchema = z.object({
  maxAttempts: z.number().int().min(1),
  initialDelayMs: z.number().int().min(0),
  maxDelayMs: z.number().int().min(0),
  backoffMultiplier: z.number().min(1),
});

export const PollingSchema = z.object({
  /** Waiting for the instance to report RUNNING */
  running: BackoffSchema.default({
    maxAttempts: 20,
    initialDelayMs: 3_000,
    maxDelayMs: 15_000,
    backoffMultiplier: 1.5,
  }),
  /** Waiting for the startup script to print the server key */
  bootKey: BackoffSchema.default({
    maxAttempts: 30,
    initialDelayMs: 5_000,
    maxDelayMs: 20_000,
    backoffMultiplier: 1.5,
  }),
  /** Retrying provider calls that failed transiently */
  providerRetry: BackoffSchema.default({
    maxAttempts: 4,
    initialDelayMs: 1_000,
    maxDelayMs: 10_000,
    backoffMultiplier: 2,
  }),
});

export type PollingConfig = z.infer<typeof PollingSchema>;

const ZONE_PATTERN = /^[a-z]+-[a-z]+\d+-[a-z]$/;

export const VpnConfigSchema = z.object({
  projectId: z.string().min(1, "projectId is required"),
  zone: z
    .string()
    .regex(ZONE_PATTERN, "zone must look like us-central1-a")
    .default("us-central1-a"),
  networkTier: NetworkTier.default("PREMIUM"),
  machineTags: z.array(z.string().min(1)).default(["wireguard"]),
  instancePrefix: z
    .string()
    .regex(/^[a-z][a-z0-9-]*$/, "instancePrefix must be lowercase letters, digits and hyphens")
    .default("vpn-server"),
  machineType: z.string().min(1).default("e2-medium"),
  sourceImage: z.string().min(1).default("projects/debian-cloud/global/images/family/debian-12"),
  bootDiskSizeGb: z.number().int().min(10).default(10),
  wireguardPort: z.number().int().min(1).max(65535).default(51820),
  /** Create a firewall rule opening wireguardPort to machineTags on the default network */
  manageFirewall: z.boolean().default(true),
  peers: PeerListSchema.default([]),
  tunnelConfigPath: z.string().min(1).default("/etc/wireguard/wg0.conf"),
  /** Interface reported by `wg show interfaces`; defaults to the config file's basename */
  interfaceName: z.string().min(1).optional(),
  /** Treat any WireGuard interface as ours (macOS names them utunN) */
  matchAnyInterface: z.boolean().default(false),
  useSudo: z.boolean().default(true),
  ipInfoService: z.string().url().default("https://ipinfo.io/json"),
  connectivityCheckHost: z.string().min(1).default("8.8.8.8"),
  /** Service account key file; Application Default Credentials when absent */
  keyFilePath: z.string().min(1).optional(),
  /** Custom startup script; must keep the peer placeholder line */
  bootScriptPath: z.string().min(1).optional(),
  polling: PollingSchema.default({}),
});

export type VpnConfig = z.infer<typeof VpnConfigSchema>;
export type VpnConfigInput = z.input<typeof VpnConfigSchema>;

export interface ConfigPaths {
  configPath: string;
  statePath: string;
}

export function defaultHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.VPNKEEPER_HOME ?? path.join(os.homedir(), ".vpnkeeper");
}

export function resolveConfigPaths(
  overrides: Partial<ConfigPaths> = {},
  env: NodeJS.ProcessEnv = process.env
): ConfigPaths {
  const home = defaultHome(env);
  return {
    configPath: overrides.configPath ?? path.join(home, "config.json"),
    statePath: overrides.statePath ?? path.join(home, "state.json"),
  };
}

export function parseVpnConfig(raw: unknown, source = "config"): VpnConfig {
  const parsed = VpnConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid ${source}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export async function loadVpnConfig(configPath: string): Promise<VpnConfig> {
  if (!(await fs.pathExists(configPath))) {
    throw new ConfigurationError(`Config file not found: ${configPath}`, [
      "Run 'vpnkeeper init' to create one",
    ]);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseVpnConfig(raw, configPath);
}

export function starterConfig(projectId: string): VpnConfigInput {
  return {
    projectId,
    zone: "us-central1-a",
    networkTier: "PREMIUM",
    machineTags: ["wireguard"],
    instancePrefix: "vpn-server",
    machineType: "e2-medium",
    wireguardPort: 51820,
    tunnelConfigPath: "/etc/wireguard/wg0.conf",
    peers: [],
  };
}

export function regionOfZone(zone: string): string {
  return zone.split("-").slice(0, -1).join("-");
}

export function tunnelInterfaceName(config: VpnConfig): string {
  return config.interfaceName ?? path.basename(config.tunnelConfigPath).replace(/\.conf$/, "");
}
