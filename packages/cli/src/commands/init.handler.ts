/**
 * Init Command Handler
 *
 * Writes a starter config for one GCP project.
 */

import fs from "fs-extra";
import path from "path";
import { parseVpnConfig, starterConfig } from "@vpnkeeper/core";
import type { VpnConfig } from "@vpnkeeper/core";
import type { IOutputService } from "../interfaces/output.interface";
import type { IPromptService } from "../interfaces/prompt.interface";

const PROJECT_ID_PATTERN = /^[a-z][a-z0-9-]{4,28}[a-z0-9]$/;
const DEFAULT_ZONE = "us-central1-a";

export interface InitOptions {
  project?: string;
  zone?: string;
  force?: boolean;
}

export function validateProjectId(value: string): true | string {
  if (!value) return "Project ID is required";
  if (!PROJECT_ID_PATTERN.test(value)) {
    return "Project ID must be 6-30 lowercase letters, digits or hyphens, starting with a letter";
  }
  return true;
}

export class InitHandler {
  constructor(
    private readonly output: IOutputService,
    private readonly prompt: IPromptService,
    private readonly configPath: string
  ) {}

  /** Returns the written config, or null when an existing file was kept. */
  async execute(options: InitOptions = {}): Promise<VpnConfig | null> {
    this.output.header("VPN Keeper Setup", "🔐");
    this.output.newline();

    if ((await fs.pathExists(this.configPath)) && !options.force) {
      this.output.warn(`Config already exists at ${this.configPath}`);
      this.output.dim("Use --force to overwrite it.");
      return null;
    }

    const projectId =
      options.project ?? (await this.prompt.input("GCP project ID:", { validate: validateProjectId }));
    const zone = options.zone ?? (await this.prompt.input("Zone:", { default: DEFAULT_ZONE }));

    const raw = { ...starterConfig(projectId), zone };
    // Validate before anything lands on disk
    const config = parseVpnConfig(raw, "new config");

    await fs.ensureDir(path.dirname(this.configPath));
    await fs.writeJson(this.configPath, raw, { spaces: 2 });

    this.output.success(`Wrote ${this.configPath}`);
    this.output.newline();
    this.output.dim("Add your client peers to the \"peers\" list, then run:");
    this.output.line("  vpnkeeper deploy-and-connect");
    return config;
  }
}
