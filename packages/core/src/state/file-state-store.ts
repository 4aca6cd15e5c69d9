/**
 * File-backed State Store.
 *
 * Holds the Managed State Record between runs. The record is advisory: the
 * engine re-validates it against the provider before acting on it, so a
 * missing or unreadable file degrades to an empty record instead of failing.
 */

import fs from "fs-extra";
import { ConfigurationError, toError } from "../errors";
import type { LogCallback } from "../logging";
import { silentLog } from "../logging";
import { writeFileAtomic } from "../utils/atomic-write";
import {
  ManagedStateRecord,
  ManagedStateRecordSchema,
  emptyStateRecord,
} from "./state-record";

export interface StateStore {
  load(): Promise<ManagedStateRecord>;
  save(record: ManagedStateRecord): Promise<void>;
}

export class FileStateStore implements StateStore {
  constructor(
    private readonly filePath: string,
    private readonly log: LogCallback = silentLog
  ) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<ManagedStateRecord> {
    if (!(await fs.pathExists(this.filePath))) {
      return emptyStateRecord();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.filePath, "utf-8"));
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      this.log(`State file ${this.filePath} is unreadable (${msg}); rebuilding from the provider`, "stderr");
      return emptyStateRecord();
    }

    const parsed = ManagedStateRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.log(`State file ${this.filePath} has an unexpected shape; rebuilding from the provider`, "stderr");
      return emptyStateRecord();
    }
    return parsed.data;
  }

  async save(record: ManagedStateRecord): Promise<void> {
    const parsed = ManagedStateRecordSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new ConfigurationError(`Refusing to write an invalid state record: ${issues.join("; ")}`);
    }

    try {
      await writeFileAtomic(this.filePath, `${JSON.stringify(parsed.data, null, 2)}\n`);
    } catch (error: unknown) {
      const cause = toError(error);
      throw new ConfigurationError(
        `Cannot write state file ${this.filePath}: ${cause.message}`,
        ["Check that the directory is writable, or pass --state with another path"],
        cause
      );
    }
  }
}

/** Keeps the record in memory; used where no file should be touched. */
export class InMemoryStateStore implements StateStore {
  private record: ManagedStateRecord;

  constructor(initial: ManagedStateRecord = emptyStateRecord()) {
    this.record = structuredClone(initial);
  }

  async load(): Promise<ManagedStateRecord> {
    return structuredClone(this.record);
  }

  async save(record: ManagedStateRecord): Promise<void> {
    this.record = structuredClone(record);
  }
}
