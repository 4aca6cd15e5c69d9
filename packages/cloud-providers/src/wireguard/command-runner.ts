import { execFile } from "child_process";
import { LocalToolError } from "@vpnkeeper/core";

const DEFAULT_TIMEOUT_MS = 60_000;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs a program without a shell. Rejects with LocalToolError on a
 * non-zero exit or when the program cannot be started, carrying stderr
 * (or the spawn error) as output.
 */
export type CommandRunner = (cmd: string, args: string[]) => Promise<CommandResult>;

export function createCommandRunner(timeoutMs: number = DEFAULT_TIMEOUT_MS): CommandRunner {
  return (cmd, args) =>
    new Promise((resolve, reject) => {
      execFile(cmd, args, { timeout: timeoutMs }, (error, stdout, stderr) => {
        if (error) {
          const output = String(stderr).trim() || error.message;
          // A string code (ENOENT, EACCES) means the program never ran
          const failure = typeof error.code === "string" ? "spawn" : "exit";
          reject(new LocalToolError([cmd, ...args].join(" "), output, error, failure));
          return;
        }
        resolve({ stdout: String(stdout), stderr: String(stderr) });
      });
    });
}

/** Prefixes the command with sudo when elevation is configured. */
export function elevated(useSudo: boolean, cmd: string, args: string[]): [string, string[]] {
  return useSudo ? ["sudo", [cmd, ...args]] : [cmd, args];
}
