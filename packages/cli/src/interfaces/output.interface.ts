/**
 * Output Service Interface
 *
 * Everything commands print goes through this, so handlers can be tested
 * against a recording double instead of the terminal.
 */

import type { LogCallback } from "@vpnkeeper/core";

export interface IOutputService {
  header(title: string, icon?: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  /** Error line plus one dimmed line per suggestion */
  error(message: string, suggestions?: string[]): void;
  dim(message: string): void;
  /** Plain line, already formatted by the caller */
  line(message: string): void;
  newline(): void;

  startSpinner(text: string): void;
  stopSpinner(): void;

  /** Sink for engine progress lines */
  readonly log: LogCallback;
}
