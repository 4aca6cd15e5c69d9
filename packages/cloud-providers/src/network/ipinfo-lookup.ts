import { z } from "zod";
import { silentLog } from "@vpnkeeper/core";
import type { LogCallback, PublicAddress, PublicAddressLookup } from "@vpnkeeper/core";

const DEFAULT_TIMEOUT_MS = 5_000;

const IpInfoResponseSchema = z.object({
  ip: z.string().min(1),
  country: z.string().length(2).optional(),
});

export interface IpInfoLookupOptions {
  /** JSON endpoint returning at least { ip }, e.g. https://ipinfo.io/json */
  url: string;
  timeoutMs?: number;
  log?: LogCallback;
}

/**
 * Looks up the address traffic currently leaves from. Lookup failures
 * are logged and reported as null; they never fail a status check.
 */
export class IpInfoLookup implements PublicAddressLookup {
  private readonly log: LogCallback;

  constructor(private readonly options: IpInfoLookupOptions) {
    this.log = options.log ?? silentLog;
  }

  async lookup(): Promise<PublicAddress | null> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

    try {
      const response = await fetch(this.options.url, {
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      if (!response.ok) {
        this.log(`Public IP lookup returned HTTP ${response.status}`, "stderr");
        return null;
      }

      const parsed = IpInfoResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.log(`Public IP lookup returned an unexpected body from ${this.options.url}`, "stderr");
        return null;
      }
      return { ip: parsed.data.ip, country: parsed.data.country ?? null };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.log(`Public IP lookup failed: ${message}`, "stderr");
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
