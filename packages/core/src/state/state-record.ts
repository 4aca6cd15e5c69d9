import { z } from "zod";
import { NetworkTier } from "../config/vpn-config";

/** Provider status as the engine sees it; TERMINATED and SUSPENDED count as STOPPED. */
export const RemoteStatus = z.enum(["RUNNING", "STOPPED", "UNKNOWN"]);
export type RemoteStatus = z.infer<typeof RemoteStatus>;

export const ServerIdentitySchema = z.object({
  instanceName: z.string().min(1),
  region: z.string().min(1),
  zone: z.string().min(1),
  machineType: z.string().min(1),
  networkTier: NetworkTier,
  publicIp: z.string().nullable(),
  publicKey: z.string().nullable(),
  createdAt: z.string(),
  lastObservedStatus: RemoteStatus.nullable().default(null),
  /** Set before the provider delete is issued, cleared with the record */
  deleteRequestedAt: z.string().nullable().default(null),
});

export type ServerIdentity = z.infer<typeof ServerIdentitySchema>;

export const ManagedStateRecordSchema = z.object({
  version: z.literal(1).default(1),
  server: ServerIdentitySchema.nullable().default(null),
  localConnected: z.boolean().default(false),
  /** Endpoint the live tunnel was brought up against; null while it is down */
  tunnelEndpoint: z.string().nullable().default(null),
  lastReconciledAt: z.string().nullable().default(null),
});

export type ManagedStateRecord = z.infer<typeof ManagedStateRecordSchema>;

export function emptyStateRecord(): ManagedStateRecord {
  return {
    version: 1,
    server: null,
    localConnected: false,
    tunnelEndpoint: null,
    lastReconciledAt: null,
  };
}

/** Both halves of the endpoint identity are known. */
export function isIdentityComplete(
  server: ServerIdentity | null
): server is ServerIdentity & { publicIp: string; publicKey: string } {
  return server !== null && server.publicIp !== null && server.publicKey !== null;
}
