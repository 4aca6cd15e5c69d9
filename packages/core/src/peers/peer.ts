import { z } from "zod";

const WIREGUARD_KEY = /^[A-Za-z0-9+/]{42}[AEIMQUYcgkosw048]=$/;
const IPV4_CIDR = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

function isHostCidr(value: string): boolean {
  const match = IPV4_CIDR.exec(value);
  if (!match) return false;
  const octets = match.slice(1, 5).map(Number);
  const prefix = Number(match[5]);
  return octets.every((o) => o <= 255) && prefix >= 1 && prefix <= 32;
}

export const PeerSchema = z.object({
  name: z.string().min(1, "Peer name is required"),
  publicKey: z.string().regex(WIREGUARD_KEY, "Peer publicKey must be a base64 WireGuard key"),
  allowedIp: z
    .string()
    .refine(isHostCidr, "Peer allowedIp must be an IPv4 address with prefix, e.g. 10.0.0.2/32"),
});

export type Peer = z.infer<typeof PeerSchema>;

export const PeerListSchema = z.array(PeerSchema).superRefine((peers, ctx) => {
  const seen = {
    name: new Set<string>(),
    publicKey: new Set<string>(),
    allowedIp: new Set<string>(),
  };

  peers.forEach((peer, index) => {
    for (const field of ["name", "publicKey", "allowedIp"] as const) {
      if (seen[field].has(peer[field])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, field],
          message: `Duplicate peer ${field}: ${peer[field]}`,
        });
      }
      seen[field].add(peer[field]);
    }
  });
});

/**
 * Render the server-side `wg set` directives for every peer, in declaration
 * order. Reordering would rewrite server state on every redeploy, so the
 * list is never sorted.
 */
export function renderBootPeers(peers: readonly Peer[], interfaceName = "wg0"): string {
  return peers
    .map((peer) => `wg set ${interfaceName} peer ${peer.publicKey} allowed-ips ${peer.allowedIp}`)
    .join("\n");
}
