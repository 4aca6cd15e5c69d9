import fs from "fs-extra";
import { ConfigFormatError, errorCode, toError } from "../errors";
import { writeFileAtomic } from "../utils/atomic-write";
import {
  ConfigSection,
  DirectiveLine,
  TunnelConfigDocument,
  findDirectives,
  listSections,
  parseTunnelConfig,
  serializeTunnelConfig,
  withDirectiveValue,
} from "./document";

export interface ServerPeerSettings {
  publicKey: string;
  endpoint: string;
}

export interface PatchResult {
  /** False when the file already carried the requested values */
  changed: boolean;
  previous: ServerPeerSettings;
}

interface LocatedPeer {
  publicKey: DirectiveLine;
  endpoint: DirectiveLine;
}

/**
 * The server is the first [Peer] section of the client config; any further
 * peers are left alone.
 */
function locateServerPeer(doc: TunnelConfigDocument, path: string): LocatedPeer {
  const peer: ConfigSection | undefined = listSections(doc).find(
    (s) => s.name.toLowerCase() === "peer"
  );
  if (!peer) {
    throw new ConfigFormatError(path, "no [Peer] section found");
  }

  const single = (key: string): DirectiveLine => {
    const matches = findDirectives(peer, key);
    if (matches.length === 0) {
      throw new ConfigFormatError(path, `[Peer] section has no ${key} line`);
    }
    if (matches.length > 1) {
      throw new ConfigFormatError(path, `[Peer] section has ${matches.length} ${key} lines`);
    }
    return matches[0];
  };

  return { publicKey: single("PublicKey"), endpoint: single("Endpoint") };
}

export function readServerPeer(text: string, path: string): ServerPeerSettings {
  const located = locateServerPeer(parseTunnelConfig(text), path);
  return { publicKey: located.publicKey.value, endpoint: located.endpoint.value };
}

/**
 * Replace the server peer's PublicKey and Endpoint values in `text`.
 * Everything else, including comments, spacing and line endings, is
 * returned byte for byte.
 */
export function patchTunnelConfigText(
  text: string,
  path: string,
  settings: ServerPeerSettings
): { text: string; result: PatchResult } {
  const doc = parseTunnelConfig(text);
  const located = locateServerPeer(doc, path);
  const previous = { publicKey: located.publicKey.value, endpoint: located.endpoint.value };

  const replacements = new Map<DirectiveLine, DirectiveLine>([
    [located.publicKey, withDirectiveValue(located.publicKey, settings.publicKey)],
    [located.endpoint, withDirectiveValue(located.endpoint, settings.endpoint)],
  ]);

  const patched: TunnelConfigDocument = {
    lines: doc.lines.map((line) =>
      line.kind === "directive" ? replacements.get(line) ?? line : line
    ),
  };

  return {
    text: serializeTunnelConfig(patched),
    result: {
      changed:
        previous.publicKey !== settings.publicKey || previous.endpoint !== settings.endpoint,
      previous,
    },
  };
}

type FileAction = "read" | "write";

function tunnelFileError(path: string, action: FileAction, error: unknown): ConfigFormatError {
  const cause = toError(error);
  switch (errorCode(error)) {
    case "ENOENT":
      return new ConfigFormatError(path, "file not found", undefined, cause);
    case "EACCES":
    case "EPERM":
      return new ConfigFormatError(
        path,
        `permission denied to ${action} it`,
        ["Run vpnkeeper with sudo, or give your user access to the file and its directory"],
        cause
      );
    default:
      return new ConfigFormatError(path, `cannot ${action} it (${cause.message})`, [], cause);
  }
}

export async function readTunnelConfig(path: string): Promise<string> {
  const stats = await fs.stat(path).catch((error: unknown) => {
    throw tunnelFileError(path, "read", error);
  });
  if (!stats.isFile()) {
    throw new ConfigFormatError(path, "not a regular file", []);
  }
  try {
    return await fs.readFile(path, "utf-8");
  } catch (error: unknown) {
    throw tunnelFileError(path, "read", error);
  }
}

/**
 * Patch the tunnel config on disk. The file is only rewritten when a value
 * actually changes, and then atomically.
 */
export async function patchLocalConfig(
  path: string,
  publicKey: string,
  endpoint: string
): Promise<PatchResult> {
  const original = await readTunnelConfig(path);
  const { text, result } = patchTunnelConfigText(original, path, { publicKey, endpoint });

  if (result.changed) {
    try {
      await writeFileAtomic(path, text);
    } catch (error: unknown) {
      throw tunnelFileError(path, "write", error);
    }
  }
  return result;
}

export function formatEndpoint(host: string, port: number): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}

export function endpointHost(endpoint: string): string {
  const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(endpoint);
  if (bracketed) return bracketed[1];
  const colon = endpoint.lastIndexOf(":");
  return colon === -1 ? endpoint : endpoint.slice(0, colon);
}

/** Hide PrivateKey / PresharedKey values for display. */
export function redactTunnelConfig(text: string): string {
  const doc = parseTunnelConfig(text);
  return serializeTunnelConfig({
    lines: doc.lines.map((line) =>
      line.kind === "directive" && /^(private|preshared)key$/i.test(line.key)
        ? withDirectiveValue(line, "(hidden)")
        : line
    ),
  });
}
