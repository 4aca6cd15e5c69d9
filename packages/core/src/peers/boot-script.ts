/**
 * Contract between the manager and the instance startup script.
 *
 * The script carries a single placeholder line that is replaced by the peer
 * directives, and announces the server key on the serial console as
 * `[PUBLIC_KEY] <base64 key>` once WireGuard is up.
 */

import { ConfigurationError } from "../errors";

export const PEER_CONFIGS_PLACEHOLDER = "# PEER_CONFIGS_PLACEHOLDER";
export const PUBLIC_KEY_MARKER = "[PUBLIC_KEY] ";

const BASE64_VALUE = /^[A-Za-z0-9+/]+={0,2}$/;

export function injectPeerDirectives(template: string, directives: string): string {
  const index = template.indexOf(PEER_CONFIGS_PLACEHOLDER);
  if (index === -1) {
    throw new ConfigurationError(
      `Startup script template is missing the "${PEER_CONFIGS_PLACEHOLDER}" line`
    );
  }
  return (
    template.slice(0, index) + directives + template.slice(index + PEER_CONFIGS_PLACEHOLDER.length)
  );
}

/**
 * Extract the server public key from serial console output. The last
 * announcement wins, since a rebooted instance prints it again.
 */
export function parseBootPublicKey(output: string): string | undefined {
  let found: string | undefined;

  for (const line of output.split(/\r?\n/)) {
    const at = line.indexOf(PUBLIC_KEY_MARKER);
    if (at === -1) continue;
    const candidate = line.slice(at + PUBLIC_KEY_MARKER.length).trim();
    if (BASE64_VALUE.test(candidate)) {
      found = candidate;
    }
  }

  return found;
}
