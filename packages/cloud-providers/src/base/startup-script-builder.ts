/**
 * Startup Script Builder
 *
 * Builds the bash startup script a new VPN instance runs on first boot:
 * packages, kernel tuning, server keys, the wg0 interface, NAT and the
 * host firewall. Peer directives are spliced in at the placeholder line
 * and the server key is announced on the serial console afterwards.
 */

import fs from "fs-extra";
import {
  ConfigurationError,
  PEER_CONFIGS_PLACEHOLDER,
  PUBLIC_KEY_MARKER,
  injectPeerDirectives,
  renderBootPeers,
  toError,
} from "@vpnkeeper/core";
import type { BootScriptProvider, Peer } from "@vpnkeeper/core";

const DEFAULT_SERVER_ADDRESS = "10.0.0.1/24";
/** PPPoE MTU (1492) minus IPv4 WireGuard overhead (60) */
const DEFAULT_MTU = 1432;
const SERVER_KEY_PATH = "/etc/wireguard/keys/server.key";

/** Configuration options for the WireGuard startup script */
export interface WireguardScriptOptions {
  /** UDP port wg0 listens on */
  listenPort: number;
  /** Tunnel address of the server in CIDR form (default: 10.0.0.1/24) */
  serverAddress?: string;
  /** wg0 MTU (default: 1432) */
  mtu?: number;
}

export function buildPackageSection(): string {
  return `# Install wireguard, ufw and iptables
echo "[INFO] Installing wireguard, ufw, iptables..."
export DEBIAN_FRONTEND=noninteractive
apt-get update -y > /dev/null
apt-get install -y wireguard ufw iptables > /dev/null
echo "[SUCCESS] Packages installed."`;
}

/**
 * Forwarding, BBR congestion control and larger socket buffers.
 */
export function buildSysctlSection(): string {
  return `# Kernel settings for forwarding and throughput
cat << EOF > /etc/sysctl.d/99-vpn-optimizations.conf
net.ipv4.ip_forward=1
net.ipv6.conf.all.forwarding=1
net.core.default_qdisc=fq
net.ipv4.tcp_congestion_control=bbr
net.core.rmem_max=20971520
net.core.wmem_max=20971520
net.ipv4.tcp_rmem=4096 131072 20971520
net.ipv4.tcp_wmem=4096 16384 20971520
EOF
sysctl -p /etc/sysctl.d/99-vpn-optimizations.conf > /dev/null
echo "[SUCCESS] sysctl settings applied."`;
}

/**
 * Generates the server key pair once; a reboot keeps the existing keys.
 */
export function buildServerKeySection(): string {
  return `# Server keys
mkdir -p /etc/wireguard/keys
if [ ! -f ${SERVER_KEY_PATH} ]; then
  echo "[INFO] Generating new server keys..."
  ( umask 077; wg genkey > ${SERVER_KEY_PATH} )
  wg pubkey < ${SERVER_KEY_PATH} > ${SERVER_KEY_PATH}.pub
  chmod 600 ${SERVER_KEY_PATH}
else
  echo "[INFO] Existing server keys found."
fi`;
}

export function buildInterfaceSection(options: WireguardScriptOptions): string {
  const address = options.serverAddress ?? DEFAULT_SERVER_ADDRESS;
  const mtu = options.mtu ?? DEFAULT_MTU;

  return `# wg0 interface
IFACE=$(ip -o -4 route show to default | awk '{print $5}' | head -n 1)
if [ -z "$IFACE" ]; then
  echo "[ERROR] Could not determine default network interface." >&2
  exit 1
fi
if ! ip link show wg0 > /dev/null 2>&1; then
  ip link add wg0 type wireguard
fi
wg set wg0 private-key ${SERVER_KEY_PATH} listen-port ${options.listenPort}
ip address replace ${address} dev wg0
ip link set dev wg0 mtu ${mtu}
ip link set wg0 up
echo "[SUCCESS] wg0 is up on port ${options.listenPort}."`;
}

/**
 * NAT out of the default interface plus MSS clamping. Existing rules are
 * removed first so a rerun does not stack duplicates.
 */
export function buildForwardingSection(): string {
  return `# NAT and forwarding
iptables -D FORWARD -i wg0 -j ACCEPT > /dev/null 2>&1 || true
iptables -t nat -D POSTROUTING -o "$IFACE" -j MASQUERADE > /dev/null 2>&1 || true
iptables -t mangle -D FORWARD -p tcp --tcp-flags SYN,RST SYN -j TCPMSS --clamp-mss-to-pmtu > /dev/null 2>&1 || true
iptables -A FORWARD -i wg0 -j ACCEPT
iptables -t nat -A POSTROUTING -o "$IFACE" -j MASQUERADE
iptables -t mangle -A FORWARD -p tcp --tcp-flags SYN,RST SYN -j TCPMSS --clamp-mss-to-pmtu
echo "[SUCCESS] iptables rules configured."`;
}

export function buildUfwSection(listenPort: number): string {
  return `# Host firewall
sed -i -e 's|DEFAULT_FORWARD_POLICY="DROP"|DEFAULT_FORWARD_POLICY="ACCEPT"|' /etc/default/ufw
sed -i -e 's|#net/ipv4/ip_forward=1|net/ipv4/ip_forward=1|' /etc/ufw/sysctl.conf
sed -i -e 's|#net/ipv6/conf/default/forwarding=1|net/ipv6/conf/default/forwarding=1|' /etc/ufw/sysctl.conf
sed -i -e 's|#net/ipv6/conf/all/forwarding=1|net/ipv6/conf/all/forwarding=1|' /etc/ufw/sysctl.conf
ufw allow ${listenPort}/udp > /dev/null
ufw allow 22/tcp > /dev/null
ufw default deny incoming > /dev/null
ufw default allow outgoing > /dev/null
ufw disable > /dev/null
ufw --force enable > /dev/null
echo "[SUCCESS] UFW configured and enabled."`;
}

/**
 * Announces the server public key on the serial console, where the
 * manager reads it back.
 */
export function buildKeyAnnouncementSection(): string {
  return `echo "${PUBLIC_KEY_MARKER}$(cat ${SERVER_KEY_PATH}.pub)" > /dev/ttyS0
echo "[INFO] Startup script completed."`;
}

/**
 * Builds the startup script template, placeholder line included.
 */
export function buildWireguardStartupScript(options: WireguardScriptOptions): string {
  return `#!/bin/bash
set -e

${buildPackageSection()}

${buildSysctlSection()}

${buildServerKeySection()}

${buildInterfaceSection(options)}

${buildForwardingSection()}

${buildUfwSection(options.listenPort)}

echo "[INFO] Adding peers..."
${PEER_CONFIGS_PLACEHOLDER}

${buildKeyAnnouncementSection()}
`;
}

export interface StartupScriptBuilderOptions extends WireguardScriptOptions {
  /** Custom template file; must contain the placeholder line */
  templatePath?: string;
}

/**
 * Produces the startup script for a deploy with the configured peers.
 */
export class StartupScriptBuilder implements BootScriptProvider {
  constructor(private readonly options: StartupScriptBuilderOptions) {}

  async build(peers: readonly Peer[]): Promise<string> {
    const template = await this.loadTemplate();
    return injectPeerDirectives(template, renderBootPeers(peers)).trim();
  }

  private async loadTemplate(): Promise<string> {
    const { templatePath } = this.options;
    if (!templatePath) return buildWireguardStartupScript(this.options);

    try {
      return await fs.readFile(templatePath, "utf-8");
    } catch (error: unknown) {
      throw new ConfigurationError(
        `Startup script template ${templatePath} could not be read`,
        ["Fix or remove bootScriptPath in the config"],
        toError(error)
      );
    }
  }
}
