import os from "node:os";
import type { ProvisioningConfig } from "./types";

/** First non-internal IPv4 address, as `hostname -I` would list it. */
export function detectPublicAddress(
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces()
): string | null {
  for (const infos of Object.values(interfaces)) {
    for (const info of infos ?? []) {
      if (info.family === "IPv4" && !info.internal) return info.address;
    }
  }
  return null;
}

export function formatCompletionBanner(
  config: ProvisioningConfig,
  address: string | null
): string {
  const ip = address ?? "<server-ip>";
  const host = config.domain === "_" ? ip : config.domain;
  const site = `/etc/nginx/sites-available/${config.appName}`;

  const https =
    config.domain === "_"
      ? [
          `  1. Point a DNS A record for your domain at ${ip}`,
          `  2. Replace server_name in ${site}`,
          "  3. certbot --nginx -d <your-domain>",
        ]
      : [`  certbot --nginx -d ${config.domain}`];

  return [
    `Site:       http://${host}`,
    `Admin:      http://${host}/admin`,
    `Login:      ${config.adminLogin}`,
    `Password:   ${config.adminPassword}`,
    "",
    "Change the administrator password after the first login!",
    "",
    "To enable HTTPS:",
    ...https,
    "",
    "Useful commands:",
    `  systemctl status ${config.appName}     application status`,
    `  systemctl restart ${config.appName}    restart`,
    `  journalctl -u ${config.appName} -f     follow logs`,
  ].join("\n");
}
