import path from "node:path";
import type { HostFs } from "./host";
import type { ProvisioningConfig } from "./types";

function pad(n: number) {
  return String(n).padStart(2, "0");
}

export function backupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_` +
    `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

export function backupsDir(config: ProvisioningConfig) {
  return path.posix.join(config.appDir, "backups");
}

/**
 * Copies the application database into `<appDir>/backups` and prunes all
 * but the newest `backupsToKeep` copies. Returns null when there is no
 * database yet.
 */
export async function backupDatabase(
  fs: HostFs,
  config: ProvisioningConfig,
  now = new Date()
): Promise<string | null> {
  const dbPath = path.posix.join(config.appDir, config.databaseFile);
  if (!(await fs.exists(dbPath))) return null;

  const dir = backupsDir(config);
  const prefix = `${config.appName}_backup_`;
  const target = path.posix.join(dir, `${prefix}${backupTimestamp(now)}.db`);
  await fs.copy(dbPath, target);

  // newest first by modification time, name breaks ties
  const existing: { name: string; mtime: number }[] = [];
  for (const name of await fs.list(dir)) {
    if (!name.startsWith(prefix) || !name.endsWith(".db")) continue;
    const mtime = await fs.mtime(path.posix.join(dir, name));
    if (mtime) existing.push({ name, mtime: mtime.getTime() });
  }
  existing.sort((a, b) => b.mtime - a.mtime || b.name.localeCompare(a.name));
  for (const old of existing.slice(config.backupsToKeep)) {
    await fs.remove(path.posix.join(dir, old.name));
  }
  return target;
}
