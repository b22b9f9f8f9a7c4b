import { utimesSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { backupDatabase, backupTimestamp } from "./backup";
import { defaultConfig } from "./config";
import { HostFs } from "./host";
import { makeTempRoot } from "./testing/fake-host";

let tmp: { root: string; cleanup(): void };
let fs: HostFs;
const config = { ...defaultConfig(), backupsToKeep: 2 };
const dbPath = "/var/www/publisher_site/instance/publisher.db";
const backups = "/var/www/publisher_site/backups";

beforeEach(() => {
  tmp = makeTempRoot();
  fs = new HostFs(tmp.root);
});

afterEach(() => {
  tmp.cleanup();
});

describe("backupTimestamp", () => {
  it("formats local time with zero padding", () => {
    expect(backupTimestamp(new Date(2026, 8, 7, 6, 5, 4))).toBe("2026-09-07_06-05-04");
  });
});

describe("backupDatabase", () => {
  it("does nothing before the database exists", async () => {
    expect(await backupDatabase(fs, config)).toBeNull();
    expect(await fs.exists(backups)).toBe(false);
  });

  it("copies the database and keeps only the newest backups", async () => {
    await fs.write(dbPath, "v1");
    await fs.write(`${backups}/notes.txt`, "unrelated");

    await backupDatabase(fs, config, new Date(2026, 0, 1, 10, 0, 0));
    await backupDatabase(fs, config, new Date(2026, 0, 2, 10, 0, 0));
    await fs.write(dbPath, "v3");
    const last = await backupDatabase(fs, config, new Date(2026, 0, 3, 10, 0, 0));

    expect(last).toBe(`${backups}/publisher_backup_2026-01-03_10-00-00.db`);
    expect((await fs.list(backups)).sort()).toEqual([
      "notes.txt",
      "publisher_backup_2026-01-02_10-00-00.db",
      "publisher_backup_2026-01-03_10-00-00.db",
    ]);
    expect(await fs.read(last ?? "")).toBe("v3");
  });

  it("prunes by modification time rather than by name", async () => {
    await fs.write(dbPath, "live");
    const renamedLate = `${backups}/publisher_backup_2026-06-01_00-00-00.db`;
    const renamedEarly = `${backups}/publisher_backup_2025-01-01_00-00-00.db`;
    await fs.write(renamedLate, "oldest");
    await fs.write(renamedEarly, "older");
    utimesSync(fs.resolve(renamedLate), new Date(2020, 0, 1), new Date(2020, 0, 1));
    utimesSync(fs.resolve(renamedEarly), new Date(2021, 0, 1), new Date(2021, 0, 1));

    await backupDatabase(fs, config, new Date(2026, 0, 3, 10, 0, 0));

    expect((await fs.list(backups)).sort()).toEqual([
      "publisher_backup_2025-01-01_00-00-00.db",
      "publisher_backup_2026-01-03_10-00-00.db",
    ]);
  });
});
