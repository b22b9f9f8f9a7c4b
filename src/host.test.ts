import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { lstatSync, readlinkSync, writeFileSync } from "node:fs";
import { CommandError } from "./errors";
import { HostFs, formatCommand, runOrThrow } from "./host";
import { FakeRunner, makeTempRoot } from "./testing/fake-host";

describe("formatCommand", () => {
  it("quotes arguments the shell would split", () => {
    expect(formatCommand("ufw", ["allow", "Nginx Full"])).toBe("ufw allow 'Nginx Full'");
    expect(formatCommand("echo", ["it's"])).toBe("echo 'it'\\''s'");
  });
});

describe("runOrThrow", () => {
  it("raises a CommandError with the tool's output", async () => {
    const runner = new FakeRunner();
    runner.failOn = () => true;

    const err = await runOrThrow(runner, "apt-get", ["update", "-y"]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CommandError);
    expect(err instanceof CommandError && err.output).toBe("simulated failure: apt-get update -y");
    expect(err instanceof CommandError && err.exitCode).toBe(1);
  });
});

describe("HostFs", () => {
  let tmp: { root: string; cleanup(): void };
  let fs: HostFs;

  beforeEach(() => {
    tmp = makeTempRoot();
    fs = new HostFs(tmp.root);
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("reads back what it writes under the root", async () => {
    await fs.write("/etc/demo/site.conf", "listen 80;\n", 0o600);
    expect(await fs.read("/etc/demo/site.conf")).toBe("listen 80;\n");
    expect(lstatSync(fs.resolve("/etc/demo/site.conf")).mode & 0o777).toBe(0o600);
    expect(await fs.read("/etc/demo/missing.conf")).toBeNull();
  });

  it("maps symlink targets back to host paths", async () => {
    await fs.write("/etc/demo/available", "x");
    await fs.symlink("/etc/demo/available", "/etc/demo/enabled");
    expect(await fs.readlink("/etc/demo/enabled")).toBe("/etc/demo/available");
    expect(await fs.readlink("/etc/demo/available")).toBeNull();
    expect(await fs.read("/etc/demo/enabled")).toBe("x");
  });

  it("keeps relative symlink targets relative", async () => {
    await fs.write("/etc/demo/available/site", "x");
    await fs.symlink("../available/site", "/etc/demo/enabled/site");

    expect(readlinkSync(fs.resolve("/etc/demo/enabled/site"))).toBe("../available/site");
    expect(await fs.readlinkRaw("/etc/demo/enabled/site")).toBe("../available/site");
    expect(await fs.readlink("/etc/demo/enabled/site")).toBe("/etc/demo/available/site");
    expect(await fs.read("/etc/demo/enabled/site")).toBe("x");
  });

  it("applies the requested mode over a leftover temp file", async () => {
    await fs.mkdir("/etc/demo");
    writeFileSync(fs.resolve("/etc/demo/unit.tmp"), "stale", { mode: 0o644 });

    await fs.write("/etc/demo/unit", "SECRET_KEY=test-secret\n", 0o600);

    expect(lstatSync(fs.resolve("/etc/demo/unit")).mode & 0o777).toBe(0o600);
    expect(await fs.exists("/etc/demo/unit.tmp")).toBe(false);
  });

  it("reports modification times", async () => {
    await fs.write("/etc/demo/a", "1");
    expect(await fs.mtime("/etc/demo/a")).toBeInstanceOf(Date);
    expect(await fs.mtime("/etc/demo/missing")).toBeNull();
  });

  it("removes files and tolerates missing ones", async () => {
    await fs.write("/tmp/a", "1");
    await fs.remove("/tmp/a");
    await fs.remove("/tmp/a");
    expect(await fs.exists("/tmp/a")).toBe(false);
  });
});
