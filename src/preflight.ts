import * as p from "@clack/prompts";
import { isCancel } from "@clack/prompts";
import { spawnSync } from "node:child_process";
import { existsSync, readFileSync } from "node:fs";
import net from "node:net";
import process from "node:process";
import type { ProvisioningConfig } from "./types";

export type Ok = {
  ok: true;
  name: string;
  detail?: string;
  required: boolean;
};

export type Fail = {
  ok: false;
  name: string;
  reason: string; // concise
  required: boolean;
  hint?: string;
};

export type CheckResult = Ok | Fail;

/** What preflight needs to know about the machine it runs on. */
export interface PreflightProbe {
  platform: NodeJS.Platform;
  uid: number | null;
  osRelease(): string | null;
  hasCommand(cmd: string): boolean;
  pathExists(p: string): boolean;
  portAvailable(port: number): Promise<boolean>;
  serviceActive(unit: string): boolean;
}

export function systemProbe(): PreflightProbe {
  return {
    platform: process.platform,
    uid: process.getuid?.() ?? null,
    osRelease() {
      try {
        return readFileSync("/etc/os-release", "utf-8");
      } catch {
        return null; // non-Linux or stripped image
      }
    },
    hasCommand: (cmd) =>
      spawnSync("sh", ["-c", 'command -v "$1"', "sh", cmd], { stdio: "ignore" }).status === 0,
    pathExists: (p) => existsSync(p),
    portAvailable: (port) =>
      new Promise((resolve) => {
        const server = net.createServer();
        server.once("error", () => resolve(false));
        server.listen(port, "127.0.0.1", () => server.close(() => resolve(true)));
      }),
    serviceActive: (unit) =>
      spawnSync("systemctl", ["is-active", "--quiet", unit], { stdio: "ignore" }).status === 0,
  };
}

function checkPlatform(probe: PreflightProbe): CheckResult {
  return probe.platform === "linux"
    ? { ok: true, name: "Linux", required: true }
    : {
        ok: false,
        name: "Linux",
        required: true,
        reason: `Detected ${probe.platform}`,
        hint: "Run this on the Ubuntu server you are provisioning.",
      };
}

function checkUbuntu(probe: PreflightProbe): CheckResult {
  const release = probe.osRelease();
  const version = release?.match(/^VERSION_ID="?([^"\n]+)"?/m)?.[1];
  return release && /^ID=ubuntu$/m.test(release)
    ? { ok: true, name: "Ubuntu", detail: version, required: false }
    : {
        ok: false,
        name: "Ubuntu",
        required: false,
        reason: "Not an Ubuntu release",
        hint: "Other Debian derivatives usually work but are untested.",
      };
}

function checkRoot(probe: PreflightProbe): CheckResult {
  return probe.uid === 0
    ? { ok: true, name: "root", required: true }
    : {
        ok: false,
        name: "root",
        required: true,
        reason: "Not running as root",
        hint: "Re-run with sudo.",
      };
}

function checkCommand(probe: PreflightProbe, cmd: string, hint: string): CheckResult {
  return probe.hasCommand(cmd)
    ? { ok: true, name: cmd, required: true }
    : { ok: false, name: cmd, required: true, reason: "Not found in PATH", hint };
}

function checkAppDir(probe: PreflightProbe, config: ProvisioningConfig): CheckResult[] {
  const dir: CheckResult = probe.pathExists(config.appDir)
    ? { ok: true, name: "Application directory", detail: config.appDir, required: true }
    : {
        ok: false,
        name: "Application directory",
        required: true,
        reason: `${config.appDir} does not exist`,
        hint: "Copy the project to the server (scp or git clone) first.",
      };
  const reqs = `${config.appDir}/requirements.txt`;
  const requirements: CheckResult = probe.pathExists(reqs)
    ? { ok: true, name: "requirements.txt", required: true }
    : {
        ok: false,
        name: "requirements.txt",
        required: true,
        reason: `${reqs} is missing`,
        hint: "Pin the application's Python dependencies in requirements.txt.",
      };
  return [dir, requirements];
}

async function checkPort(probe: PreflightProbe, config: ProvisioningConfig): Promise<CheckResult> {
  const name = `Port ${config.port}`;
  if (await probe.portAvailable(config.port)) return { ok: true, name, detail: "free", required: true };
  // a previous run of this tool already owns it
  if (probe.serviceActive(config.appName)) {
    return { ok: true, name, detail: `held by ${config.appName}.service`, required: true };
  }
  return {
    ok: false,
    name,
    required: true,
    reason: "Already in use by another process",
    hint: "Pick another port with PROVISION_PORT.",
  };
}

export async function collectPreflight(
  config: ProvisioningConfig,
  probe: PreflightProbe
): Promise<CheckResult[]> {
  return [
    checkPlatform(probe),
    checkUbuntu(probe),
    checkRoot(probe),
    checkCommand(probe, "apt-get", "This tool targets Debian/Ubuntu hosts."),
    checkCommand(probe, "systemctl", "The host must run systemd."),
    ...checkAppDir(probe, config),
    await checkPort(probe, config),
  ];
}

export function formatFailures(failures: Fail[]): string {
  const lines: string[] = ["Some requirements are not met:", ""];
  for (const f of failures) {
    lines.push(`• ${f.name}: ${f.reason}`);
    if (f.hint) lines.push(`  - ${f.hint}`);
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

export async function runPreflightOrExit(
  config: ProvisioningConfig,
  opts: { interactive: boolean; probe?: PreflightProbe }
): Promise<void> {
  const s = opts.interactive ? p.spinner() : null;
  s?.start("Checking the host");
  const results = await collectPreflight(config, opts.probe ?? systemProbe());
  s?.stop("Host checked");

  p.log.message(
    results
      .map((r) => (r.ok ? `${r.name} ✓${r.detail ? ` (${r.detail})` : ""}` : `${r.name} ✗`))
      .join("\n")
  );

  const failures = results.filter((r): r is Fail => !r.ok);
  if (failures.length === 0) {
    p.log.message("All requirements satisfied.");
    return;
  }

  p.note(formatFailures(failures), "Preflight");

  if (failures.some((f) => f.required)) {
    p.cancel("Please resolve the above and re-run.");
    process.exit(1);
  }

  if (!opts.interactive) {
    p.log.warn("Only recommended checks failed; continuing.");
    return;
  }

  const cont = await p.confirm({
    message: "Only recommended checks failed. Continue anyway?",
    initialValue: false,
  });

  if (isCancel(cont) || !cont) {
    p.cancel("Aborted.");
    process.exit(1);
  }
}
