import { formatCommand, runOrThrow, type HostFs } from "./host";
import type { CommandRunner, Outcome, RunOptions } from "./types";

export interface HostContext {
  runner: CommandRunner;
  fs: HostFs;
}

/** A piece of desired host state: `check` reports whether it already holds. */
export interface Resource {
  describe: string;
  check(): Promise<boolean>;
  apply(): Promise<void>;
}

export async function converge(resource: Resource, opts: { dryRun: boolean }): Promise<Outcome> {
  if (await resource.check()) return "unchanged";
  if (opts.dryRun) return "pending";
  await resource.apply();
  return "changed";
}

/** Imperative command with no observable state; always runs. */
export function command(
  ctx: HostContext,
  cmd: string,
  args: string[],
  options?: RunOptions & { describe?: string }
): Resource {
  return {
    describe: options?.describe ?? formatCommand(cmd, args),
    check: async () => false,
    apply: async () => {
      await runOrThrow(ctx.runner, cmd, args, { cwd: options?.cwd, env: options?.env });
    },
  };
}

export function aptPackages(ctx: HostContext, packages: string[]): Resource {
  let missing: string[] = [];
  return {
    describe: `packages ${packages.join(" ")}`,
    async check() {
      missing = [];
      for (const pkg of packages) {
        const res = await ctx.runner.run("dpkg-query", ["-W", "--showformat=${Status}", pkg]);
        if (res.exitCode !== 0 || !res.stdout.includes("install ok installed")) {
          missing.push(pkg);
        }
      }
      return missing.length === 0;
    },
    async apply() {
      await runOrThrow(ctx.runner, "apt-get", ["install", "-y", ...missing]);
    },
  };
}

export function ufwRule(ctx: HostContext, rule: string): Resource {
  return {
    describe: `ufw allow ${rule}`,
    async check() {
      // ufw may not be installed yet during a dry run
      const res = await ctx.runner.run("ufw", ["show", "added"]);
      if (res.exitCode !== 0) return false;
      return res.stdout
        .split("\n")
        .some((line) => line.replace(/['"]/g, "").trim() === `ufw allow ${rule}`);
    },
    async apply() {
      await runOrThrow(ctx.runner, "ufw", ["allow", rule]);
    },
  };
}

export function ufwEnabled(ctx: HostContext): Resource {
  return {
    describe: "ufw enabled",
    async check() {
      const res = await ctx.runner.run("ufw", ["status"]);
      return res.exitCode === 0 && /^Status:\s*active\b/m.test(res.stdout);
    },
    async apply() {
      await runOrThrow(ctx.runner, "ufw", ["--force", "enable"]);
    },
  };
}

export function fileContent(
  ctx: HostContext,
  filePath: string,
  content: string,
  mode = 0o644
): Resource {
  return {
    describe: filePath,
    check: async () => (await ctx.fs.read(filePath)) === content,
    apply: () => ctx.fs.write(filePath, content, mode),
  };
}

export function symlink(ctx: HostContext, target: string, linkPath: string): Resource {
  return {
    describe: `${linkPath} -> ${target}`,
    check: async () => (await ctx.fs.readlink(linkPath)) === target,
    apply: () => ctx.fs.symlink(target, linkPath),
  };
}

export function absent(ctx: HostContext, filePath: string): Resource {
  return {
    describe: `${filePath} absent`,
    check: async () => !(await ctx.fs.exists(filePath)),
    apply: () => ctx.fs.remove(filePath),
  };
}

export function virtualenv(ctx: HostContext, appDir: string): Resource {
  return {
    describe: `${appDir}/venv`,
    check: () => ctx.fs.exists(`${appDir}/venv/bin/python`),
    async apply() {
      await runOrThrow(ctx.runner, "python3", ["-m", "venv", "venv"], {
        cwd: ctx.fs.resolve(appDir),
      });
    },
  };
}

export function serviceEnabled(ctx: HostContext, unit: string): Resource {
  return {
    describe: `${unit} enabled`,
    async check() {
      const res = await ctx.runner.run("systemctl", ["is-enabled", "--quiet", unit]);
      return res.exitCode === 0;
    },
    async apply() {
      await runOrThrow(ctx.runner, "systemctl", ["enable", unit]);
    },
  };
}

/**
 * Unit is active. With `restart`, the unit is restarted regardless so it
 * picks up a rewritten unit file or site configuration.
 */
export function serviceRunning(ctx: HostContext, unit: string, opts: { restart: boolean }): Resource {
  return {
    describe: opts.restart ? `${unit} restarted` : `${unit} running`,
    async check() {
      if (opts.restart) return false;
      const res = await ctx.runner.run("systemctl", ["is-active", "--quiet", unit]);
      return res.exitCode === 0;
    },
    async apply() {
      await runOrThrow(ctx.runner, "systemctl", [opts.restart ? "restart" : "start", unit]);
    },
  };
}
