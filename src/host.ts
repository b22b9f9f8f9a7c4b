import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import { CommandError } from "./errors";
import type { CommandResult, CommandRunner, RunOptions } from "./types";

function quoteArg(arg: string) {
  return /^[A-Za-z0-9_@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(quoteArg).join(" ");
}

export function createShellRunner(): CommandRunner {
  return {
    run(command, args, options: RunOptions = {}) {
      return new Promise<CommandResult>((resolve) => {
        const child = spawn(command, args, {
          cwd: options.cwd,
          env: { ...process.env, DEBIAN_FRONTEND: "noninteractive", ...options.env },
          stdio: ["ignore", "pipe", "pipe"],
        });
        let stdout = "";
        let stderr = "";
        child.stdout.setEncoding("utf-8").on("data", (chunk: string) => (stdout += chunk));
        child.stderr.setEncoding("utf-8").on("data", (chunk: string) => (stderr += chunk));
        // spawn failures (missing binary, bad cwd) surface as a failed command
        child.on("error", (err) => resolve({ exitCode: 127, stdout, stderr: stderr + err.message }));
        child.on("close", (code) => resolve({ exitCode: code ?? 1, stdout, stderr }));
      });
    },
  };
}

export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions
): Promise<CommandResult> {
  const res = await runner.run(command, args, options);
  if (res.exitCode !== 0) {
    throw new CommandError(
      formatCommand(command, args),
      res.exitCode,
      [res.stdout, res.stderr].filter(Boolean).join("\n")
    );
  }
  return res;
}

function isMissing(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Filesystem access to the target host. Paths are absolute host paths,
 * resolved under `root` so tests can point the whole procedure at a temp dir.
 */
export class HostFs {
  constructor(readonly root = "/") {}

  resolve(hostPath: string): string {
    return path.join(this.root, hostPath);
  }

  async read(hostPath: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(hostPath), "utf-8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async write(hostPath: string, content: string, mode = 0o644): Promise<void> {
    const file = this.resolve(hostPath);
    await fs.mkdir(path.dirname(file), { recursive: true });
    const tmpFile = `${file}.tmp`;
    // a leftover tmp file from an interrupted run would keep its old mode
    await fs.rm(tmpFile, { force: true });
    await fs.writeFile(tmpFile, content, { mode });
    await fs.chmod(tmpFile, mode);
    await fs.rename(tmpFile, file);
  }

  async exists(hostPath: string): Promise<boolean> {
    try {
      await fs.lstat(this.resolve(hostPath));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  /**
   * Link target as stored: relative targets verbatim, absolute ones as host
   * paths. Null when `hostPath` is not a symlink.
   */
  async readlinkRaw(hostPath: string): Promise<string | null> {
    try {
      const stat = await fs.lstat(this.resolve(hostPath));
      if (!stat.isSymbolicLink()) return null;
      const target = await fs.readlink(this.resolve(hostPath));
      if (this.root !== "/" && target.startsWith(this.root)) {
        return path.join("/", path.relative(this.root, target));
      }
      return target;
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  /** Absolute host path the link points at, or null when it is not a symlink. */
  async readlink(hostPath: string): Promise<string | null> {
    const target = await this.readlinkRaw(hostPath);
    if (target === null || path.posix.isAbsolute(target)) return target;
    return path.posix.join(path.posix.dirname(hostPath), target);
  }

  /** Relative targets are stored as given, absolute ones under `root`. */
  async symlink(target: string, hostPath: string): Promise<void> {
    const link = this.resolve(hostPath);
    await fs.mkdir(path.dirname(link), { recursive: true });
    await fs.rm(link, { force: true });
    await fs.symlink(path.posix.isAbsolute(target) ? this.resolve(target) : target, link);
  }

  async remove(hostPath: string): Promise<void> {
    await fs.rm(this.resolve(hostPath), { force: true });
  }

  async mkdir(hostPath: string): Promise<void> {
    await fs.mkdir(this.resolve(hostPath), { recursive: true });
  }

  async copy(from: string, to: string): Promise<void> {
    await fs.mkdir(path.dirname(this.resolve(to)), { recursive: true });
    await fs.copyFile(this.resolve(from), this.resolve(to));
  }

  async mtime(hostPath: string): Promise<Date | null> {
    try {
      return (await fs.lstat(this.resolve(hostPath))).mtime;
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async list(hostPath: string): Promise<string[]> {
    try {
      return await fs.readdir(this.resolve(hostPath));
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
  }
}
