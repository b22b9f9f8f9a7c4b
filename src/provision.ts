import { backupDatabase } from "./backup";
import { ProvisionError, ProxyValidationError, StepError } from "./errors";
import { HostFs } from "./host";
import {
  absent,
  aptPackages,
  command,
  converge,
  fileContent,
  serviceEnabled,
  serviceRunning,
  symlink,
  ufwEnabled,
  ufwRule,
  virtualenv,
  type HostContext,
  type Resource,
} from "./resources";
import { generateSecret, maskSecret } from "./secret";
import { renderProxySite, renderServiceUnit } from "./templates";
import type {
  CommandRunner,
  ProvisioningConfig,
  ProvisionReport,
  Reporter,
  ResourceOutcome,
  StepId,
  StepReport,
} from "./types";

export const PACKAGES = [
  "python3",
  "python3-pip",
  "python3-venv",
  "nginx",
  "certbot",
  "python3-certbot-nginx",
  "ufw",
];

// OpenSSH must stay first: it is allowed before the firewall comes up.
export const FIREWALL_RULES = ["OpenSSH", "Nginx Full"];

export const DEFAULT_SITE_LINK = "/etc/nginx/sites-enabled/default";

export const paths = {
  unit: (c: ProvisioningConfig) => `/etc/systemd/system/${c.appName}.service`,
  siteAvailable: (c: ProvisioningConfig) => `/etc/nginx/sites-available/${c.appName}`,
  siteEnabled: (c: ProvisioningConfig) => `/etc/nginx/sites-enabled/${c.appName}`,
  venvBin: (c: ProvisioningConfig, bin: string) => `${c.appDir}/venv/bin/${bin}`,
};

export interface ProvisionDeps {
  runner: CommandRunner;
  fs?: HostFs;
  reporter?: Reporter;
  now?: () => Date;
}

interface RunState {
  ctx: HostContext;
  config: ProvisioningConfig;
  reporter: Reporter;
  now: () => Date;
  secret: string | null;
  backupPath: string | null;
}

interface Step {
  id: StepId;
  title: string;
  run(state: RunState): Promise<ResourceOutcome[]>;
}

export const silentReporter: Reporter = {
  stepStart() {},
  stepDone() {},
  stepFailed() {},
  info() {},
};

async function convergeAll(state: RunState, resources: Resource[]): Promise<ResourceOutcome[]> {
  const outcomes: ResourceOutcome[] = [];
  for (const resource of resources) {
    const outcome = await converge(resource, { dryRun: state.config.dryRun });
    outcomes.push({ resource: resource.describe, outcome });
  }
  return outcomes;
}

function chownApp(state: RunState): Resource {
  const { appUser, appDir } = state.config;
  return command(state.ctx, "chown", ["-R", `${appUser}:${appUser}`, appDir]);
}

// ---------- proxy file snapshots ----------
type Snapshot =
  | { path: string; kind: "missing" }
  | { path: string; kind: "link"; target: string }
  | { path: string; kind: "file"; content: string };

async function snapshot(fs: HostFs, filePath: string): Promise<Snapshot> {
  const target = await fs.readlinkRaw(filePath);
  if (target !== null) return { path: filePath, kind: "link", target };
  const content = await fs.read(filePath);
  if (content !== null) return { path: filePath, kind: "file", content };
  return { path: filePath, kind: "missing" };
}

async function restore(fs: HostFs, snap: Snapshot): Promise<void> {
  await fs.remove(snap.path);
  if (snap.kind === "link") await fs.symlink(snap.target, snap.path);
  else if (snap.kind === "file") await fs.write(snap.path, snap.content);
}

function dataInitScript(config: ProvisioningConfig) {
  return [
    `from ${config.wsgiModule} import ${config.wsgiObject} as application, db, init_data`,
    "with application.app_context():",
    "    db.create_all()",
    "    init_data()",
  ].join("\n");
}

// ---------- steps ----------
export const STEPS: Step[] = [
  {
    id: "system-update",
    title: "Updating the system",
    run: (state) =>
      convergeAll(state, [
        command(state.ctx, "apt-get", ["update", "-y"]),
        command(state.ctx, "apt-get", ["upgrade", "-y"]),
      ]),
  },
  {
    id: "dependencies",
    title: "Installing Python, nginx, certbot and ufw",
    run: (state) => convergeAll(state, [aptPackages(state.ctx, PACKAGES)]),
  },
  {
    id: "firewall",
    title: "Configuring the firewall",
    run: (state) =>
      convergeAll(state, [
        ...FIREWALL_RULES.map((rule) => ufwRule(state.ctx, rule)),
        ufwEnabled(state.ctx),
      ]),
  },
  {
    id: "app-environment",
    title: "Setting up the Python environment",
    async run(state) {
      const { ctx, config } = state;
      const cwd = ctx.fs.resolve(config.appDir);
      const pip = paths.venvBin(config, "pip");
      const outcomes = await convergeAll(state, [
        virtualenv(ctx, config.appDir),
        command(ctx, pip, ["install", "--upgrade", "pip"], { cwd }),
        command(ctx, pip, ["install", "-r", "requirements.txt"], { cwd }),
        command(ctx, pip, ["install", "gunicorn"], { cwd }),
      ]);
      state.secret = generateSecret(config.secretBytes);
      state.reporter.info(`SECRET_KEY generated: ${maskSecret(state.secret)}`);
      return outcomes;
    },
  },
  {
    id: "service-unit",
    title: "Creating the systemd service",
    async run(state) {
      const { ctx, config, secret } = state;
      if (!secret) throw new ProvisionError("SECRET_KEY was not generated");
      const unit = renderServiceUnit(config, secret);
      const [written] = await convergeAll(state, [fileContent(ctx, paths.unit(config), unit, 0o600)]);
      const unitChanged = written.outcome !== "unchanged";
      const rest = await convergeAll(state, [
        chownApp(state),
        ...(unitChanged ? [command(ctx, "systemctl", ["daemon-reload"])] : []),
        serviceEnabled(ctx, config.appName),
        serviceRunning(ctx, config.appName, { restart: unitChanged }),
      ]);
      state.reporter.info(`Gunicorn bound to 127.0.0.1:${config.port}`);
      return [written, ...rest];
    },
  },
  {
    id: "reverse-proxy",
    title: "Configuring nginx",
    async run(state) {
      const { ctx, config } = state;
      const site = renderProxySite(config);
      const available = paths.siteAvailable(config);
      const enabled = paths.siteEnabled(config);

      const before = [
        await snapshot(ctx.fs, available),
        await snapshot(ctx.fs, enabled),
        await snapshot(ctx.fs, DEFAULT_SITE_LINK),
      ];
      const outcomes = await convergeAll(state, [
        fileContent(ctx, available, site),
        symlink(ctx, available, enabled),
        absent(ctx, DEFAULT_SITE_LINK),
      ]);
      const changed = outcomes.some((o) => o.outcome !== "unchanged");

      if (!config.dryRun) {
        const check = await ctx.runner.run("nginx", ["-t"]);
        if (check.exitCode !== 0) {
          for (const snap of before) await restore(ctx.fs, snap);
          throw new ProxyValidationError([check.stdout, check.stderr].filter(Boolean).join("\n"));
        }
      }

      return [
        ...outcomes,
        ...(await convergeAll(state, [serviceRunning(ctx, "nginx", { restart: changed })])),
      ];
    },
  },
  {
    id: "data-init",
    title: "Initializing the database",
    async run(state) {
      const { ctx, config } = state;
      const outcomes: ResourceOutcome[] = [];
      const dbPath = `${config.appDir}/${config.databaseFile}`;
      if (config.dryRun) {
        if (await ctx.fs.exists(dbPath)) outcomes.push({ resource: "database backup", outcome: "pending" });
      } else {
        state.backupPath = await backupDatabase(ctx.fs, config, state.now());
        if (state.backupPath) {
          outcomes.push({ resource: "database backup", outcome: "changed" });
          state.reporter.info(`Database backed up to ${state.backupPath}`);
        }
      }
      outcomes.push(
        ...(await convergeAll(state, [
          command(ctx, paths.venvBin(config, "python"), ["-c", dataInitScript(config)], {
            cwd: ctx.fs.resolve(config.appDir),
            describe: "db.create_all() + init_data()",
          }),
        ]))
      );
      return outcomes;
    },
  },
  {
    id: "ownership",
    title: "Restoring directory ownership",
    run: (state) => convergeAll(state, [chownApp(state)]),
  },
];

/**
 * Runs every step in order and stops at the first failure. There is no
 * rollback: re-running from the start is the recovery path.
 */
export async function runProvisioning(
  config: ProvisioningConfig,
  deps: ProvisionDeps
): Promise<ProvisionReport> {
  const reporter = deps.reporter ?? silentReporter;
  const state: RunState = {
    ctx: { runner: deps.runner, fs: deps.fs ?? new HostFs() },
    config,
    reporter,
    now: deps.now ?? (() => new Date()),
    secret: null,
    backupPath: null,
  };

  const steps: StepReport[] = [];
  for (const [i, step] of STEPS.entries()) {
    reporter.stepStart(i + 1, STEPS.length, step.title);
    let resources: ResourceOutcome[];
    try {
      resources = await step.run(state);
    } catch (err) {
      reporter.stepFailed(step.title, err);
      throw new StepError(step.title, err);
    }
    const report = { id: step.id, title: step.title, resources };
    reporter.stepDone(report);
    steps.push(report);
  }

  return {
    dryRun: config.dryRun,
    steps,
    secretPreview: state.secret ? maskSecret(state.secret) : "",
    backupPath: state.backupPath,
  };
}
