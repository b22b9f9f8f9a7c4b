export interface ProvisioningConfig {
  appName: string;
  appDir: string;
  appUser: string;
  domain: string; // "_" matches any host
  port: number;
  wsgiModule: string;
  wsgiObject: string;
  workers: number;
  timeoutSeconds: number;
  staticPath: string;
  clientMaxBodySize: string;
  databaseFile: string; // relative to appDir
  backupsToKeep: number;
  secretBytes: number;
  adminLogin: string;
  adminPassword: string;
  dryRun: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export type Outcome = "unchanged" | "changed" | "pending";

export type StepId =
  | "system-update"
  | "dependencies"
  | "firewall"
  | "app-environment"
  | "service-unit"
  | "reverse-proxy"
  | "data-init"
  | "ownership";

export interface ResourceOutcome {
  resource: string;
  outcome: Outcome;
}

export interface StepReport {
  id: StepId;
  title: string;
  resources: ResourceOutcome[];
}

export interface ProvisionReport {
  dryRun: boolean;
  steps: StepReport[];
  secretPreview: string;
  backupPath: string | null;
}

/** Receives progress events from the provisioning run. */
export interface Reporter {
  stepStart(index: number, total: number, title: string): void;
  stepDone(report: StepReport): void;
  stepFailed(title: string, error: unknown): void;
  info(message: string): void;
}
