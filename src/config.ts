import { parse as dotenvParse } from "dotenv";
import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { ProvisioningConfig } from "./types";

export const CONFIG_FILE = "provision.env";

export function defaultConfig(): ProvisioningConfig {
  return {
    appName: "publisher",
    appDir: "/var/www/publisher_site",
    appUser: "www-data",
    domain: "_",
    port: 8000,
    wsgiModule: "app",
    wsgiObject: "app",
    workers: 3,
    timeoutSeconds: 120,
    staticPath: "/static/",
    clientMaxBodySize: "100M",
    databaseFile: "instance/publisher.db",
    backupsToKeep: 10,
    secretBytes: 32,
    adminLogin: "admin",
    adminPassword: "admin2026",
    dryRun: false,
  };
}

const identifier = /^[A-Za-z_][A-Za-z0-9_]*$/;

const schema = z.object({
  appName: z
    .string()
    .regex(/^[a-z][a-z0-9_-]{0,63}$/, "must be lowercase letters, digits, '-' or '_'"),
  appDir: z
    .string()
    .refine((v) => path.posix.isAbsolute(v), "must be an absolute path")
    .refine((v) => path.posix.normalize(v) !== "/", "must not be the filesystem root")
    .refine((v) => !/[\s"'\\;{}$]/.test(v), "must not contain whitespace or quoting characters"),
  appUser: z.string().regex(/^[a-z_][a-z0-9_-]*\$?$/, "must be a valid system user name"),
  domain: z
    .string()
    .refine(
      (v) => v === "_" || /^(?!-)([a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}$/i.test(v),
      "must be '_' or a hostname such as example.com"
    ),
  port: z.coerce
    .number()
    .int()
    .min(1024, "must be 1024 or above (22, 80 and 443 belong to ssh and nginx)")
    .max(65535),
  wsgiModule: z.string().regex(/^[A-Za-z_][A-Za-z0-9_.]*$/, "must be a Python module path"),
  wsgiObject: z.string().regex(identifier, "must be a Python identifier"),
  workers: z.coerce.number().int().min(1).max(64),
  timeoutSeconds: z.coerce.number().int().min(1).max(3600),
  staticPath: z
    .string()
    .regex(/^\/[A-Za-z0-9_\-/]*\/$/, "must start and end with '/'")
    .refine((v) => v !== "/", "must not be '/'"),
  clientMaxBodySize: z.string().regex(/^\d+[kKmMgG]?$/, "must be an nginx size such as 100M"),
  databaseFile: z
    .string()
    .min(1)
    .refine((v) => !path.posix.isAbsolute(v) && !v.split("/").includes(".."), "must stay inside appDir"),
  backupsToKeep: z.coerce.number().int().min(1).max(1000),
  secretBytes: z.coerce.number().int().min(32, "needs at least 32 bytes (256 bits)").max(256),
  adminLogin: z.string().min(1),
  adminPassword: z.string().min(1),
  dryRun: z.boolean(),
});

// env var → config key
const ENV_KEYS = {
  PROVISION_APP_NAME: "appName",
  PROVISION_APP_DIR: "appDir",
  PROVISION_APP_USER: "appUser",
  PROVISION_DOMAIN: "domain",
  PROVISION_PORT: "port",
  PROVISION_WSGI_MODULE: "wsgiModule",
  PROVISION_WSGI_OBJECT: "wsgiObject",
  PROVISION_WORKERS: "workers",
  PROVISION_TIMEOUT: "timeoutSeconds",
  PROVISION_STATIC_PATH: "staticPath",
  PROVISION_CLIENT_MAX_BODY_SIZE: "clientMaxBodySize",
  PROVISION_DATABASE_FILE: "databaseFile",
  PROVISION_BACKUPS_TO_KEEP: "backupsToKeep",
  PROVISION_SECRET_BYTES: "secretBytes",
  PROVISION_ADMIN_LOGIN: "adminLogin",
  PROVISION_ADMIN_PASSWORD: "adminPassword",
  PROVISION_DRY_RUN: "dryRun",
} as const satisfies Record<string, keyof ProvisioningConfig>;

function parseFlag(value: string): boolean {
  return /^(1|true|yes|on)$/i.test(value.trim());
}

function readConfigFile(cwd: string): Record<string, string> {
  const file = path.join(cwd, CONFIG_FILE);
  if (!existsSync(file)) return {};
  return dotenvParse(readFileSync(file, "utf-8"));
}

/**
 * Defaults, then `provision.env` in `cwd`, then `PROVISION_*` variables.
 * The database file follows the app name unless set explicitly.
 */
export function loadConfig(options: {
  env?: Record<string, string | undefined>;
  cwd?: string;
} = {}): ProvisioningConfig {
  const env = options.env ?? process.env;
  const fileVars = readConfigFile(options.cwd ?? process.cwd());
  const merged: Record<string, unknown> = { ...defaultConfig() };
  let databaseFileSet = false;

  for (const source of [fileVars, env]) {
    for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
      const raw = source[envKey];
      if (raw === undefined || raw.trim() === "") continue;
      merged[configKey] = configKey === "dryRun" ? parseFlag(raw) : raw.trim();
      if (configKey === "databaseFile") databaseFileSet = true;
    }
  }

  if (!databaseFileSet && typeof merged.appName === "string") {
    merged.databaseFile = `instance/${merged.appName}.db`;
  }

  return validateConfig(merged);
}

export function validateConfig(input: unknown): ProvisioningConfig {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`)
    );
  }
  return { ...parsed.data, appDir: path.posix.normalize(parsed.data.appDir).replace(/\/$/, "") };
}

export function formatConfigSummary(config: ProvisioningConfig) {
  return [
    `Application:         ${config.appName}`,
    `Directory:           ${config.appDir}`,
    `Runtime user:        ${config.appUser}`,
    `Domain:              ${config.domain === "_" ? "any host (_)" : config.domain}`,
    `Gunicorn:            ${config.wsgiModule}:${config.wsgiObject} on 127.0.0.1:${config.port} (${config.workers} workers)`,
    `Static path:         ${config.staticPath}`,
    `Database:            ${config.databaseFile}`,
    `Mode:                ${config.dryRun ? "dry run (no changes)" : "apply"}`,
  ].join("\n");
}
