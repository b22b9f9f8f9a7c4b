import { TemplateError } from "./errors";
import type { ProvisioningConfig } from "./types";

export type TemplateFormat = "nginx" | "systemd";
export type TemplateValues = Record<string, string | number>;

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9]*)\s*\}\}/g;

// Characters that would end a directive or start an expansion in the target format.
const FORBIDDEN: Record<TemplateFormat, RegExp> = {
  nginx: /[\s;{}"'#\\$]/,
  systemd: /[\r\n"%\\]/,
};

export const SERVICE_UNIT_TEMPLATE = `[Unit]
Description={{appName}} site (Flask + Gunicorn)
After=network.target

[Service]
User={{appUser}}
Group={{appUser}}
WorkingDirectory={{appDir}}
Environment="SECRET_KEY={{secret}}"
Environment="FLASK_DEBUG=0"
ExecStart={{appDir}}/venv/bin/gunicorn --workers {{workers}} --bind 127.0.0.1:{{port}} --timeout {{timeout}} {{wsgiTarget}}
Restart=always
RestartSec=5

[Install]
WantedBy=multi-user.target
`;

export const PROXY_SITE_TEMPLATE = `server {
    listen 80;
    server_name {{domain}};

    client_max_body_size {{clientMaxBodySize}};

    # served straight from disk
    location {{staticPath}} {
        alias {{appDir}}/static/;
        expires 30d;
        add_header Cache-Control "public, immutable";
    }

    location / {
        proxy_pass http://127.0.0.1:{{port}};
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
        proxy_read_timeout {{timeout}};
    }
}
`;

/**
 * Substitutes `{{name}}` placeholders. Every placeholder needs a value,
 * every value must be used, and no value may carry a character that
 * breaks out of its directive in `format`.
 */
export function renderTemplate(
  template: string,
  values: TemplateValues,
  format: TemplateFormat
): string {
  for (const [name, value] of Object.entries(values)) {
    const text = String(value);
    if (!text) throw new TemplateError(`{{${name}}} is empty`);
    if (FORBIDDEN[format].test(text)) {
      throw new TemplateError(
        `{{${name}}} contains a character ${format} cannot carry: ${JSON.stringify(text)}`
      );
    }
  }

  const used = new Set<string>();
  const missing = new Set<string>();
  const out = template.replace(PLACEHOLDER, (_match, name: string) => {
    used.add(name);
    const value = values[name];
    if (value === undefined) {
      missing.add(name);
      return "";
    }
    return String(value);
  });

  if (missing.size) {
    throw new TemplateError(`No value for ${[...missing].map((n) => `{{${n}}}`).join(", ")}`);
  }
  const unused = Object.keys(values).filter((k) => !used.has(k));
  if (unused.length) {
    throw new TemplateError(`Template never uses ${unused.join(", ")}`);
  }
  return out;
}

export function renderServiceUnit(config: ProvisioningConfig, secret: string): string {
  return renderTemplate(
    SERVICE_UNIT_TEMPLATE,
    {
      appName: config.appName,
      appUser: config.appUser,
      appDir: config.appDir,
      secret,
      workers: config.workers,
      port: config.port,
      timeout: config.timeoutSeconds,
      wsgiTarget: `${config.wsgiModule}:${config.wsgiObject}`,
    },
    "systemd"
  );
}

export function renderProxySite(config: ProvisioningConfig): string {
  return renderTemplate(
    PROXY_SITE_TEMPLATE,
    {
      domain: config.domain,
      clientMaxBodySize: config.clientMaxBodySize,
      staticPath: config.staticPath,
      appDir: config.appDir,
      port: config.port,
      timeout: config.timeoutSeconds,
    },
    "nginx"
  );
}
