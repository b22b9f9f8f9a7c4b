import { describe, expect, it } from "vitest";
import { defaultConfig, validateConfig } from "./config";
import { TemplateError } from "./errors";
import { renderProxySite, renderServiceUnit, renderTemplate } from "./templates";

const config = validateConfig(defaultConfig());

describe("renderTemplate", () => {
  it("substitutes every placeholder", () => {
    expect(renderTemplate("listen {{port}}; root {{ dir }};", { port: 80, dir: "/srv" }, "nginx")).toBe(
      "listen 80; root /srv;"
    );
  });

  it("rejects a placeholder without a value", () => {
    expect(() => renderTemplate("listen {{port}};", {}, "nginx")).toThrow("No value for {{port}}");
  });

  it("rejects values the template never uses", () => {
    expect(() => renderTemplate("listen 80;", { port: 80 }, "nginx")).toThrow(
      "Template never uses port"
    );
  });

  it("rejects values that would break out of an nginx directive", () => {
    expect(() =>
      renderTemplate("server_name {{domain}};", { domain: "example.com; return 500" }, "nginx")
    ).toThrow(TemplateError);
  });

  it("rejects line breaks in systemd values", () => {
    expect(() =>
      renderTemplate("User={{user}}", { user: "www-data\nExecStartPre=/bin/true" }, "systemd")
    ).toThrow(TemplateError);
  });
});

describe("renderServiceUnit", () => {
  it("renders the unit for the default config", () => {
    const secret = "ab".repeat(32);
    expect(renderServiceUnit(config, secret)).toBe(`[Unit]
Description=publisher site (Flask + Gunicorn)
After=network.target

[Service]
User=www-data
Group=www-data
WorkingDirectory=/var/www/publisher_site
Environment="SECRET_KEY=${secret}"
Environment="FLASK_DEBUG=0"
ExecStart=/var/www/publisher_site/venv/bin/gunicorn --workers 3 --bind 127.0.0.1:8000 --timeout 120 app:app
Restart=always
RestartSec=5

[Install]
WantedBy=multi-user.target
`);
  });
});

describe("renderProxySite", () => {
  const site = renderProxySite(config);

  it("serves the static path from disk with a 30-day cache", () => {
    expect(site).toContain(`    location /static/ {
        alias /var/www/publisher_site/static/;
        expires 30d;
        add_header Cache-Control "public, immutable";
    }`);
  });

  it("proxies everything else to the loopback port", () => {
    expect(site).toContain(`    location / {
        proxy_pass http://127.0.0.1:8000;
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
        proxy_read_timeout 120;
    }`);
    const locations = [...site.matchAll(/location (\S+) \{/g)].map((m) => m[1]);
    expect(locations).toEqual(["/static/", "/"]);
  });

  it("listens on port 80 for any host", () => {
    expect(site.startsWith("server {\n    listen 80;\n    server_name _;\n")).toBe(true);
    expect(site).toContain("client_max_body_size 100M;");
  });
});
