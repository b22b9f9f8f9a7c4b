import * as p from "@clack/prompts";
import { isCancel } from "@clack/prompts";
import pc from "picocolors";
import { detectPublicAddress, formatCompletionBanner } from "./banner";
import { formatConfigSummary, loadConfig } from "./config";
import { ConfigError, StepError, describeError } from "./errors";
import { createShellRunner } from "./host";
import { runPreflightOrExit } from "./preflight";
import { runProvisioning } from "./provision";
import { createClackReporter } from "./reporter";

// Over plain ssh pipes or CI there is nobody to answer prompts
const isTTY = Boolean(process.stdout.isTTY && process.stdin.isTTY);

async function main() {
  p.intro(pc.cyan(pc.bold("🛠️  Site provisioning · nginx + gunicorn + systemd + ufw")));

  const config = loadConfig();
  p.note(formatConfigSummary(config), "Configuration");

  await runPreflightOrExit(config, { interactive: isTTY });

  if (isTTY && !config.dryRun) {
    const go = await p.confirm({
      message: `Provision this host for ${pc.bold(config.appName)}?`,
      initialValue: true,
    });
    if (isCancel(go) || !go) {
      p.cancel("Cancelled.");
      process.exit(1);
    }
  }

  const report = await runProvisioning(config, {
    runner: createShellRunner(),
    reporter: createClackReporter({ interactive: isTTY }),
  });

  if (report.dryRun) {
    const pending = report.steps
      .flatMap((s) => s.resources)
      .filter((r) => r.outcome === "pending").length;
    p.outro(pc.yellow(`Dry run: ${pending} change(s) pending, nothing was modified.`));
    return;
  }

  p.note(formatCompletionBanner(config, detectPublicAddress()), "Deployment complete");
  p.outro(pc.green("Done."));
}

main()
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    if (err instanceof StepError) {
      p.cancel("Provisioning stopped. Fix the problem above and re-run; every step is safe to repeat.");
    } else if (err instanceof ConfigError) {
      p.cancel("Fix provision.env or the PROVISION_* variables and re-run.");
    } else {
      p.cancel("Unexpected error.");
    }
    console.error(pc.red(describeError(err)));
    process.exit(1);
  });
