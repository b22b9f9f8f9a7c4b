import * as p from "@clack/prompts";
import pc from "picocolors";
import { CommandError, ProxyValidationError, describeError, outputTail } from "./errors";
import type { Reporter, StepReport } from "./types";

function summarize(report: StepReport) {
  const changed = report.resources.filter((r) => r.outcome === "changed").length;
  const pending = report.resources.filter((r) => r.outcome === "pending").length;
  if (pending) return pc.yellow(`${pending} pending`);
  if (changed) return pc.green(`${changed} changed`);
  return pc.dim("up to date");
}

/** Failing tool output, shown as-is. */
export function failureOutput(err: unknown): string | null {
  const cause = err instanceof Error && err.cause !== undefined ? err.cause : err;
  if (cause instanceof CommandError || cause instanceof ProxyValidationError) {
    return cause.output ? outputTail(cause.output) : null;
  }
  return null;
}

export function createClackReporter(opts: { interactive: boolean }): Reporter {
  const s = opts.interactive ? p.spinner() : null;
  let label = "";
  let notes: string[] = [];

  return {
    stepStart(index, total, title) {
      label = `[${index}/${total}] ${title}`;
      notes = [];
      if (s) s.start(label);
      else p.log.step(label);
    },
    stepDone(report) {
      const line = `${label} ${pc.green("✓")} ${summarize(report)}`;
      if (s) s.stop(line);
      else p.log.success(line);
      const touched = report.resources
        .filter((r) => r.outcome !== "unchanged")
        .map((r) => `${r.outcome === "pending" ? "~" : "+"} ${r.resource}`);
      const lines = [...touched, ...notes];
      if (lines.length) p.log.message(pc.dim(lines.join("\n")));
    },
    stepFailed(title, error) {
      const line = `${label} ${pc.red("✗")}`;
      if (s) s.stop(line, 2);
      else p.log.error(line);
      p.log.error(pc.red(`${title}: ${describeError(error)}`));
      const output = failureOutput(error);
      if (output) p.log.message(pc.dim(output));
    },
    info(message) {
      notes.push(message);
    },
  };
}
