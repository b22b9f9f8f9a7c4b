export class ProvisionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends ProvisionError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `• ${i}`).join("\n")}`);
    this.issues = issues;
  }
}

export class TemplateError extends ProvisionError {}

export class CommandError extends ProvisionError {
  readonly commandLine: string;
  readonly exitCode: number;
  readonly output: string;

  constructor(commandLine: string, exitCode: number, output: string) {
    super(`\`${commandLine}\` exited with code ${exitCode}`);
    this.commandLine = commandLine;
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class ProxyValidationError extends ProvisionError {
  readonly output: string;

  constructor(output: string) {
    super("nginx rejected the generated site configuration; previous files restored");
    this.output = output;
  }
}

export class StepError extends ProvisionError {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    super(`Step "${step}" failed: ${describeError(cause)}`, { cause });
    this.step = step;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Last lines of a command's output, for the failure summary. */
export function outputTail(output: string, lines = 15): string {
  const all = output.trimEnd().split("\n");
  return all.slice(-lines).join("\n");
}
