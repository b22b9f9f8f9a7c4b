import { describe, expect, it } from "vitest";
import { CommandError, ProxyValidationError, StepError } from "./errors";
import { failureOutput } from "./reporter";

describe("failureOutput", () => {
  it("unwraps the failing command from a step error", () => {
    const err = new StepError("Updating the system", new CommandError("apt-get update -y", 100, "E: Could not get lock"));
    expect(failureOutput(err)).toBe("E: Could not get lock");
  });

  it("shows only the tail of long output", () => {
    const output = Array.from({ length: 20 }, (_, i) => `line ${i + 1}`).join("\n");
    expect(failureOutput(new ProxyValidationError(output))).toBe(
      Array.from({ length: 15 }, (_, i) => `line ${i + 6}`).join("\n")
    );
  });

  it("has nothing to add for other errors", () => {
    expect(failureOutput(new Error("boom"))).toBeNull();
  });
});
