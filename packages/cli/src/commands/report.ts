import { EXIT_CODES } from "@askshell/errors";
import type { SequenceResult } from "@askshell/executor";
import type { Terminal } from "../terminal.js";

/** Tell the user how a plan ended and pick the process exit code. */
export function reportResult(result: SequenceResult, terminal: Terminal): number {
  const pc = terminal.colors;

  if (result.state === "completed") {
    if (result.completedSteps.length > 1) {
      terminal.print(pc.green(`✓ ${result.completedSteps.length} commands completed`));
    }
    return EXIT_CODES.OK;
  }

  switch (result.abortReason) {
    case "declined":
      terminal.printError(pc.yellow(result.error?.message ?? "Declined"));
      return EXIT_CODES.DECLINED;
    case "step-failed": {
      const exitCode = result.failure?.exitCode ?? EXIT_CODES.FAILURE;
      terminal.printError(
        pc.red(`✗ Command failed with exit code ${exitCode}: ${result.failedStep?.text ?? ""}`),
      );
      terminal.printError("Remaining commands were not run.");
      return EXIT_CODES.FAILURE;
    }
    case "correction-exhausted":
    case undefined:
      terminal.printError(pc.red(`✗ ${result.error?.message ?? "Aborted"}`));
      terminal.printError("Remaining commands were not run.");
      return EXIT_CODES.FAILURE;
  }
}
