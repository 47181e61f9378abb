import type { GenerateOptions } from "@askshell/core";
import { CommandDeclinedError } from "@askshell/errors";
import { CONTEXT_LABELS, type ContextKind } from "@askshell/executor";
import { createPlan } from "@askshell/safety";
import { formatExplanation } from "../render.js";
import type { Session } from "../session.js";
import { reportResult } from "./report.js";

export interface RunOptions {
  readonly explain: boolean;
  /** Alternatives to offer when a one-command plan is declined. */
  readonly alternatives: number;
  /** Machine context gathered and sent with the request. */
  readonly context?: ContextKind;
}

/**
 * Turn a request (plus machine context, when asked for) into a plan, explain
 * it if asked, and run it. A declined one-command plan can be followed by a
 * choice among alternatives, each classified and run as a plan of its own.
 */
export async function runRequest(session: Session, request: string, options: RunOptions): Promise<number> {
  const { config, model, policy, controller, terminal } = session;

  let generate: GenerateOptions = {};
  if (options.context !== undefined) {
    terminal.print(terminal.colors.dim(`Including context: ${CONTEXT_LABELS[options.context]}`));
    generate = { context: await session.gatherContext(options.context) };
  }

  const commands = config.multiStep
    ? await model.generatePlan(request, generate)
    : [await model.generateCommand(request, generate)];
  const plan = createPlan(request, commands, policy);
  session.logger.debug(`plan ${plan.id}: ${plan.steps.length} step(s)`);

  if (options.explain) {
    for (const step of plan.steps) {
      for (const line of formatExplanation(step.text, await model.explain(step.text), terminal.colors)) {
        terminal.print(line);
      }
    }
  }

  const result = await controller.execute(plan, config);

  const [only] = plan.steps;
  const offerAlternatives =
    options.alternatives > 0 &&
    plan.steps.length === 1 &&
    only !== undefined &&
    result.error instanceof CommandDeclinedError &&
    result.error.scope === "plan";
  if (!offerAlternatives) {
    return reportResult(result, terminal);
  }

  const alternatives = await model.alternatives(request, only.text, options.alternatives);
  if (alternatives.length === 0) {
    terminal.print("No alternatives suggested.");
    return reportResult(result, terminal);
  }
  const choice = await session.approver.pick(alternatives);
  if (choice === undefined) {
    return reportResult(result, terminal);
  }
  return reportResult(await controller.execute(createPlan(request, [choice], policy), config), terminal);
}
