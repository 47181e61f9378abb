import type { Approver, CommandStep, Plan } from "@askshell/core";

export interface ApproverScript {
  /** Answer to every plan approval. Defaults to true. */
  readonly approvePlan?: boolean;
  /** Answer to step confirmations, fixed or per step. Defaults to true. */
  readonly confirmStep?: boolean | ((step: CommandStep) => boolean);
}

/**
 * Approver that answers from a script and records what it was shown.
 */
export class ScriptedApprover implements Approver {
  readonly plans: Plan[] = [];
  readonly confirmations: CommandStep[] = [];
  private readonly script: ApproverScript;

  constructor(script: ApproverScript = {}) {
    this.script = script;
  }

  async approvePlan(plan: Plan): Promise<boolean> {
    this.plans.push(plan);
    return this.script.approvePlan ?? true;
  }

  async confirmStep(step: CommandStep): Promise<boolean> {
    this.confirmations.push(step);
    const answer = this.script.confirmStep ?? true;
    return typeof answer === "function" ? answer(step) : answer;
  }
}
