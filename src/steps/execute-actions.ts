import { assessApproval } from "../core/approval-policy";
import { ExecutionSchema, type PlanStepOutcome } from "../core/schema";
import {
  adapterFailed,
  defineStep,
  infoRequest,
  missingPrecondition,
  proceed,
  say,
  suspendFor,
} from "../core/step-definition";

export default defineStep<"execute_actions">({
  name: "execute_actions",
  description: "Run the approved remediation plan",
  async run(state, ctx) {
    const plan = state.actionPlan;
    if (!plan) {
      return missingPrecondition(
        state,
        "execute_actions",
        "clarification",
        "execute_actions needs a remediation plan",
        ctx.now(),
      );
    }

    const approval = assessApproval(plan, ctx.config);
    const decision = state.approvals[plan.id];

    const decided = decision === "approved" || decision === "rejected";
    if (approval.required && !decided) {
      ctx.logger.info(
        { planId: plan.id, reasons: approval.reasons },
        "plan needs operator approval",
      );
      const request = infoRequest(
        "approval",
        `approve plan ${plan.id}: ${approval.reasons.join("; ")}`,
        "execute_actions",
        plan.id,
      );
      const text = [
        `Plan ${plan.id} needs approval before it runs (${approval.reasons.join("; ")}).`,
        ...plan.steps.map(
          (step) => `- ${step.id}: ${step.command ?? step.description}`,
        ),
        "Answer approve or reject, or modify followed by the change you want.",
      ].join("\n");
      return suspendFor(
        {
          kind: "approval",
          message: text,
          requests: [request],
          details: {
            planId: plan.id,
            riskLevel: plan.riskLevel,
            reasons: approval.reasons,
          },
        },
        {
          pendingCollection: [...(state.pendingCollection ?? []), request],
          conversation: say(text, ctx.now()),
        },
      );
    }

    if (decision === "rejected") {
      return proceed<"execute_actions">({
        executionResult: {
          planId: plan.id,
          status: "rejected_by_operator",
          perStepOutcome: plan.steps.map((step): PlanStepOutcome => ({
            stepId: step.id,
            status: "skipped",
            detail: "plan rejected by operator",
          })),
          approved: false,
        },
        conversation: say(
          `Plan ${plan.id} was rejected; nothing was executed.`,
          ctx.now(),
        ),
      });
    }

    const outcome = await ctx.pool.invoke("executor", ExecutionSchema, (signal) =>
      ctx.adapters.executor.execute(plan, { sessionId: ctx.sessionId, signal }),
    );
    if (!outcome.ok) {
      return adapterFailed(state, "execute_actions", outcome.error, ctx.now());
    }

    const execution = outcome.value;
    const succeeded = execution.perStepOutcome.filter(
      (step) => step.status === "succeeded",
    ).length;
    return proceed<"execute_actions">({
      executionResult: {
        planId: plan.id,
        status: execution.status,
        perStepOutcome: execution.perStepOutcome,
        approved: approval.required,
      },
      conversation: say(
        `Plan ${plan.id} executed with status ${execution.status} (${succeeded}/${plan.steps.length} step(s) succeeded).`,
        ctx.now(),
      ),
    });
  },
});
