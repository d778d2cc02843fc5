import { PlanSchema } from "../core/schema";
import {
  adapterFailed,
  defineStep,
  missingPrecondition,
  proceed,
  say,
} from "../core/step-definition";

export default defineStep<"plan_actions">({
  name: "plan_actions",
  description: "Draft remediation steps for the accepted diagnosis",
  async run(state, ctx) {
    const diagnosis = state.diagnosticResult;
    if (!diagnosis) {
      return missingPrecondition(
        state,
        "plan_actions",
        "symptoms",
        "plan_actions needs a diagnosis; describe the symptoms",
        ctx.now(),
      );
    }

    const outcome = await ctx.pool.invoke("planner", PlanSchema, (signal) =>
      ctx.adapters.planner.plan(
        { diagnosticResult: diagnosis, context: { ...state.context } },
        { sessionId: ctx.sessionId, signal },
      ),
    );
    if (!outcome.ok) {
      return adapterFailed(state, "plan_actions", outcome.error, ctx.now());
    }

    const plan = outcome.value;
    // Every revision gets its own id so earlier approvals never carry over.
    const revisions = Object.values(state.approvals).filter(
      (decision) => decision === "modified",
    ).length;
    const id =
      revisions > 0
        ? `plan-${diagnosis.id}-r${revisions + 1}`
        : `plan-${diagnosis.id}`;
    return proceed<"plan_actions">({
      actionPlan: {
        id,
        steps: plan.steps,
        riskLevel: plan.riskLevel,
        rollbackPlan: plan.rollbackPlan,
        etaMinutes: plan.etaMinutes,
      },
      conversation: say(
        `Plan ${id}: ${plan.steps.length} step(s), risk ${plan.riskLevel}.`,
        ctx.now(),
      ),
    });
  },
});
