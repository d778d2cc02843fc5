import { DiagnosisSchema } from "../core/schema";
import {
  adapterFailed,
  defineStep,
  missingPrecondition,
  proceed,
  say,
} from "../core/step-definition";

export default defineStep<"diagnose_issue">({
  name: "diagnose_issue",
  description: "Find the likely root cause from symptoms and context",
  async run(state, ctx) {
    const symptoms = state.symptoms ?? [];
    if (symptoms.length === 0 && !state.alertInfo) {
      return missingPrecondition(
        state,
        "diagnose_issue",
        "symptoms",
        "diagnose_issue needs symptoms or an alert",
        ctx.now(),
      );
    }

    const outcome = await ctx.pool.invoke("diagnostics", DiagnosisSchema, (signal) =>
      ctx.adapters.diagnostics.diagnose(
        {
          symptoms: [...symptoms],
          context: { ...state.context },
          ...(state.alertInfo ? { alertInfo: state.alertInfo } : {}),
        },
        { sessionId: ctx.sessionId, signal },
      ),
    );
    if (!outcome.ok) {
      return adapterFailed(state, "diagnose_issue", outcome.error, ctx.now());
    }

    const diagnosis = outcome.value;
    const id = `dx-${state.evidenceRevision}`;
    return proceed<"diagnose_issue">({
      diagnosticResult: {
        id,
        rootCause: diagnosis.rootCause,
        confidenceScore: diagnosis.confidenceScore,
        affectedComponents: diagnosis.affectedComponents,
        evidence: diagnosis.evidence,
        evidenceRevision: state.evidenceRevision,
      },
      conversation: say(
        `Diagnosis ${id}: ${diagnosis.rootCause} (confidence ${diagnosis.confidenceScore.toFixed(2)}).`,
        ctx.now(),
      ),
    });
  },
});
