import { ReportDraftSchema } from "../core/schema";
import {
  adapterFailed,
  defineStep,
  proceed,
  say,
} from "../core/step-definition";

export default defineStep<"generate_report">({
  name: "generate_report",
  description: "Summarise the incident from everything gathered so far",
  async run(state, ctx) {
    const outcome = await ctx.pool.invoke("reporter", ReportDraftSchema, (signal) =>
      ctx.adapters.reporter.generate(state, { sessionId: ctx.sessionId, signal }),
    );
    if (!outcome.ok) {
      return adapterFailed(state, "generate_report", outcome.error, ctx.now());
    }

    // A report written without an execution, or after any failure, is partial.
    const degraded = !state.executionResult || state.errors.length > 0;
    return proceed<"generate_report">({
      report: {
        summary: outcome.value.summary,
        sections: outcome.value.sections,
        degraded,
        generatedAt: ctx.now(),
      },
      conversation: say(
        degraded
          ? `Report generated (degraded): ${outcome.value.summary}`
          : `Report generated: ${outcome.value.summary}`,
        ctx.now(),
      ),
    });
  },
});
