import { AlertClassificationSchema } from "../core/schema";
import {
  adapterFailed,
  defineStep,
  missingPrecondition,
  proceed,
  say,
} from "../core/step-definition";

export default defineStep<"process_alert">({
  name: "process_alert",
  description: "Classify the alert and turn it into symptoms",
  async run(state, ctx) {
    const alert = state.alertInfo;
    if (!alert) {
      return missingPrecondition(
        state,
        "process_alert",
        "alertInfo",
        "process_alert needs an alert to classify",
        ctx.now(),
      );
    }

    const outcome = await ctx.pool.invoke(
      "classifier",
      AlertClassificationSchema,
      (signal) =>
        ctx.adapters.classifier.classify(alert, {
          sessionId: ctx.sessionId,
          signal,
        }),
    );
    if (!outcome.ok) {
      return adapterFailed(state, "process_alert", outcome.error, ctx.now());
    }

    const classification = outcome.value;
    const headline =
      alert.message.trim().length > 0
        ? alert.message
        : `${alert.severity} alert ${alert.id}`;

    return proceed<"process_alert">({
      analysisResult: {
        alertId: alert.id,
        category: classification.category,
        severityScore: classification.severityScore,
        correlationHints: classification.correlationHints,
      },
      symptoms: [headline, ...classification.correlationHints].filter(
        (symptom) => symptom.length > 0,
      ),
      conversation: say(
        `Alert ${alert.id} classified as ${classification.category} (severity ${classification.severityScore.toFixed(2)}).`,
        ctx.now(),
      ),
    });
  },
});
