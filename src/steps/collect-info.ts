import {
  defineStep,
  infoRequest,
  say,
  suspendFor,
} from "../core/step-definition";

export default defineStep<"collect_info">({
  name: "collect_info",
  description: "Ask the operator for whatever the session is missing",
  async run(state, ctx) {
    const pending = state.pendingCollection ?? [];
    const requests =
      pending.length > 0
        ? [...pending]
        : [
            infoRequest(
              "clarification",
              "describe the incident: an alert, the symptoms you see, or relevant context",
              "collect_info",
            ),
          ];

    const text = [
      "More information is needed to continue:",
      ...requests.map((request) => `- ${request.reason}`),
    ].join("\n");

    return suspendFor(
      {
        kind: requests.some((request) => request.field === "approval")
          ? "approval"
          : "information",
        message: text,
        requests,
      },
      { pendingCollection: requests, conversation: say(text, ctx.now()) },
    );
  },
});
