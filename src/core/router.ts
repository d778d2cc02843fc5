import type { InfoRequest, SessionState, StepName } from "./schema";
import type { RoutingDecision } from "./types";

export interface RoutingPolicy {
  diagnosisConfidenceThreshold: number;
  maxStepAttempts: number;
}

type Rule = (
  state: Readonly<SessionState>,
  policy: RoutingPolicy,
) => RoutingDecision | undefined;

const route = (
  nextStep: StepName,
  rationale: string,
  confidence = 1,
): RoutingDecision => ({ nextStep, rationale, confidence });

const formatScore = (value: number): string => value.toFixed(2);

const isLowConfidence = (
  state: Readonly<SessionState>,
  policy: RoutingPolicy,
): boolean =>
  state.diagnosticResult !== undefined &&
  state.diagnosticResult.confidenceScore < policy.diagnosisConfidenceThreshold;

// Order is the priority: the first rule that answers wins.
const RULES: readonly Rule[] = [
  (state) =>
    state.pendingCollection && state.pendingCollection.length > 0
      ? route(
          "collect_info",
          `${state.pendingCollection.length} information request(s) pending`,
        )
      : undefined,

  (state) =>
    state.alertInfo && !state.analysisResult
      ? route("process_alert", `alert ${state.alertInfo.id} not yet analysed`)
      : undefined,

  (state) =>
    state.symptoms && state.symptoms.length > 0 && !state.diagnosticResult
      ? route(
          "diagnose_issue",
          `${state.symptoms.length} symptom(s) without a diagnosis`,
        )
      : undefined,

  (state, policy) => {
    const diagnosis = state.diagnosticResult;
    if (
      !diagnosis ||
      !isLowConfidence(state, policy) ||
      state.clarifiedDiagnoses.includes(diagnosis.id)
    ) {
      return undefined;
    }

    const reason = `diagnosis ${diagnosis.id} confidence ${formatScore(diagnosis.confidenceScore)} is below ${formatScore(policy.diagnosisConfidenceThreshold)}`;
    const request: InfoRequest = {
      id: `clarify-${diagnosis.id}`,
      field: "clarification",
      reason,
      requestedBy: "router",
      subject: diagnosis.id,
    };
    return {
      ...route("collect_info", `${reason}; asking for more information`),
      requests: [request],
      clarifies: diagnosis.id,
    };
  },

  (state, policy) => {
    const diagnosis = state.diagnosticResult;
    return diagnosis &&
      isLowConfidence(state, policy) &&
      diagnosis.evidenceRevision < state.evidenceRevision
      ? route(
          "diagnose_issue",
          `new information since diagnosis ${diagnosis.id}; diagnosing again`,
        )
      : undefined;
  },

  (state, policy) =>
    state.diagnosticResult &&
    !isLowConfidence(state, policy) &&
    !state.actionPlan
      ? route(
          "plan_actions",
          `diagnosis ${state.diagnosticResult.id} accepted at ${formatScore(state.diagnosticResult.confidenceScore)}`,
        )
      : undefined,

  (state) =>
    state.actionPlan &&
    !state.executionResult &&
    state.approvals[state.actionPlan.id] === "modified"
      ? route(
          "plan_actions",
          `operator asked for changes to plan ${state.actionPlan.id}`,
        )
      : undefined,

  (state) =>
    state.actionPlan && !state.executionResult
      ? route("execute_actions", `plan ${state.actionPlan.id} not yet executed`)
      : undefined,

  (state) =>
    state.executionResult && !state.report
      ? route(
          "generate_report",
          `execution finished with status ${state.executionResult.status}`,
        )
      : undefined,

  (state) =>
    state.report
      ? {
          nextStep: "terminal",
          rationale: "report generated",
          confidence: 1,
          outcome: "completed",
        }
      : undefined,
];

const WORK_STEPS: ReadonlySet<StepName> = new Set([
  "process_alert",
  "diagnose_issue",
  "plan_actions",
  "execute_actions",
  "generate_report",
]);

/**
 * A step that has used up its attempts is routed around: work steps fall
 * through to a degraded report, the report step itself ends the session.
 */
const routeAroundExhausted = (
  decision: RoutingDecision,
  state: Readonly<SessionState>,
  policy: RoutingPolicy,
): RoutingDecision => {
  const step = decision.nextStep;
  if (step === "terminal" || !WORK_STEPS.has(step)) {
    return decision;
  }

  const attempts = state.attempts[step] ?? 0;
  if (attempts < policy.maxStepAttempts) {
    return decision;
  }

  if (step === "generate_report") {
    return {
      nextStep: "terminal",
      rationale: `generate_report failed ${attempts} time(s); no report available`,
      confidence: 1,
      outcome: "fatal-error",
    };
  }

  if (state.report) {
    return {
      nextStep: "terminal",
      rationale: `${step} failed ${attempts} time(s); keeping the degraded report`,
      confidence: 1,
      outcome: "completed",
    };
  }

  return routeAroundExhausted(
    route(
      "generate_report",
      `${step} failed ${attempts} time(s); producing a degraded report`,
    ),
    state,
    policy,
  );
};

/**
 * Picks the next step from the state alone. Same state in, same decision
 * out: no clock, no randomness, no hidden context.
 */
export const decide = (
  state: Readonly<SessionState>,
  policy: RoutingPolicy,
): RoutingDecision => {
  for (const rule of RULES) {
    const decision = rule(state, policy);
    if (decision) {
      return routeAroundExhausted(decision, state, policy);
    }
  }

  return route(
    "collect_info",
    "not enough information to choose a step",
    0.5,
  );
};
