import { describe, expect, it } from "vitest";
import { decide } from "../src/core/router";
import type {
  AlertInfo,
  DiagnosticResult,
  SessionState,
} from "../src/core/schema";
import { createInitialState, snapshot } from "../src/core/state-record";
import { FIXED_NOW, lowRiskPlan } from "./fixtures/adapters";

const policy = { diagnosisConfidenceThreshold: 0.6, maxStepAttempts: 3 };

const alert: AlertInfo = {
  id: "cpu_1",
  timestamp: FIXED_NOW,
  severity: "high",
  source: "seed",
  message: "",
  metrics: {},
  tags: [],
};

const diagnosis = (
  confidenceScore: number,
  evidenceRevision = 0,
): DiagnosticResult => ({
  id: `dx-${evidenceRevision}`,
  rootCause: "runaway worker process",
  confidenceScore,
  affectedComponents: ["web-1"],
  evidence: [],
  evidenceRevision,
});

const stateWith = (fields: Partial<SessionState>): SessionState => ({
  ...createInitialState(),
  ...fields,
});

const analysis = {
  alertId: "cpu_1",
  category: "resource-saturation",
  severityScore: 0.8,
  correlationHints: [],
};

const plan = { id: "plan-dx-0", ...lowRiskPlan };

describe("decide", () => {
  it("falls back to collect_info on an empty state", () => {
    expect(decide(createInitialState(), policy)).toEqual({
      nextStep: "collect_info",
      rationale: "not enough information to choose a step",
      confidence: 0.5,
    });
  });

  it("sends an unanalysed alert to process_alert before anything later", () => {
    const state = stateWith({
      alertInfo: alert,
      symptoms: ["cpu high"],
      diagnosticResult: diagnosis(0.9),
      actionPlan: plan,
    });

    expect(decide(state, policy)).toEqual({
      nextStep: "process_alert",
      rationale: "alert cpu_1 not yet analysed",
      confidence: 1,
    });
  });

  it("serves pending requests first", () => {
    const state = stateWith({
      alertInfo: alert,
      pendingCollection: [
        {
          id: "req-1",
          field: "symptoms",
          reason: "what do you see?",
          requestedBy: "diagnose_issue",
        },
      ],
    });

    expect(decide(state, policy).nextStep).toBe("collect_info");
  });

  it("diagnoses symptoms that have no diagnosis yet", () => {
    const decision = decide(stateWith({ symptoms: ["a", "b"] }), policy);
    expect(decision.nextStep).toBe("diagnose_issue");
    expect(decision.rationale).toBe("2 symptom(s) without a diagnosis");
  });

  it("asks for clarification on a low-confidence diagnosis instead of planning", () => {
    const state = stateWith({
      symptoms: ["cpu high"],
      diagnosticResult: diagnosis(0.3),
    });

    const decision = decide(state, policy);
    expect(decision.nextStep).toBe("collect_info");
    expect(decision.clarifies).toBe("dx-0");
    expect(decision.requests).toEqual([
      {
        id: "clarify-dx-0",
        field: "clarification",
        reason: "diagnosis dx-0 confidence 0.30 is below 0.60",
        requestedBy: "router",
        subject: "dx-0",
      },
    ]);
  });

  it("plans directly from a confident diagnosis", () => {
    const state = stateWith({
      symptoms: ["cpu high"],
      diagnosticResult: diagnosis(0.9),
    });

    expect(decide(state, policy)).toEqual({
      nextStep: "plan_actions",
      rationale: "diagnosis dx-0 accepted at 0.90",
      confidence: 1,
    });
  });

  it("diagnoses again once a clarified diagnosis has new evidence", () => {
    const state = stateWith({
      symptoms: ["cpu high"],
      diagnosticResult: diagnosis(0.3),
      clarifiedDiagnoses: ["dx-0"],
      evidenceRevision: 1,
    });

    expect(decide(state, policy).nextStep).toBe("diagnose_issue");
  });

  it("does not ask twice about the same diagnosis", () => {
    const state = stateWith({
      symptoms: ["cpu high"],
      diagnosticResult: diagnosis(0.3),
      clarifiedDiagnoses: ["dx-0"],
    });

    expect(decide(state, policy)).toEqual({
      nextStep: "collect_info",
      rationale: "not enough information to choose a step",
      confidence: 0.5,
    });
  });

  it("walks plan, execution and report to terminal", () => {
    const planned = stateWith({
      diagnosticResult: diagnosis(0.9),
      actionPlan: plan,
    });
    expect(decide(planned, policy).nextStep).toBe("execute_actions");

    const executed = stateWith({
      ...planned,
      executionResult: {
        planId: "plan-dx-0",
        status: "partial",
        perStepOutcome: [],
        approved: false,
      },
    });
    expect(decide(executed, policy)).toEqual({
      nextStep: "generate_report",
      rationale: "execution finished with status partial",
      confidence: 1,
    });

    const reported = stateWith({
      ...executed,
      report: {
        summary: "done",
        sections: [],
        degraded: false,
        generatedAt: FIXED_NOW,
      },
    });
    expect(decide(reported, policy)).toEqual({
      nextStep: "terminal",
      rationale: "report generated",
      confidence: 1,
      outcome: "completed",
    });
  });

  it("re-plans when the operator asked for changes to the current plan", () => {
    const state = stateWith({
      diagnosticResult: diagnosis(0.9),
      actionPlan: plan,
      approvals: { "plan-dx-0": "modified" },
    });

    expect(decide(state, policy)).toEqual({
      nextStep: "plan_actions",
      rationale: "operator asked for changes to plan plan-dx-0",
      confidence: 1,
    });
  });

  it("routes around a step that used up its attempts", () => {
    const state = stateWith({
      diagnosticResult: diagnosis(0.9),
      attempts: { plan_actions: 3 },
    });

    expect(decide(state, policy)).toEqual({
      nextStep: "generate_report",
      rationale: "plan_actions failed 3 time(s); producing a degraded report",
      confidence: 1,
    });
  });

  it("ends with a fatal error when the report step is exhausted too", () => {
    const state = stateWith({
      alertInfo: alert,
      analysisResult: analysis,
      diagnosticResult: diagnosis(0.9),
      attempts: { plan_actions: 3, generate_report: 3 },
    });

    expect(decide(state, policy)).toEqual({
      nextStep: "terminal",
      rationale: "generate_report failed 3 time(s); no report available",
      confidence: 1,
      outcome: "fatal-error",
    });
  });

  it("keeps an existing degraded report when the step it skipped is exhausted", () => {
    const state = stateWith({
      diagnosticResult: diagnosis(0.9),
      attempts: { plan_actions: 3 },
      report: {
        summary: "partial",
        sections: [],
        degraded: true,
        generatedAt: FIXED_NOW,
      },
    });

    const decision = decide(state, policy);
    expect(decision.nextStep).toBe("terminal");
    expect(decision.outcome).toBe("completed");
  });

  it("is pure: same state, same decision, state untouched", () => {
    const state = snapshot(
      stateWith({ symptoms: ["cpu high"], diagnosticResult: diagnosis(0.3) }),
    );
    const before = structuredClone(state);

    expect(decide(state, policy)).toEqual(decide(state, policy));
    expect(state).toEqual(before);
  });
});
