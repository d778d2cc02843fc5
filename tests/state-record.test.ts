import { describe, expect, it } from "vitest";
import {
  createInitialState,
  mergeUpdate,
  message,
  snapshot,
} from "../src/core/state-record";
import { FIXED_NOW } from "./fixtures/adapters";

const diagnosis = {
  id: "dx-0",
  rootCause: "runaway worker process",
  confidenceScore: 0.9,
  affectedComponents: ["web-1"],
  evidence: [],
  evidenceRevision: 0,
};

describe("mergeUpdate", () => {
  it("appends conversation and errors", () => {
    let state = createInitialState();
    state = mergeUpdate(
      state,
      { conversation: [message("operator", "cpu is high", FIXED_NOW)] },
      "seed",
      FIXED_NOW,
    ).state;
    state = mergeUpdate(
      state,
      { conversation: [message("assistant", "looking", FIXED_NOW)] },
      "process_alert",
      FIXED_NOW,
    ).state;

    expect(state.conversation.map((entry) => entry.text)).toEqual([
      "cpu is high",
      "looking",
    ]);
  });

  it("unions symptoms and merges context by key", () => {
    let state = createInitialState();
    state = mergeUpdate(
      state,
      { symptoms: ["a", "b"], context: { region: "eu-west-1", tier: "web" } },
      "seed",
      FIXED_NOW,
    ).state;
    state = mergeUpdate(
      state,
      { symptoms: ["b", "c"], context: { tier: "api" } },
      "resume",
      FIXED_NOW,
    ).state;

    expect(state.symptoms).toEqual(["a", "b", "c"]);
    expect(state.context).toEqual({ region: "eu-west-1", tier: "api" });
  });

  it("clears pendingCollection with an empty list", () => {
    const request = {
      id: "req-1",
      field: "symptoms" as const,
      reason: "what do you see?",
      requestedBy: "collect_info",
    };
    let state = mergeUpdate(
      createInitialState(),
      { pendingCollection: [request] },
      "collect_info",
      FIXED_NOW,
    ).state;
    expect(state.pendingCollection).toEqual([request]);

    state = mergeUpdate(state, { pendingCollection: [] }, "resume", FIXED_NOW)
      .state;
    expect(state.pendingCollection).toBeUndefined();
  });

  it("rejects a step writing a field another step owns", () => {
    const result = mergeUpdate(
      createInitialState(),
      { diagnosticResult: diagnosis },
      "plan_actions",
      FIXED_NOW,
    );

    expect(result.rejected).toEqual(["diagnosticResult"]);
    expect(result.state.diagnosticResult).toBeUndefined();
    expect(result.state.errors).toEqual([
      {
        kind: "OwnershipViolation",
        source: "plan_actions",
        message:
          "plan_actions may not write diagnosticResult (owned by diagnose_issue)",
        timestamp: FIXED_NOW,
      },
    ]);
  });

  it("lets the owner and a seed write owned fields", () => {
    const fromOwner = mergeUpdate(
      createInitialState(),
      { diagnosticResult: diagnosis },
      "diagnose_issue",
      FIXED_NOW,
    );
    const fromSeed = mergeUpdate(
      createInitialState(),
      { diagnosticResult: diagnosis },
      "seed",
      FIXED_NOW,
    );

    expect(fromOwner.state.diagnosticResult).toEqual(diagnosis);
    expect(fromSeed.state.diagnosticResult).toEqual(diagnosis);
    expect(fromSeed.rejected).toEqual([]);
  });

  it("keeps engine bookkeeping away from steps", () => {
    const result = mergeUpdate(
      createInitialState(),
      {
        routingTrace: {
          nextStep: "terminal",
          rationale: "done",
          confidence: 1,
        },
        collectionAttempts: 0,
      },
      "diagnose_issue",
      FIXED_NOW,
    );

    expect(result.rejected).toEqual(["routingTrace", "collectionAttempts"]);
    expect(result.state.errors.map((error) => error.message)).toEqual([
      "diagnose_issue may not write routingTrace",
      "diagnose_issue may not write collectionAttempts",
    ]);
  });

  it("rejects unknown fields and values that fail their schema", () => {
    const result = mergeUpdate(
      createInitialState(),
      { bogus: true, symptoms: [""], context: { ok: 1 } },
      "seed",
      FIXED_NOW,
    );

    expect(result.rejected).toEqual(["bogus", "symptoms"]);
    expect(result.state.context).toEqual({ ok: 1 });
    expect(result.state.symptoms).toBeUndefined();
    expect(result.state.errors[0]?.message).toBe("unknown field: bogus");
    expect(result.state.errors[1]?.kind).toBe("InvalidInput");
    expect(result.state.errors[1]?.message.startsWith("invalid symptoms:")).toBe(
      true,
    );
  });

  it("leaves the input state untouched", () => {
    const state = createInitialState();
    mergeUpdate(state, { symptoms: ["a"] }, "seed", FIXED_NOW);
    expect(state.symptoms).toBeUndefined();
  });
});

describe("snapshot", () => {
  it("returns a frozen, detached copy", () => {
    const state = mergeUpdate(
      createInitialState(),
      { symptoms: ["a"] },
      "seed",
      FIXED_NOW,
    ).state;
    const frozen = snapshot(state);

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(Object.isFrozen(frozen.symptoms)).toBe(true);
    expect(() => frozen.symptoms?.push("b")).toThrow(TypeError);
    expect(state.symptoms).toEqual(["a"]);
  });
});
