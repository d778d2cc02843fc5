import { describe, expect, it } from "vitest";
import { AdapterPool } from "../src/adapters/adapter-pool";
import type { TextExtractor } from "../src/adapters/types";
import type { IngestDeps } from "../src/core/ingest";
import type { InfoRequest, SessionState } from "../src/core/schema";
import { createInitialState } from "../src/core/state-record";
import { SuspensionController } from "../src/core/suspension";
import { asSessionId } from "../src/core/types";
import { FIXED_NOW, silentLogger } from "./fixtures/adapters";

const sessionId = asSessionId("inc-test0001");

const depsWith = (extractor?: TextExtractor): IngestDeps => ({
  sessionId,
  pool: new AdapterPool({ concurrency: 2, timeoutMs: 1_000, logger: silentLogger }),
  extractor,
  extractionConfidenceThreshold: 0.5,
  logger: silentLogger,
  now: () => FIXED_NOW,
});

const request: InfoRequest = {
  id: "req-1",
  field: "symptoms",
  reason: "what do you see?",
  requestedBy: "collect_info",
};

const waitingState = (requests: InfoRequest[]): SessionState => ({
  ...createInitialState(),
  pendingCollection: requests,
});

describe("SuspensionController", () => {
  it("issues single-use tokens", () => {
    const controller = new SuspensionController(5);
    const checkpoint = controller.suspend(
      sessionId,
      waitingState([request]),
      { kind: "information", message: "?", requests: [request] },
      FIXED_NOW,
    );

    expect(controller.take(checkpoint.token)).toBe(checkpoint);
    expect(controller.take(checkpoint.token)).toBeUndefined();
  });

  it("keeps only the latest checkpoint per session", () => {
    const controller = new SuspensionController(5);
    const prompt = { kind: "information" as const, message: "?", requests: [] };
    const first = controller.suspend(sessionId, createInitialState(), prompt, FIXED_NOW);
    const second = controller.suspend(sessionId, createInitialState(), prompt, FIXED_NOW);

    expect(controller.take(first.token)).toBeUndefined();
    expect(controller.take(second.token)).toBe(second);
  });

  it("stops allowing suspension at the cap", () => {
    const controller = new SuspensionController(5);
    expect(controller.canSuspend({ ...createInitialState(), collectionAttempts: 4 })).toBe(true);
    expect(controller.canSuspend({ ...createInitialState(), collectionAttempts: 5 })).toBe(false);
  });

  it("appends the answer once and clears the answered request", async () => {
    const controller = new SuspensionController(5);
    const other: InfoRequest = { ...request, id: "req-2" };
    const checkpoint = controller.suspend(
      sessionId,
      waitingState([request, other]),
      { kind: "information", message: "?", requests: [request] },
      FIXED_NOW,
    );

    const state = await controller.resolve(checkpoint, "the db is slow", depsWith());

    expect(
      state.conversation.filter((entry) => entry.text === "the db is slow"),
    ).toEqual([{ role: "operator", text: "the db is slow", timestamp: FIXED_NOW }]);
    expect(state.pendingCollection).toEqual([other]);
    expect(state.collectionAttempts).toBe(1);
    expect(state.evidenceRevision).toBe(0);
  });

  it("bumps the evidence revision when facts arrive", async () => {
    const controller = new SuspensionController(5);
    const checkpoint = controller.suspend(
      sessionId,
      waitingState([request]),
      { kind: "information", message: "?", requests: [request] },
      FIXED_NOW,
    );

    const state = await controller.resolve(
      checkpoint,
      { symptoms: ["db connections at max"] },
      depsWith(),
    );

    expect(state.symptoms).toEqual(["db connections at max"]);
    expect(state.evidenceRevision).toBe(1);
    expect(state.pendingCollection).toBeUndefined();
  });

  it("uses the extractor only above its confidence threshold", async () => {
    const extractorAt = (confidence: number): TextExtractor => ({
      async extract() {
        return { symptoms: ["cpu high on web-1"], confidence };
      },
    });
    const prompt = { kind: "information" as const, message: "?", requests: [request] };

    const confident = new SuspensionController(5);
    const high = await confident.resolve(
      confident.suspend(sessionId, waitingState([request]), prompt, FIXED_NOW),
      "CPU high on web-1",
      depsWith(extractorAt(0.9)),
    );
    expect(high.symptoms).toEqual(["cpu high on web-1"]);
    expect(high.evidenceRevision).toBe(1);

    const unsure = new SuspensionController(5);
    const low = await unsure.resolve(
      unsure.suspend(sessionId, waitingState([request]), prompt, FIXED_NOW),
      "CPU high on web-1",
      depsWith(extractorAt(0.2)),
    );
    expect(low.symptoms).toBeUndefined();
    expect(low.evidenceRevision).toBe(0);
  });

  it("records approval decisions for the plan in question", async () => {
    const controller = new SuspensionController(5);
    const approval: InfoRequest = {
      id: "req-9",
      field: "approval",
      reason: "approve plan plan-dx-0",
      requestedBy: "execute_actions",
      subject: "plan-dx-0",
    };
    const checkpoint = controller.suspend(
      sessionId,
      waitingState([approval]),
      { kind: "approval", message: "approve?", requests: [approval] },
      FIXED_NOW,
    );

    const state = await controller.resolve(checkpoint, "Approve.", depsWith());
    expect(state.approvals).toEqual({ "plan-dx-0": "approved" });
    expect(state.pendingCollection).toBeUndefined();
  });

  it("turns an unusable answer into a clarification request", async () => {
    const controller = new SuspensionController(5);
    const checkpoint = controller.suspend(
      sessionId,
      waitingState([request]),
      { kind: "information", message: "?", requests: [request] },
      FIXED_NOW,
    );

    const state = await controller.resolve(checkpoint, "", depsWith());
    expect(state.errors).toEqual([
      {
        kind: "InvalidInput",
        source: "resume",
        message: "empty response",
        timestamp: FIXED_NOW,
      },
    ]);
    expect(state.pendingCollection).toHaveLength(1);
    expect(state.pendingCollection?.[0]?.reason).toBe(
      "could not use the input: empty response",
    );
    expect(state.collectionAttempts).toBe(1);
  });
});
