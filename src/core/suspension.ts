import { nanoid } from "nanoid";
import { parseApprovalDecision } from "./approval-policy";
import { type IngestDeps, ingestInput } from "./ingest";
import { parseResumeInput } from "./input";
import type { ApprovalDecision, SessionState } from "./schema";
import { mergeUpdate } from "./state-record";
import {
  type ResumeToken,
  type SessionId,
  type SuspensionPrompt,
  asResumeToken,
} from "./types";

export interface Checkpoint {
  sessionId: SessionId;
  token: ResumeToken;
  state: SessionState;
  prompt: SuspensionPrompt;
  created_at: string;
}

/**
 * Holds the checkpoints of suspended sessions. Suspending never blocks: the
 * controller records where the session stopped and hands back a single-use
 * token the caller later resumes with.
 */
export class SuspensionController {
  private readonly checkpoints = new Map<ResumeToken, Checkpoint>();
  private readonly bySession = new Map<SessionId, ResumeToken>();

  constructor(private readonly maxCollectionAttempts: number) {}

  /** False once the session has spent its suspend/resume budget. */
  canSuspend(state: Readonly<SessionState>): boolean {
    return state.collectionAttempts < this.maxCollectionAttempts;
  }

  suspend(
    sessionId: SessionId,
    state: SessionState,
    prompt: SuspensionPrompt,
    now: string,
  ): Checkpoint {
    this.discard(sessionId);
    const checkpoint: Checkpoint = {
      sessionId,
      token: asResumeToken(nanoid()),
      state,
      prompt,
      created_at: now,
    };
    this.checkpoints.set(checkpoint.token, checkpoint);
    this.bySession.set(sessionId, checkpoint.token);
    return checkpoint;
  }

  /** Removes and returns the checkpoint; a token can be taken only once. */
  take(token: string): Checkpoint | undefined {
    const key = asResumeToken(token);
    const checkpoint = this.checkpoints.get(key);
    if (!checkpoint) {
      return undefined;
    }
    this.checkpoints.delete(key);
    this.bySession.delete(checkpoint.sessionId);
    return checkpoint;
  }

  discard(sessionId: SessionId): void {
    const token = this.bySession.get(sessionId);
    if (token) {
      this.checkpoints.delete(token);
      this.bySession.delete(sessionId);
    }
  }

  /**
   * Turns the operator's answer into the state the session continues from:
   * input folded in, the prompt's requests cleared, approvals recorded and
   * the attempt counter advanced.
   */
  async resolve(
    checkpoint: Checkpoint,
    rawInput: unknown,
    deps: IngestDeps,
  ): Promise<SessionState> {
    const parsed = parseResumeInput(rawInput, deps.now());
    const { state, newFacts } = await ingestInput(
      checkpoint.state,
      parsed,
      "resume",
      deps,
    );

    const answered = new Set(checkpoint.prompt.requests.map((r) => r.id));
    const approvals: Record<string, ApprovalDecision> = {};
    const decision =
      parseApprovalDecision(parsed.decision) ??
      parseApprovalDecision(parsed.text);
    for (const request of checkpoint.prompt.requests) {
      if (request.field === "approval" && request.subject && decision) {
        approvals[request.subject] = decision;
      }
    }

    // The planner sees the requested change through the context.
    const feedback = parsed.text ?? parsed.decision;
    const revision =
      decision === "modified" && Object.keys(approvals).length > 0 && feedback
        ? { context: { planFeedback: feedback } }
        : {};

    return mergeUpdate(
      state,
      {
        ...revision,
        pendingCollection: (state.pendingCollection ?? []).filter(
          (request) => !answered.has(request.id),
        ),
        collectionAttempts: state.collectionAttempts + 1,
        evidenceRevision: newFacts
          ? state.evidenceRevision + 1
          : state.evidenceRevision,
        approvals,
      },
      "resume",
      deps.now(),
    ).state;
  }
}
