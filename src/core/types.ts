import type {
  InfoRequest,
  RouteTarget,
  SessionState,
  StepName,
} from "./schema";

export type Brand<T, B extends string> = T & { readonly __brand: B };

export type SessionId = Brand<string, "SessionId">;
export type ResumeToken = Brand<string, "ResumeToken">;

export const asSessionId = (value: string): SessionId => value as SessionId;
export const asResumeToken = (value: string): ResumeToken =>
  value as ResumeToken;

export type TerminalOutcome =
  | "completed"
  | "collection-exhausted"
  | "cycle-limit-exceeded"
  | "fatal-error"
  | "cancelled";

export type SessionStatus = "running" | "waiting" | "terminal";

/** Where a change to the state record came from. */
export type MergeSource = StepName | "seed" | "resume" | "router" | "engine";

export interface RoutingDecision {
  nextStep: RouteTarget;
  rationale: string;
  confidence: number;
  /** Only set when `nextStep` is `terminal`. */
  outcome?: "completed" | "fatal-error";
  /** Requests the engine must queue before running `collect_info`. */
  requests?: InfoRequest[];
  /** Diagnosis id whose clarification the requests stand for. */
  clarifies?: string;
}

export interface SuspensionPrompt {
  kind: "information" | "approval";
  message: string;
  requests: InfoRequest[];
  details?: Record<string, unknown>;
}

export interface StepHistoryEntry {
  step: StepName;
  rationale: string;
  started_at: string;
  finished_at: string;
  result: "continue" | "suspend" | "discarded" | "fault";
}

export interface SessionRecord {
  id: SessionId;
  status: SessionStatus;
  state: SessionState;
  cycles: number;
  history: StepHistoryEntry[];
  created_at: string;
  updated_at: string;
  waiting_since?: string;
  token?: ResumeToken;
}

export type EngineResult =
  | {
      status: "waiting";
      sessionId: SessionId;
      token: ResumeToken;
      prompt: SuspensionPrompt;
    }
  | {
      status: "terminal";
      sessionId: SessionId;
      outcome: TerminalOutcome;
      state: SessionState;
    }
  | {
      status: "rejected";
      reason: string;
    };
