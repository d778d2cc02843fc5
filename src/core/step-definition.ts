import { nanoid } from "nanoid";
import type { AdapterError, AdapterPool } from "../adapters/adapter-pool";
import type { ReasoningAdapters } from "../adapters/types";
import type { EngineConfig } from "../config/engine-config";
import type { Logger } from "../observability/logger";
import type {
  InfoField,
  InfoRequest,
  SessionState,
  StepName,
} from "./schema";
import {
  type SharedUpdate,
  type StepUpdate,
  errorEntry,
  message,
} from "./state-record";
import type { SessionId, SuspensionPrompt } from "./types";

export interface StepContext {
  sessionId: SessionId;
  adapters: ReasoningAdapters;
  pool: AdapterPool;
  config: EngineConfig;
  logger: Logger;
  now: () => string;
}

export type StepOutcome<S extends StepName = StepName> =
  | { kind: "continue"; update: StepUpdate<S> }
  | { kind: "suspend"; prompt: SuspensionPrompt; update: StepUpdate<S> };

/** An outcome that writes no owned field, so any step may return it. */
export type SharedOutcome = StepOutcome<never>;

export interface StepDefinition<S extends StepName = StepName> {
  name: S;
  description: string;
  run(state: Readonly<SessionState>, ctx: StepContext): Promise<StepOutcome<S>>;
}

export type StepRegistry = { [S in StepName]: StepDefinition<S> };

export const defineStep = <S extends StepName>(
  step: StepDefinition<S>,
): StepDefinition<S> => step;

export const proceed = <S extends StepName>(
  update: StepUpdate<S>,
): StepOutcome<S> => ({ kind: "continue", update });

export const shared = (update: SharedUpdate): SharedOutcome => ({
  kind: "continue",
  update,
});

export const suspendFor = (
  prompt: SuspensionPrompt,
  update: SharedUpdate,
): SharedOutcome => ({ kind: "suspend", prompt, update });

export const infoRequest = (
  field: InfoField,
  reason: string,
  requestedBy: StepName,
  subject?: string,
): InfoRequest => ({
  id: `req-${nanoid(10)}`,
  field,
  reason,
  requestedBy,
  ...(subject !== undefined ? { subject } : {}),
});

/**
 * A step that cannot start asks for what it is missing instead of failing.
 */
export const missingPrecondition = (
  state: Readonly<SessionState>,
  step: StepName,
  field: InfoField,
  reason: string,
  now: string,
): SharedOutcome =>
  shared({
    pendingCollection: [
      ...(state.pendingCollection ?? []),
      infoRequest(field, reason, step),
    ],
    errors: [errorEntry("PreconditionMissing", step, reason, now)],
  });

/** Records the failure and counts the attempt; the owned field stays as is. */
export const adapterFailed = (
  state: Readonly<SessionState>,
  step: StepName,
  error: AdapterError,
  now: string,
): SharedOutcome =>
  shared({
    errors: [errorEntry("AdapterFailure", step, error.message, now)],
    attempts: { [step]: (state.attempts[step] ?? 0) + 1 },
  });

export const say = (
  text: string,
  now: string,
): NonNullable<SharedUpdate["conversation"]> => [
  message("assistant", text, now),
];
