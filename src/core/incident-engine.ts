import { nanoid } from "nanoid";
import { AdapterPool } from "../adapters/adapter-pool";
import type { ReasoningAdapters } from "../adapters/types";
import { type EngineConfig, resolveEngineConfig } from "../config/engine-config";
import { type Logger, createLogger } from "../observability/logger";
import { SessionReaper, type SweepReport } from "../runtime/session-reaper";
import { defaultSteps } from "../steps";
import { EventBus } from "./event-bus";
import { type IngestDeps, ingestInput } from "./ingest";
import { parseSeed } from "./input";
import { decide } from "./router";
import type { ErrorKind, SessionState, StepName } from "./schema";
import { SessionStore } from "./session-store";
import type {
  StepDefinition,
  StepOutcome,
  StepRegistry,
} from "./step-definition";
import {
  type StateUpdate,
  createInitialState,
  errorEntry,
  mergeUpdate,
  snapshot,
} from "./state-record";
import { SuspensionController } from "./suspension";
import {
  type EngineResult,
  type MergeSource,
  type SessionId,
  type SessionRecord,
  type TerminalOutcome,
  asSessionId,
} from "./types";

export interface IncidentEngineOptions {
  adapters: ReasoningAdapters;
  config?: Partial<EngineConfig>;
  logger?: Logger;
  /** Replaces individual steps; the rest keep their defaults. */
  steps?: Partial<StepRegistry>;
  clock?: () => Date;
}

export interface EngineStats {
  active: number;
  waiting: number;
  adapters: ReturnType<AdapterPool["stats"]>;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Drives incident sessions: asks the router for the next step, runs it
 * against a snapshot, merges what it returns and repeats until the router
 * ends the session or a step needs the operator. Sessions never share
 * mutable state; the adapter pool is the only shared resource.
 */
export class IncidentEngine {
  readonly config: EngineConfig;
  readonly events: EventBus;
  private readonly logger: Logger;
  private readonly pool: AdapterPool;
  private readonly store = new SessionStore();
  private readonly suspensions: SuspensionController;
  private readonly steps: StepRegistry;
  private readonly clock: () => Date;

  constructor(private readonly options: IncidentEngineOptions) {
    this.config = resolveEngineConfig(options.config);
    this.logger =
      options.logger ?? createLogger({ level: this.config.logLevel });
    this.clock = options.clock ?? (() => new Date());
    this.events = new EventBus(this.logger);
    this.pool = new AdapterPool({
      concurrency: this.config.adapterConcurrency,
      timeoutMs: this.config.adapterTimeoutMs,
      logger: this.logger,
    });
    this.suspensions = new SuspensionController(
      this.config.maxCollectionAttempts,
    );
    this.steps = { ...defaultSteps, ...options.steps };
  }

  async start(seed?: unknown): Promise<EngineResult> {
    const id = asSessionId(`inc-${nanoid(8)}`);
    const log = this.logger.child({ sessionId: id });
    const createdAt = this.now();

    const record: SessionRecord = {
      id,
      status: "running",
      state: createInitialState(),
      cycles: 0,
      history: [],
      created_at: createdAt,
      updated_at: createdAt,
    };
    this.store.saveSession(record);
    this.events.emit({ type: "session.started", sessionId: id, at: createdAt });
    log.info("session started");

    const { state } = await ingestInput(
      record.state,
      parseSeed(seed, createdAt),
      "seed",
      this.ingestDeps(id, log),
    );

    return this.drive({ ...record, state }, log);
  }

  async resume(token: string, input: unknown): Promise<EngineResult> {
    const checkpoint = this.suspensions.take(token);
    if (!checkpoint) {
      return { status: "rejected", reason: "unknown or already used resume token" };
    }

    const stored = this.store.loadSession(checkpoint.sessionId);
    if (!stored) {
      return {
        status: "rejected",
        reason: `session ${checkpoint.sessionId} is no longer active`,
      };
    }

    const id = stored.id;
    const log = this.logger.child({ sessionId: id });
    const resumedAt = this.now();
    const running: SessionRecord = {
      id,
      status: "running",
      state: checkpoint.state,
      cycles: stored.cycles,
      history: stored.history,
      created_at: stored.created_at,
      updated_at: resumedAt,
    };
    this.store.saveSession(running);
    this.events.emit({ type: "session.resumed", sessionId: id, at: resumedAt });
    log.info(
      { collectionAttempts: checkpoint.state.collectionAttempts + 1 },
      "session resumed",
    );

    const state = await this.suspensions.resolve(
      checkpoint,
      input,
      this.ingestDeps(id, log),
    );

    return this.drive({ ...running, state }, log);
  }

  /** Drops the session at once. A step still running finishes unseen. */
  cancel(sessionId: string, reason = "cancelled by caller"): boolean {
    const id = asSessionId(sessionId);
    if (!this.store.deleteSession(id)) {
      return false;
    }

    this.suspensions.discard(id);
    this.logger.info({ sessionId: id, reason }, "session cancelled");
    this.events.emit({
      type: "session.cancelled",
      sessionId: id,
      reason,
      at: this.now(),
    });
    return true;
  }

  get(sessionId: string): SessionRecord | null {
    return this.store.loadSession(asSessionId(sessionId));
  }

  list(): SessionRecord[] {
    return this.store.listSessions();
  }

  /** Cancels sessions that have waited on the operator longer than allowed. */
  sweepIdle(now: Date = this.clock()): SessionId[] {
    const swept: SessionId[] = [];
    for (const record of this.store.listSessions()) {
      if (record.status !== "waiting" || !record.waiting_since) {
        continue;
      }
      const idleMs = now.getTime() - Date.parse(record.waiting_since);
      if (idleMs > this.config.idleTimeoutMs) {
        this.cancel(record.id, `idle for more than ${this.config.idleTimeoutMs}ms`);
        swept.push(record.id);
      }
    }
    return swept;
  }

  /** Sweeps this engine every `reaperIntervalMs` once started. */
  createReaper(onSweep?: (report: SweepReport) => void): SessionReaper {
    return new SessionReaper(
      this,
      this.config.reaperIntervalMs,
      this.logger.child({ component: "reaper" }),
      onSweep,
    );
  }

  stats(): EngineStats {
    const sessions = this.store.listSessions();
    return {
      active: sessions.length,
      waiting: sessions.filter((record) => record.status === "waiting").length,
      adapters: this.pool.stats(),
    };
  }

  private async drive(
    initial: SessionRecord,
    log: Logger,
  ): Promise<EngineResult> {
    let record = initial;

    while (true) {
      if (!this.store.has(record.id)) {
        return this.cancelled(record);
      }

      if (record.cycles >= this.config.maxCycles) {
        log.error({ cycles: record.cycles }, "cycle limit reached");
        return this.finish(
          record,
          this.withError(
            record.state,
            "CycleLimitExceeded",
            `stopped after ${record.cycles} step executions`,
          ),
          "cycle-limit-exceeded",
          log,
        );
      }

      const decision = decide(record.state, this.config);
      let state = this.merge(
        record.state,
        {
          routingTrace: {
            nextStep: decision.nextStep,
            rationale: decision.rationale,
            confidence: decision.confidence,
          },
        },
        "router",
      );
      log.debug(
        { nextStep: decision.nextStep, rationale: decision.rationale },
        "routing decision",
      );

      if (decision.nextStep === "terminal") {
        const outcome = decision.outcome ?? "completed";
        return this.finish(
          record,
          outcome === "fatal-error"
            ? this.withError(state, "StepExhausted", decision.rationale)
            : state,
          outcome,
          log,
        );
      }

      if (decision.requests && decision.requests.length > 0) {
        state = this.merge(
          state,
          {
            pendingCollection: [
              ...(state.pendingCollection ?? []),
              ...decision.requests,
            ],
            clarifiedDiagnoses: decision.clarifies ? [decision.clarifies] : [],
          },
          "router",
        );
      }

      const name = decision.nextStep;
      const step: StepDefinition = this.steps[name];
      const stepLog = log.child({ step: name });
      const startedAt = this.now();

      let outcome: StepOutcome;
      try {
        outcome = await step.run(snapshot(state), {
          sessionId: record.id,
          adapters: this.options.adapters,
          pool: this.pool,
          config: this.config,
          logger: stepLog,
          now: () => this.now(),
        });
      } catch (error) {
        if (!this.store.has(record.id)) {
          return this.cancelled(record);
        }
        stepLog.error({ err: error }, "step threw");
        record = this.recordStep(record, name, decision.rationale, startedAt, "fault");
        return this.finish(
          record,
          this.withError(
            state,
            "StepFault",
            `${name} threw: ${errorMessage(error)}`,
          ),
          "fatal-error",
          log,
        );
      }

      if (!this.store.has(record.id)) {
        stepLog.info("session was cancelled while the step ran; output discarded");
        return this.cancelled(record);
      }

      state = this.merge(state, outcome.update, name);
      record = {
        ...this.recordStep(record, name, decision.rationale, startedAt, outcome.kind),
        state,
      };
      this.events.emit({
        type: "step.completed",
        sessionId: record.id,
        step: name,
        result: outcome.kind,
        at: record.updated_at,
      });
      stepLog.debug({ result: outcome.kind, cycles: record.cycles }, "step finished");

      if (outcome.kind === "continue") {
        this.store.saveSession(record);
        continue;
      }

      if (!this.suspensions.canSuspend(state)) {
        log.warn(
          { collectionAttempts: state.collectionAttempts },
          "collection attempts exhausted",
        );
        return this.finish(
          record,
          this.withError(
            state,
            "SuspensionExhausted",
            `no usable answer after ${state.collectionAttempts} collection attempt(s)`,
          ),
          "collection-exhausted",
          log,
        );
      }

      const waitingSince = this.now();
      const checkpoint = this.suspensions.suspend(
        record.id,
        state,
        outcome.prompt,
        waitingSince,
      );
      this.store.saveSession({
        ...record,
        status: "waiting",
        waiting_since: waitingSince,
        token: checkpoint.token,
      });
      this.events.emit({
        type: "session.waiting",
        sessionId: record.id,
        token: checkpoint.token,
        prompt: outcome.prompt,
        at: waitingSince,
      });
      log.info(
        { kind: outcome.prompt.kind, requests: outcome.prompt.requests.length },
        "session waiting for operator",
      );
      return {
        status: "waiting",
        sessionId: record.id,
        token: checkpoint.token,
        prompt: outcome.prompt,
      };
    }
  }

  private recordStep(
    record: SessionRecord,
    step: StepName,
    rationale: string,
    startedAt: string,
    result: "continue" | "suspend" | "fault",
  ): SessionRecord {
    const finishedAt = this.now();
    return {
      ...record,
      cycles: record.cycles + 1,
      history: [
        ...record.history,
        { step, rationale, started_at: startedAt, finished_at: finishedAt, result },
      ],
      updated_at: finishedAt,
    };
  }

  private finish(
    record: SessionRecord,
    state: SessionState,
    outcome: TerminalOutcome,
    log: Logger,
  ): EngineResult {
    this.store.deleteSession(record.id);
    this.suspensions.discard(record.id);
    log.info(
      { outcome, cycles: record.cycles, errors: state.errors.length },
      "session finished",
    );
    this.events.emit({
      type: "session.terminal",
      sessionId: record.id,
      outcome,
      at: this.now(),
    });
    return { status: "terminal", sessionId: record.id, outcome, state };
  }

  private cancelled(record: SessionRecord): EngineResult {
    return {
      status: "terminal",
      sessionId: record.id,
      outcome: "cancelled",
      state: record.state,
    };
  }

  private merge(
    state: SessionState,
    update: StateUpdate,
    source: MergeSource,
  ): SessionState {
    return mergeUpdate(state, update, source, this.now()).state;
  }

  private withError(
    state: SessionState,
    kind: ErrorKind,
    message: string,
  ): SessionState {
    const now = this.now();
    return mergeUpdate(
      state,
      { errors: [errorEntry(kind, "engine", message, now)] },
      "engine",
      now,
    ).state;
  }

  private ingestDeps(sessionId: SessionId, logger: Logger): IngestDeps {
    return {
      sessionId,
      pool: this.pool,
      extractor: this.options.adapters.extractor,
      extractionConfidenceThreshold: this.config.extractionConfidenceThreshold,
      logger,
      now: () => this.now(),
    };
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

export const createIncidentEngine = (
  options: IncidentEngineOptions,
): IncidentEngine => new IncidentEngine(options);
