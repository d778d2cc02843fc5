import type {
  ActionPlan,
  AlertClassification,
  AlertInfo,
  Diagnosis,
  DiagnosticResult,
  Execution,
  Extraction,
  Plan,
  ReportDraft,
  SessionState,
} from "../core/schema";
import type { SessionId } from "../core/types";

export type AdapterName =
  | "classifier"
  | "diagnostics"
  | "planner"
  | "executor"
  | "reporter"
  | "extractor";

export interface AdapterCallContext {
  sessionId: SessionId;
  /** Aborted when the pool's timeout for this call elapses. */
  signal: AbortSignal;
}

export interface AlertClassifier {
  classify(
    alert: AlertInfo,
    ctx: AdapterCallContext,
  ): Promise<AlertClassification>;
}

export interface DiagnosticEngine {
  diagnose(
    input: {
      symptoms: string[];
      context: Record<string, unknown>;
      alertInfo?: AlertInfo;
    },
    ctx: AdapterCallContext,
  ): Promise<Diagnosis>;
}

export interface ActionPlanner {
  plan(
    input: {
      diagnosticResult: DiagnosticResult;
      context: Record<string, unknown>;
    },
    ctx: AdapterCallContext,
  ): Promise<Plan>;
}

/**
 * Carries out remediation. Whatever it changes outside the process is not
 * rolled back if the session is cancelled afterwards.
 */
export interface ExecutionBackend {
  execute(plan: ActionPlan, ctx: AdapterCallContext): Promise<Execution>;
}

export interface ReportGenerator {
  generate(
    aggregate: Readonly<SessionState>,
    ctx: AdapterCallContext,
  ): Promise<ReportDraft>;
}

export interface TextExtractor {
  extract(text: string, ctx: AdapterCallContext): Promise<Extraction>;
}

export interface ReasoningAdapters {
  classifier: AlertClassifier;
  diagnostics: DiagnosticEngine;
  planner: ActionPlanner;
  executor: ExecutionBackend;
  reporter: ReportGenerator;
  extractor?: TextExtractor;
}
