import { type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  ActionPlanSchema,
  type AlertInfo,
  AlertInfoSchema,
  AnalysisResultSchema,
  ContextSchema,
  ConversationEntrySchema,
  type ConversationEntry,
  DiagnosticResultSchema,
  type ErrorEntry,
  ErrorEntrySchema,
  type ErrorKind,
  ExecutionResultSchema,
  InfoRequestSchema,
  type PartialAlertInfo,
  ReportSchema,
  RoutingTraceSchema,
  type SessionState,
  SessionStateSchema,
  type StateField,
  type StepName,
  SymptomsSchema,
} from "./schema";
import type { MergeSource } from "./types";

export const FIELD_OWNERS = {
  analysisResult: "process_alert",
  diagnosticResult: "diagnose_issue",
  actionPlan: "plan_actions",
  executionResult: "execute_actions",
  report: "generate_report",
} as const satisfies Partial<Record<StateField, StepName>>;

export type OwnedField = keyof typeof FIELD_OWNERS;

type OwnedBy<S extends StepName> = {
  [F in OwnedField as (typeof FIELD_OWNERS)[F] extends S ? F : never]?: SessionState[F];
};

export type SharedUpdate = Partial<
  Pick<
    SessionState,
    | "conversation"
    | "symptoms"
    | "context"
    | "errors"
    | "pendingCollection"
    | "attempts"
  >
>;

/** What a step may hand back: shared fields plus the result it owns. */
export type StepUpdate<S extends StepName = StepName> = SharedUpdate &
  OwnedBy<S>;

export type StateUpdate = Partial<SessionState>;

const ConversationListSchema = Type.Array(ConversationEntrySchema);
const ErrorListSchema = Type.Array(ErrorEntrySchema);
const RequestListSchema = Type.Array(InfoRequestSchema);
const StringListSchema = Type.Array(Type.String());
const AttemptsSchema = SessionStateSchema.properties.attempts;
const ApprovalsSchema = SessionStateSchema.properties.approvals;

interface FieldRule {
  schema: TSchema;
  writers?: readonly MergeSource[];
}

const FIELD_RULES: Record<StateField, FieldRule> = {
  conversation: { schema: ConversationListSchema },
  alertInfo: { schema: AlertInfoSchema },
  symptoms: { schema: SymptomsSchema },
  context: { schema: ContextSchema },
  analysisResult: { schema: AnalysisResultSchema },
  diagnosticResult: { schema: DiagnosticResultSchema },
  actionPlan: { schema: ActionPlanSchema },
  executionResult: { schema: ExecutionResultSchema },
  report: { schema: ReportSchema },
  errors: { schema: ErrorListSchema },
  pendingCollection: { schema: RequestListSchema },
  routingTrace: {
    schema: RoutingTraceSchema,
    writers: ["engine", "router"],
  },
  attempts: { schema: AttemptsSchema },
  collectionAttempts: {
    schema: SessionStateSchema.properties.collectionAttempts,
    writers: ["engine", "resume"],
  },
  clarifiedDiagnoses: {
    schema: StringListSchema,
    writers: ["engine", "router", "seed"],
  },
  evidenceRevision: {
    schema: SessionStateSchema.properties.evidenceRevision,
    writers: ["engine", "resume"],
  },
  approvals: {
    schema: ApprovalsSchema,
    writers: ["engine", "resume", "seed"],
  },
};

const isStateField = (key: string): key is StateField =>
  Object.hasOwn(FIELD_RULES, key);

const isOwnedField = (key: StateField): key is OwnedField =>
  Object.hasOwn(FIELD_OWNERS, key);

export const createInitialState = (): SessionState => ({
  conversation: [],
  errors: [],
  attempts: {},
  collectionAttempts: 0,
  clarifiedDiagnoses: [],
  evidenceRevision: 0,
  approvals: {},
});

export const errorEntry = (
  kind: ErrorKind,
  source: string,
  message: string,
  timestamp: string,
): ErrorEntry => ({ kind, source, message, timestamp });

export const message = (
  role: ConversationEntry["role"],
  text: string,
  timestamp: string,
): ConversationEntry => ({ role, text, timestamp });

export const completeAlert = (
  alert: PartialAlertInfo,
  source: string,
  timestamp: string,
): AlertInfo => ({
  id: alert.id,
  timestamp: alert.timestamp ?? timestamp,
  severity: alert.severity ?? "unknown",
  source: alert.source ?? source,
  message: alert.message ?? "",
  metrics: alert.metrics ?? {},
  tags: alert.tags ?? [],
});

const unionOf = (current: string[] | undefined, next: string[]): string[] => {
  const merged = [...(current ?? [])];
  for (const item of next) {
    if (!merged.includes(item)) {
      merged.push(item);
    }
  }
  return merged;
};

const describeFailure = (schema: TSchema, value: unknown): string => {
  const first = Value.Errors(schema, value).First();
  return first
    ? `${first.path || "/"} ${first.message}`
    : "value does not match schema";
};

const rejectionFor = (
  key: string,
  value: unknown,
  source: MergeSource,
): { kind: ErrorKind; message: string } | null => {
  if (!isStateField(key)) {
    return { kind: "InvalidInput", message: `unknown field: ${key}` };
  }

  if (isOwnedField(key) && source !== "seed" && FIELD_OWNERS[key] !== source) {
    return {
      kind: "OwnershipViolation",
      message: `${source} may not write ${key} (owned by ${FIELD_OWNERS[key]})`,
    };
  }

  const rule = FIELD_RULES[key];
  if (rule.writers && !rule.writers.includes(source)) {
    return {
      kind: "OwnershipViolation",
      message: `${source} may not write ${key}`,
    };
  }

  if (!Value.Check(rule.schema, value)) {
    return {
      kind: "InvalidInput",
      message: `invalid ${key}: ${describeFailure(rule.schema, value)}`,
    };
  }

  return null;
};

export interface MergeResult {
  state: SessionState;
  rejected: string[];
}

/**
 * Apply one update to the record and return the replacement record. Lists
 * that are histories append, set-like lists union, open maps merge by key,
 * everything else is replaced whole. Fields the source may not write, unknown
 * fields and values failing their schema are dropped and logged to `errors`.
 */
export const mergeUpdate = (
  state: SessionState,
  update: Readonly<Record<string, unknown>>,
  source: MergeSource,
  timestamp: string,
): MergeResult => {
  const next: SessionState = { ...state };
  const rejected: string[] = [];
  const rejections: ErrorEntry[] = [];

  for (const [key, value] of Object.entries(update)) {
    if (value === undefined) {
      continue;
    }

    const rejection = rejectionFor(key, value, source);
    if (rejection) {
      rejected.push(key);
      rejections.push(
        errorEntry(rejection.kind, source, rejection.message, timestamp),
      );
      continue;
    }

    applyField(next, key, value);
  }

  if (rejections.length > 0) {
    next.errors = [...next.errors, ...rejections];
  }

  return { state: next, rejected };
};

// Values reaching here have already passed the field's schema; the checks
// below only narrow them.
const applyField = (next: SessionState, key: string, value: unknown): void => {
  switch (key) {
    case "conversation":
      if (Value.Check(ConversationListSchema, value)) {
        next.conversation = [...next.conversation, ...value];
      }
      return;
    case "errors":
      if (Value.Check(ErrorListSchema, value)) {
        next.errors = [...next.errors, ...value];
      }
      return;
    case "symptoms":
      if (Value.Check(SymptomsSchema, value)) {
        next.symptoms = unionOf(next.symptoms, value);
      }
      return;
    case "clarifiedDiagnoses":
      if (Value.Check(StringListSchema, value)) {
        next.clarifiedDiagnoses = unionOf(next.clarifiedDiagnoses, value);
      }
      return;
    case "context":
      if (Value.Check(ContextSchema, value)) {
        next.context = { ...next.context, ...value };
      }
      return;
    case "attempts":
      if (Value.Check(AttemptsSchema, value)) {
        next.attempts = { ...next.attempts, ...value };
      }
      return;
    case "approvals":
      if (Value.Check(ApprovalsSchema, value)) {
        next.approvals = { ...next.approvals, ...value };
      }
      return;
    case "pendingCollection":
      if (Value.Check(RequestListSchema, value)) {
        next.pendingCollection = value.length > 0 ? value : undefined;
      }
      return;
    case "alertInfo":
      if (Value.Check(AlertInfoSchema, value)) next.alertInfo = value;
      return;
    case "analysisResult":
      if (Value.Check(AnalysisResultSchema, value)) next.analysisResult = value;
      return;
    case "diagnosticResult":
      if (Value.Check(DiagnosticResultSchema, value))
        next.diagnosticResult = value;
      return;
    case "actionPlan":
      if (Value.Check(ActionPlanSchema, value)) next.actionPlan = value;
      return;
    case "executionResult":
      if (Value.Check(ExecutionResultSchema, value))
        next.executionResult = value;
      return;
    case "report":
      if (Value.Check(ReportSchema, value)) next.report = value;
      return;
    case "routingTrace":
      if (Value.Check(RoutingTraceSchema, value)) next.routingTrace = value;
      return;
    case "collectionAttempts":
      if (typeof value === "number") next.collectionAttempts = value;
      return;
    case "evidenceRevision":
      if (typeof value === "number") next.evidenceRevision = value;
      return;
  }
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
};

/** Detached, frozen copy handed to a step so it cannot touch live state. */
export const snapshot = (state: SessionState): Readonly<SessionState> =>
  deepFreeze(structuredClone(state));
