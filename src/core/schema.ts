import { type Static, Type } from "@sinclair/typebox";

const closed = { additionalProperties: false } as const;

export const STEP_NAMES = [
  "process_alert",
  "diagnose_issue",
  "plan_actions",
  "execute_actions",
  "generate_report",
  "collect_info",
] as const;

export const StepNameSchema = Type.Union(
  STEP_NAMES.map((name) => Type.Literal(name)),
);
export type StepName = (typeof STEP_NAMES)[number];
export type RouteTarget = StepName | "terminal";

export const ConversationEntrySchema = Type.Object(
  {
    role: Type.Union([
      Type.Literal("operator"),
      Type.Literal("assistant"),
      Type.Literal("system"),
    ]),
    text: Type.String(),
    timestamp: Type.String(),
  },
  closed,
);
export type ConversationEntry = Static<typeof ConversationEntrySchema>;

const MetricsSchema = Type.Record(
  Type.String(),
  Type.Union([Type.Number(), Type.String()]),
);

export const AlertInfoSchema = Type.Object(
  {
    id: Type.String({ minLength: 1 }),
    timestamp: Type.String(),
    severity: Type.String(),
    source: Type.String(),
    message: Type.String(),
    metrics: MetricsSchema,
    tags: Type.Array(Type.String()),
  },
  closed,
);
export type AlertInfo = Static<typeof AlertInfoSchema>;

/** Alert as supplied by a caller or an extractor: only the id is required. */
export const PartialAlertInfoSchema = Type.Object(
  {
    id: Type.String({ minLength: 1 }),
    timestamp: Type.Optional(Type.String()),
    severity: Type.Optional(Type.String()),
    source: Type.Optional(Type.String()),
    message: Type.Optional(Type.String()),
    metrics: Type.Optional(MetricsSchema),
    tags: Type.Optional(Type.Array(Type.String())),
  },
  closed,
);
export type PartialAlertInfo = Static<typeof PartialAlertInfoSchema>;

export const SymptomsSchema = Type.Array(Type.String({ minLength: 1 }));

/** Plain JSON data; anything else (functions, class instances) is rejected. */
export const JsonValueSchema = Type.Recursive((This) =>
  Type.Union([
    Type.Null(),
    Type.Boolean(),
    Type.Number(),
    Type.String(),
    Type.Array(This),
    Type.Record(Type.String(), This),
  ]),
);
export type JsonValue = Static<typeof JsonValueSchema>;

export const ContextSchema = Type.Record(Type.String(), JsonValueSchema);

// Adapter outputs. Results stored on the state extend these with ids.

export const AlertClassificationSchema = Type.Object({
  category: Type.String(),
  severityScore: Type.Number({ minimum: 0, maximum: 1 }),
  correlationHints: Type.Array(Type.String()),
});
export type AlertClassification = Static<typeof AlertClassificationSchema>;

export const DiagnosisSchema = Type.Object({
  rootCause: Type.String(),
  confidenceScore: Type.Number({ minimum: 0, maximum: 1 }),
  affectedComponents: Type.Array(Type.String()),
  evidence: Type.Array(Type.String()),
});
export type Diagnosis = Static<typeof DiagnosisSchema>;

export const PlanStepSchema = Type.Object(
  {
    id: Type.String({ minLength: 1 }),
    description: Type.String(),
    command: Type.Optional(Type.String()),
  },
  closed,
);
export type PlanStep = Static<typeof PlanStepSchema>;

export const RiskLevelSchema = Type.Union([
  Type.Literal("low"),
  Type.Literal("medium"),
  Type.Literal("high"),
  Type.Literal("critical"),
]);
export type RiskLevel = Static<typeof RiskLevelSchema>;

export const PlanSchema = Type.Object({
  steps: Type.Array(PlanStepSchema),
  riskLevel: RiskLevelSchema,
  rollbackPlan: Type.Array(Type.String()),
  etaMinutes: Type.Number({ minimum: 0 }),
});
export type Plan = Static<typeof PlanSchema>;

export const StepOutcomeSchema = Type.Object(
  {
    stepId: Type.String(),
    status: Type.Union([
      Type.Literal("succeeded"),
      Type.Literal("failed"),
      Type.Literal("skipped"),
    ]),
    detail: Type.Optional(Type.String()),
  },
  closed,
);
export type PlanStepOutcome = Static<typeof StepOutcomeSchema>;

export const ExecutionSchema = Type.Object({
  status: Type.Union([
    Type.Literal("success"),
    Type.Literal("partial"),
    Type.Literal("failed"),
  ]),
  perStepOutcome: Type.Array(StepOutcomeSchema),
});
export type Execution = Static<typeof ExecutionSchema>;

export const ReportSectionSchema = Type.Object(
  { title: Type.String(), body: Type.String() },
  closed,
);

export const ReportDraftSchema = Type.Object({
  summary: Type.String(),
  sections: Type.Array(ReportSectionSchema),
});
export type ReportDraft = Static<typeof ReportDraftSchema>;

export const ExtractionSchema = Type.Object({
  alertInfo: Type.Optional(PartialAlertInfoSchema),
  symptoms: Type.Optional(SymptomsSchema),
  context: Type.Optional(ContextSchema),
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
});
export type Extraction = Static<typeof ExtractionSchema>;

// Owned result records.

export const AnalysisResultSchema = Type.Object(
  {
    alertId: Type.String(),
    category: Type.String(),
    severityScore: Type.Number({ minimum: 0, maximum: 1 }),
    correlationHints: Type.Array(Type.String()),
  },
  closed,
);
export type AnalysisResult = Static<typeof AnalysisResultSchema>;

export const DiagnosticResultSchema = Type.Object(
  {
    id: Type.String({ minLength: 1 }),
    rootCause: Type.String(),
    confidenceScore: Type.Number({ minimum: 0, maximum: 1 }),
    affectedComponents: Type.Array(Type.String()),
    evidence: Type.Array(Type.String()),
    evidenceRevision: Type.Integer({ minimum: 0 }),
  },
  closed,
);
export type DiagnosticResult = Static<typeof DiagnosticResultSchema>;

export const ActionPlanSchema = Type.Object(
  {
    id: Type.String({ minLength: 1 }),
    steps: Type.Array(PlanStepSchema),
    riskLevel: RiskLevelSchema,
    rollbackPlan: Type.Array(Type.String()),
    etaMinutes: Type.Number({ minimum: 0 }),
  },
  closed,
);
export type ActionPlan = Static<typeof ActionPlanSchema>;

export const ExecutionResultSchema = Type.Object(
  {
    planId: Type.String(),
    status: Type.Union([
      Type.Literal("success"),
      Type.Literal("partial"),
      Type.Literal("failed"),
      Type.Literal("rejected_by_operator"),
    ]),
    perStepOutcome: Type.Array(StepOutcomeSchema),
    approved: Type.Boolean(),
  },
  closed,
);
export type ExecutionResult = Static<typeof ExecutionResultSchema>;

export const ReportSchema = Type.Object(
  {
    summary: Type.String(),
    sections: Type.Array(ReportSectionSchema),
    degraded: Type.Boolean(),
    generatedAt: Type.String(),
  },
  closed,
);
export type Report = Static<typeof ReportSchema>;

export const ERROR_KINDS = [
  "PreconditionMissing",
  "AdapterFailure",
  "SuspensionExhausted",
  "CycleLimitExceeded",
  "InvalidInput",
  "OwnershipViolation",
  "StepExhausted",
  "StepFault",
] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

export const ErrorEntrySchema = Type.Object(
  {
    kind: Type.Union(ERROR_KINDS.map((kind) => Type.Literal(kind))),
    source: Type.String(),
    message: Type.String(),
    timestamp: Type.String(),
  },
  closed,
);
export type ErrorEntry = Static<typeof ErrorEntrySchema>;

export const InfoRequestSchema = Type.Object(
  {
    id: Type.String({ minLength: 1 }),
    field: Type.Union([
      Type.Literal("alertInfo"),
      Type.Literal("symptoms"),
      Type.Literal("context"),
      Type.Literal("clarification"),
      Type.Literal("approval"),
    ]),
    reason: Type.String(),
    requestedBy: Type.String(),
    /** Record the request is about, e.g. the plan awaiting approval. */
    subject: Type.Optional(Type.String()),
  },
  closed,
);
export type InfoRequest = Static<typeof InfoRequestSchema>;
export type InfoField = InfoRequest["field"];

export const RoutingTraceSchema = Type.Object(
  {
    nextStep: Type.Union([StepNameSchema, Type.Literal("terminal")]),
    rationale: Type.String(),
    confidence: Type.Number({ minimum: 0, maximum: 1 }),
  },
  closed,
);

export const ApprovalDecisionSchema = Type.Union([
  Type.Literal("approved"),
  Type.Literal("rejected"),
  /** Send the plan back to planning with the operator's feedback. */
  Type.Literal("modified"),
]);
export type ApprovalDecision = Static<typeof ApprovalDecisionSchema>;

export const SessionStateSchema = Type.Object(
  {
    conversation: Type.Array(ConversationEntrySchema),
    alertInfo: Type.Optional(AlertInfoSchema),
    symptoms: Type.Optional(SymptomsSchema),
    context: Type.Optional(ContextSchema),
    analysisResult: Type.Optional(AnalysisResultSchema),
    diagnosticResult: Type.Optional(DiagnosticResultSchema),
    actionPlan: Type.Optional(ActionPlanSchema),
    executionResult: Type.Optional(ExecutionResultSchema),
    report: Type.Optional(ReportSchema),
    errors: Type.Array(ErrorEntrySchema),
    pendingCollection: Type.Optional(Type.Array(InfoRequestSchema)),
    routingTrace: Type.Optional(RoutingTraceSchema),
    attempts: Type.Record(Type.String(), Type.Integer({ minimum: 0 })),
    collectionAttempts: Type.Integer({ minimum: 0 }),
    clarifiedDiagnoses: Type.Array(Type.String()),
    evidenceRevision: Type.Integer({ minimum: 0 }),
    approvals: Type.Record(Type.String(), ApprovalDecisionSchema),
  },
  closed,
);
export type SessionState = Static<typeof SessionStateSchema>;
export type StateField = keyof SessionState;
