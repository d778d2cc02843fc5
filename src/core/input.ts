import { type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  AnalysisResultSchema,
  ContextSchema,
  ExecutionResultSchema,
  PartialAlertInfoSchema,
  PlanStepSchema,
  ReportSchema,
  RiskLevelSchema,
  SymptomsSchema,
} from "./schema";
import { type StateUpdate, completeAlert } from "./state-record";

const closed = { additionalProperties: false } as const;

const SeedDiagnosisSchema = Type.Object(
  {
    id: Type.Optional(Type.String({ minLength: 1 })),
    rootCause: Type.Optional(Type.String()),
    confidenceScore: Type.Number({ minimum: 0, maximum: 1 }),
    affectedComponents: Type.Optional(Type.Array(Type.String())),
    evidence: Type.Optional(Type.Array(Type.String())),
  },
  closed,
);

const SeedPlanSchema = Type.Object(
  {
    id: Type.Optional(Type.String({ minLength: 1 })),
    steps: Type.Array(PlanStepSchema),
    riskLevel: Type.Optional(RiskLevelSchema),
    rollbackPlan: Type.Optional(Type.Array(Type.String())),
    etaMinutes: Type.Optional(Type.Number({ minimum: 0 })),
  },
  closed,
);

/** Operator-facing fields accepted both at start and on resume. */
const FACT_SCHEMAS = {
  text: Type.String(),
  alertInfo: PartialAlertInfoSchema,
  symptoms: SymptomsSchema,
  context: ContextSchema,
} satisfies Record<string, TSchema>;

const SEED_SCHEMAS = {
  ...FACT_SCHEMAS,
  analysisResult: AnalysisResultSchema,
  diagnosticResult: SeedDiagnosisSchema,
  actionPlan: SeedPlanSchema,
  executionResult: ExecutionResultSchema,
  report: ReportSchema,
} satisfies Record<string, TSchema>;

const RESUME_SCHEMAS = {
  ...FACT_SCHEMAS,
  decision: Type.String(),
} satisfies Record<string, TSchema>;

export interface ParsedInput {
  text?: string;
  /** Raw approval answer, resume only. */
  decision?: string;
  update: StateUpdate;
  problems: string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const normalizeText = (text: string): string | undefined => {
  const trimmed = text.trim();
  return trimmed.length > 0 ? text : undefined;
};

const checkFields = (
  input: Record<string, unknown>,
  schemas: Record<string, TSchema>,
  problems: string[],
): Map<string, unknown> => {
  const accepted = new Map<string, unknown>();
  for (const [key, value] of Object.entries(input)) {
    const schema = Object.hasOwn(schemas, key) ? schemas[key] : undefined;
    if (!schema) {
      problems.push(`unrecognized field: ${key}`);
      continue;
    }
    if (!Value.Check(schema, value)) {
      const first = Value.Errors(schema, value).First();
      problems.push(
        `invalid ${key}${first ? `: ${first.path || "/"} ${first.message}` : ""}`,
      );
      continue;
    }
    accepted.set(key, value);
  }
  return accepted;
};

const factsFrom = (
  accepted: Map<string, unknown>,
  origin: string,
  now: string,
): Pick<ParsedInput, "text" | "update"> => {
  const update: StateUpdate = {};
  let text: string | undefined;

  const rawText = accepted.get("text");
  if (typeof rawText === "string") {
    text = normalizeText(rawText);
  }
  const alert = accepted.get("alertInfo");
  if (Value.Check(PartialAlertInfoSchema, alert)) {
    update.alertInfo = completeAlert(alert, origin, now);
  }
  const symptoms = accepted.get("symptoms");
  if (Value.Check(SymptomsSchema, symptoms)) {
    update.symptoms = symptoms;
  }
  const context = accepted.get("context");
  if (Value.Check(ContextSchema, context)) {
    update.context = context;
  }

  return { ...(text !== undefined ? { text } : {}), update };
};

/**
 * A seed is free text or a partial record. Fields that do not fit are
 * reported as problems; the rest is kept.
 */
export const parseSeed = (seed: unknown, now: string): ParsedInput => {
  if (typeof seed === "string") {
    const text = normalizeText(seed);
    return { ...(text !== undefined ? { text } : {}), update: {}, problems: [] };
  }

  if (seed === undefined || seed === null) {
    return { update: {}, problems: [] };
  }

  if (!isRecord(seed)) {
    return {
      update: {},
      problems: [`unsupported seed of type ${Array.isArray(seed) ? "array" : typeof seed}`],
    };
  }

  const problems: string[] = [];
  const accepted = checkFields(seed, SEED_SCHEMAS, problems);
  const { text, update } = factsFrom(accepted, "seed", now);

  const analysis = accepted.get("analysisResult");
  if (Value.Check(AnalysisResultSchema, analysis)) {
    update.analysisResult = analysis;
  }

  const diagnosis = accepted.get("diagnosticResult");
  if (Value.Check(SeedDiagnosisSchema, diagnosis)) {
    update.diagnosticResult = {
      id: diagnosis.id ?? "dx-seed",
      rootCause: diagnosis.rootCause ?? "unspecified",
      confidenceScore: diagnosis.confidenceScore,
      affectedComponents: diagnosis.affectedComponents ?? [],
      evidence: diagnosis.evidence ?? [],
      evidenceRevision: 0,
    };
  }

  const plan = accepted.get("actionPlan");
  if (Value.Check(SeedPlanSchema, plan)) {
    update.actionPlan = {
      id: plan.id ?? "plan-seed",
      steps: plan.steps,
      riskLevel: plan.riskLevel ?? "low",
      rollbackPlan: plan.rollbackPlan ?? [],
      etaMinutes: plan.etaMinutes ?? 0,
    };
  }

  const execution = accepted.get("executionResult");
  if (Value.Check(ExecutionResultSchema, execution)) {
    update.executionResult = execution;
  }

  const report = accepted.get("report");
  if (Value.Check(ReportSchema, report)) {
    update.report = report;
  }

  return { ...(text !== undefined ? { text } : {}), update, problems };
};

/** An operator answer: plain text or `{ text?, alertInfo?, symptoms?, context?, decision? }`. */
export const parseResumeInput = (raw: unknown, now: string): ParsedInput => {
  if (typeof raw === "string") {
    const text = normalizeText(raw);
    return text !== undefined
      ? { text, update: {}, problems: [] }
      : { update: {}, problems: ["empty response"] };
  }

  if (!isRecord(raw)) {
    return {
      update: {},
      problems: [
        `unsupported response of type ${raw === null ? "null" : Array.isArray(raw) ? "array" : typeof raw}`,
      ],
    };
  }

  const problems: string[] = [];
  const accepted = checkFields(raw, RESUME_SCHEMAS, problems);
  const { text, update } = factsFrom(accepted, "operator", now);
  const decision = accepted.get("decision");

  if (
    problems.length === 0 &&
    text === undefined &&
    decision === undefined &&
    Object.keys(update).length === 0
  ) {
    problems.push("empty response");
  }

  return {
    ...(text !== undefined ? { text } : {}),
    ...(typeof decision === "string" ? { decision } : {}),
    update,
    problems,
  };
};
