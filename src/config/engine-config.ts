import fs from "node:fs";
import path from "node:path";
import { createJiti } from "jiti";
import { type LogLevel, isLogLevel } from "../observability/logger";

export type ApprovalPolicy = "never" | "high-risk" | "always";

export interface EngineConfig {
  /** Diagnoses below this confidence trigger one clarification round. */
  diagnosisConfidenceThreshold: number;
  /** Extractions below this confidence are kept as text only. */
  extractionConfidenceThreshold: number;
  maxCollectionAttempts: number;
  /** Step executions per session before the engine gives up. */
  maxCycles: number;
  /** Failed adapter calls per step before routing around it. */
  maxStepAttempts: number;
  adapterTimeoutMs: number;
  adapterConcurrency: number;
  idleTimeoutMs: number;
  reaperIntervalMs: number;
  approvalPolicy: ApprovalPolicy;
  /**
   * Globs matched against each word of a plan step's command and
   * description. Any match makes the plan high-risk.
   */
  approvalPatterns: string[];
  logLevel: LogLevel;
}

export const defaultEngineConfig: EngineConfig = {
  diagnosisConfidenceThreshold: 0.6,
  extractionConfidenceThreshold: 0.5,
  maxCollectionAttempts: 5,
  maxCycles: 50,
  maxStepAttempts: 3,
  adapterTimeoutMs: 30_000,
  adapterConcurrency: 4,
  idleTimeoutMs: 15 * 60_000,
  reaperIntervalMs: 60_000,
  approvalPolicy: "high-risk",
  approvalPatterns: [
    "restart",
    "reboot",
    "delete",
    "remove",
    "rm",
    "kill",
    "stop",
    "drop*",
  ],
  logLevel: "info",
};

const APPROVAL_POLICIES: readonly ApprovalPolicy[] = [
  "never",
  "high-risk",
  "always",
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const isApprovalPolicy = (value: unknown): value is ApprovalPolicy =>
  typeof value === "string" &&
  APPROVAL_POLICIES.some((policy) => policy === value);

type NumericKey = {
  [K in keyof EngineConfig]: EngineConfig[K] extends number ? K : never;
}[keyof EngineConfig];

const NUMERIC_BOUNDS: Record<
  NumericKey,
  { min: number; max: number; integer: boolean }
> = {
  diagnosisConfidenceThreshold: { min: 0, max: 1, integer: false },
  extractionConfidenceThreshold: { min: 0, max: 1, integer: false },
  maxCollectionAttempts: { min: 1, max: 1_000, integer: true },
  maxCycles: { min: 1, max: 10_000, integer: true },
  maxStepAttempts: { min: 1, max: 100, integer: true },
  adapterTimeoutMs: { min: 1, max: 3_600_000, integer: true },
  adapterConcurrency: { min: 1, max: 1_024, integer: true },
  idleTimeoutMs: { min: 1, max: Number.MAX_SAFE_INTEGER, integer: true },
  reaperIntervalMs: { min: 1, max: 86_400_000, integer: true },
};

const NUMERIC_KEYS = Object.keys(NUMERIC_BOUNDS).filter(
  (key): key is NumericKey => key in defaultEngineConfig,
);

const isValidNumber = (key: NumericKey, value: unknown): value is number => {
  const bounds = NUMERIC_BOUNDS[key];
  return (
    typeof value === "number" &&
    Number.isFinite(value) &&
    value >= bounds.min &&
    value <= bounds.max &&
    (!bounds.integer || Number.isInteger(value))
  );
};

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "string");

/**
 * Lenient: values from a config file that do not fit fall back to the
 * defaults.
 */
const normalizeEngineConfig = (parsed: unknown): EngineConfig => {
  if (!isRecord(parsed)) {
    return defaultEngineConfig;
  }

  const config: EngineConfig = { ...defaultEngineConfig };
  for (const key of NUMERIC_KEYS) {
    const value = parsed[key];
    if (isValidNumber(key, value)) {
      config[key] = value;
    }
  }
  if (isApprovalPolicy(parsed.approvalPolicy)) {
    config.approvalPolicy = parsed.approvalPolicy;
  }
  if (isStringList(parsed.approvalPatterns)) {
    config.approvalPatterns = parsed.approvalPatterns;
  }
  if (isLogLevel(parsed.logLevel)) {
    config.logLevel = parsed.logLevel;
  }
  return config;
};

/**
 * Strict: programmatic overrides that do not fit are a caller bug.
 */
export const resolveEngineConfig = (
  overrides: Partial<EngineConfig> = {},
): EngineConfig => {
  const config: EngineConfig = { ...defaultEngineConfig };

  for (const key of NUMERIC_KEYS) {
    const value = overrides[key];
    if (value === undefined) {
      continue;
    }
    if (!isValidNumber(key, value)) {
      const bounds = NUMERIC_BOUNDS[key];
      throw new RangeError(
        `${key} must be ${bounds.integer ? "an integer" : "a number"} between ${bounds.min} and ${bounds.max}, got ${value}`,
      );
    }
    config[key] = value;
  }

  if (overrides.approvalPolicy !== undefined) {
    if (!isApprovalPolicy(overrides.approvalPolicy)) {
      throw new RangeError(
        `approvalPolicy must be one of ${APPROVAL_POLICIES.join(", ")}`,
      );
    }
    config.approvalPolicy = overrides.approvalPolicy;
  }

  if (overrides.approvalPatterns !== undefined) {
    config.approvalPatterns = [...overrides.approvalPatterns];
  }

  if (overrides.logLevel !== undefined) {
    if (!isLogLevel(overrides.logLevel)) {
      throw new RangeError(`unknown logLevel: ${overrides.logLevel}`);
    }
    config.logLevel = overrides.logLevel;
  }

  return config;
};

export const loadEngineConfig = async (cwd: string): Promise<EngineConfig> => {
  const tsPath = path.join(cwd, ".triage", "engine.ts");
  if (fs.existsSync(tsPath)) {
    try {
      const jiti = createJiti(import.meta.url);
      const loaded = await jiti.import<unknown>(tsPath);
      const parsed =
        isRecord(loaded) && "default" in loaded
          ? (loaded.default ?? loaded)
          : loaded;
      return normalizeEngineConfig(parsed);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load ${tsPath}: ${reason}`, { cause: error });
    }
  }

  const jsonPath = path.join(cwd, ".triage", "engine.json");
  if (!fs.existsSync(jsonPath)) {
    return defaultEngineConfig;
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(jsonPath, "utf8"));
  return normalizeEngineConfig(parsed);
};
