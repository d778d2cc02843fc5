export {
  createIncidentEngine,
  IncidentEngine,
  type EngineStats,
  type IncidentEngineOptions,
} from "./core/incident-engine";
export { decide, type RoutingPolicy } from "./core/router";
export {
  EventBus,
  type EngineEvent,
  type EngineEventType,
} from "./core/event-bus";
export { SessionStore } from "./core/session-store";
export { type Checkpoint, SuspensionController } from "./core/suspension";
export {
  FIELD_OWNERS,
  createInitialState,
  mergeUpdate,
  snapshot,
  type MergeResult,
  type OwnedField,
  type StateUpdate,
  type StepUpdate,
} from "./core/state-record";
export {
  defineStep,
  type StepContext,
  type StepDefinition,
  type StepOutcome,
  type StepRegistry,
} from "./core/step-definition";
export {
  assessApproval,
  parseApprovalDecision,
  type ApprovalAssessment,
} from "./core/approval-policy";
export type * from "./core/schema";
export {
  STEP_NAMES,
  ERROR_KINDS,
  SessionStateSchema,
} from "./core/schema";
export type * from "./core/types";
export { defaultSteps } from "./steps";
export {
  AdapterError,
  AdapterPool,
  type AdapterFailureReason,
  type AdapterOutcome,
} from "./adapters/adapter-pool";
export type * from "./adapters/types";
export {
  defaultEngineConfig,
  loadEngineConfig,
  resolveEngineConfig,
  type ApprovalPolicy,
  type EngineConfig,
} from "./config/engine-config";
export { createLogger, type LogLevel, type Logger } from "./observability/logger";
export {
  buildOverviewLines,
  buildSessionDetailLines,
  buildSessionLines,
  buildStatusLines,
} from "./observability/status";
export { SessionReaper, type SweepReport } from "./runtime/session-reaper";
