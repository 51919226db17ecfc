// Database
export { getDb, closeDb, getDbForTesting, resolveDbPath } from "./db/connection.js";
export type { DatabaseConnection } from "./db/connection.js";
export {
  initializeSchema,
  getSetting,
  getIntSetting,
  setSetting,
  getAllSettings,
  isSecretSetting,
} from "./db/schema.js";

// Goals
export type {
  Goal,
  GoalState,
  GoalPriority,
  GoalKind,
  DependencyKind,
  StepStatus,
  ScheduledEventStatus,
  ProjectionStatus,
  PhaseStatus,
  GoalSnapshot,
  RevisionContent,
  GoalRevision,
  TargetMetric,
  GoalProjection,
  GoalPhase,
  ScheduledEventLink,
  RoadmapSection,
  GoalDependency,
  CreateGoalInput,
  UpdateGoalInput,
  DateHorizon,
  GraphSnapshot,
  GraphChanges,
} from "./goals/types.js";
export { GOAL_STATES, GOAL_PRIORITIES, GOAL_KINDS, DEPENDENCY_KINDS } from "./goals/types.js";
export {
  GoalError,
  GoalNotFoundError,
  ValidationError,
  CycleError,
  SelfDependencyError,
  LockedError,
  InvalidTransitionError,
  InvalidBreakdownError,
  StepLimitExceeded,
  DuplicateStepTitle,
  ExternalServiceFailure,
  PartialActivationFailure,
  toWarning,
} from "./goals/errors.js";
export type { GoalErrorCode, EngineWarning } from "./goals/errors.js";
export { GoalGraph, newGoal, contentOf } from "./goals/graph.js";
export type { Clock } from "./goals/graph.js";
export { GraphMutex } from "./goals/mutex.js";
export { computeProgress, stepRatio } from "./goals/progress.js";
export {
  applyBreakdown,
  normalizeExternalId,
  priorityForDifficulty,
  formatNodeBody,
} from "./goals/breakdown.js";
export type { BreakdownResult, DroppedDependency } from "./goals/breakdown.js";
export { applyFraming, clampConfidence } from "./goals/framing.js";
export { GoalLifecycle, captureLock, DEFAULT_LOCK_RATIONALE } from "./goals/lifecycle.js";
export type {
  ActivationResult,
  CompletionResult,
  CounterSink,
  DeactivationTarget,
  LifecycleDeps,
} from "./goals/lifecycle.js";
export {
  SequentialStepEngine,
  STEP_HARD_LIMIT,
  STEP_SOFT_WARNING,
  DEFAULT_STEP_DAYS,
} from "./goals/steps.js";
export type { StepAdvanceResult, StepLimits, FirstStepInput } from "./goals/steps.js";
export {
  buildTimeline,
  isInHorizon,
  applyInsights,
  formatMetric,
} from "./goals/timeline.js";
export type {
  TimelineEntry,
  TimelineEntryKind,
  TimelineIntelligence,
} from "./goals/timeline.js";
export { pruneSnapshots, DEFAULT_MAX_SNAPSHOTS_PER_GOAL } from "./goals/retention.js";
export type { PruneResult } from "./goals/retention.js";
export { GoalStore } from "./goals/store.js";
export { GoalEngine, assertHorizon } from "./goals/engine.js";
export type {
  GoalEngineOptions,
  GoalTreeNode,
  GoalDetail,
  TimelineRow,
} from "./goals/engine.js";

// Reasoning
export type { ReasoningService, ReasoningContext, GoalDigest } from "./reasoning/types.js";
export { buildContext } from "./reasoning/types.js";
export {
  decompositionNodeSchema,
  decompositionTreeSchema,
  regenerationSchema,
  proposedSessionSchema,
  activationPlanSchema,
  nextStepSchema,
  timelineInsightSchema,
  timelineInsightsSchema,
  targetMetricSchema,
  framingSchema,
} from "./reasoning/schemas.js";
export type {
  DecompositionNode,
  DecompositionTree,
  RegenerationProposal,
  ProposedSession,
  ActivationPlan,
  NextStepProposal,
  TimelineInsight,
  FramingProposal,
} from "./reasoning/schemas.js";
export { LlmReasoningService, extractJson } from "./reasoning/llm.js";
export type { LlmProvider, LlmReasoningOptions } from "./reasoning/llm.js";
export {
  getReasoningService,
  setReasoningService,
  resetReasoningService,
} from "./reasoning/manager.js";

// Calendar
export type { CalendarService, CalendarEventInput } from "./calendar/types.js";
export { LocalCalendarService } from "./calendar/local.js";
export type { CalendarEvent } from "./calendar/local.js";
export {
  getCalendarService,
  setCalendarService,
  resetCalendarService,
} from "./calendar/manager.js";

// Observability
export { incrementCounter, getCounter, getCounters, COUNTER_KEYS } from "./observability/counters.js";
export type { CounterRow, CounterKey, CounterArea } from "./observability/counters.js";
