export {
  AuditEngine,
  CROSS_REFERENCE_GOAL,
  MANIFEST_GOAL,
  STAGES,
  buildAuditGraph,
  chiefJusticeNode,
  collectorNode,
  evidenceAggregatorNode,
  evidenceForCriterion,
  judgeNode,
  noEvidenceWithErrors,
  runAudit,
} from "./audit-graph.js";
export type {
  AuditCollectors,
  AuditEngineOptions,
  AuditRequest,
  AuditRunResult,
  EngineSettings,
  EvidenceCollector,
} from "./audit-graph.js";

export {
  AuditError,
  CollectionError,
  ConfigurationError,
  GenerationError,
  MalformedDelta,
  MergeConflict,
  NodeTimeout,
  RateLimitError,
  RunCancelled,
  RunTimeout,
  errorMessage,
  formatErrorEntry,
} from "./errors.js";

export {
  allEvidence,
  canonicalState,
  compareOpinions,
  initializeState,
  isEvidence,
  isJudicialOpinion,
  isStateDelta,
  mergeState,
  sortOpinions,
} from "./state.js";
export type {
  AuditResult,
  AuditState,
  AuditTarget,
  CanonicalState,
  CriterionVerdict,
  Evidence,
  FactOverride,
  JudicialOpinion,
  Severity,
  StateDelta,
  StateInit,
} from "./state.js";

export { executeNode } from "./node-executor.js";
export type { ExecuteNodeOptions, NodeContext, NodeDefinition, NodeOutcome, NodeStatus } from "./node-executor.js";

export { FanOutScheduler } from "./scheduler.js";
export type { SchedulerOptions, StageDefinition, StageResult } from "./scheduler.js";

export { ConditionalRouter, FALLBACK_RULE_ID, edge } from "./router.js";
export type { RouteDecision, RouteRule, RouterDefinition } from "./router.js";

export { CompiledStageGraph, StageGraphBuilder } from "./graph.js";
export type { CompileOptions, GraphRunOptions, GraphRunResult, RunStatus, TerminalDefinition } from "./graph.js";

export {
  DEGRADED_RATIONALE_PREFIX,
  StructuredExtractionAdapter,
  opinionPayloadSchema,
  parseStructuredOutput,
} from "./structured-extraction.js";
export type {
  ExtractRequest,
  ExtractionResult,
  ExtractionSchema,
  OpinionPayload,
  StructuredExtractionAdapterOptions,
} from "./structured-extraction.js";

export { isConfirmedHighSeverity, overallScore, roundHalfUp, synthesize, synthesizeCriterion } from "./synthesis.js";
export type { SynthesisRubric } from "./synthesis.js";

export { ROLE_VARIANTS, roleVariant } from "./roles.js";
export type { RoleVariant } from "./roles.js";

export {
  ChatOpinionGenerator,
  EVIDENCE_CONTENT_LIMIT,
  FetchChatClient,
  ModelRouter,
  PromptRegistry,
  buildOpinionMessages,
  isPromptRegistryDocument,
  readCompletionText,
} from "./generator.js";
export type {
  ChatClient,
  ChatMessage,
  ChatRequest,
  ModelRoute,
  ModelRouteTable,
  OpinionGenerator,
  OpinionRequest,
  PromptMapping,
  PromptRecord,
  PromptRegistryDocument,
  PromptVersionRef,
} from "./generator.js";

export { Semaphore } from "./concurrency.js";

export { RetryPolicy, defaultFailureClassifier, sleep } from "./retry-policy.js";
export type { FailureClass, RetryAttemptState, RetryPolicyOptions } from "./retry-policy.js";

export { stableStringify } from "./stable-stringify.js";

export {
  emitStructuredLog,
  engineTelemetry,
  initOpenTelemetry,
  setLogLevel,
  shutdownOpenTelemetry,
} from "./observability.js";
