// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * FleetRoute public API.
 * Import from this module when embedding the routing engine.
 */

export { VERSION } from "./version.js";
export * from "./types.js";
export {
  FleetRouteError,
  InvalidTaskError,
  NoEligibleNodeError,
  SchemaMismatchError,
  CapacityExceededError,
  UnknownNodeError,
  DuplicateNodeError,
  InvalidNodeDataError,
  NodeInUseError,
  ClassifierUnavailableError,
  ConfigurationError,
} from "./exceptions.js";
export { loadConfig, parseConfig, defaultConfig } from "./config/config.js";
export type { FleetRouteConfig, NodeConfig, HeuristicWeights, LogLevel } from "./config/config.js";
export { ConsoleLogger, SilentLogger } from "./logging/logger.js";
export type { Logger, LoggerOptions } from "./logging/logger.js";

export { NodeRegistry } from "./registry/registry.js";
export type { NodeRegistryOptions } from "./registry/registry.js";
export { headroom, availableCpuCores, availableRamGb } from "./registry/capacity.js";
export { registryFromConfig, toRegistration } from "./registry/fleet.js";

export {
  FEATURE_SCHEMA,
  extractFeatures,
  latencyRequirement,
  categoryLoad,
  assertSchemaCompatible,
  describeFeatures,
} from "./features/extractor.js";
export type { FeatureSchema, FeatureVector } from "./features/extractor.js";
export { filterNodes, requireCandidates, checkNode, resolveDemand } from "./filter/filter.js";
export type { FilterResult } from "./filter/filter.js";

export { HeuristicStrategy, DEFAULT_WEIGHTS, assertWeights, effectiveCost, categoryAffinity } from "./scoring/heuristic.js";
export type { Weights, HeuristicOptions } from "./scoring/heuristic.js";
export { ClassifierStrategy } from "./scoring/classifier.js";
export { BlendedStrategy } from "./scoring/blended.js";
export { LinearSoftmaxModel } from "./scoring/model.js";
export { loadClassifierArtifact, parseClassifierArtifact } from "./scoring/artifact.js";
export type { ArtifactLoadResult, ClassifierArtifact } from "./scoring/artifact.js";
export { selectWinner, DEFAULT_TIE_EPSILON } from "./scoring/select.js";
export type { Selection } from "./scoring/select.js";
export type { ScoringStrategy, ScoringResult, ScoringContext, ProbabilityPredictor } from "./scoring/types.js";
export { explain } from "./explain/explainer.js";
export type { Explanation, ExplainInput } from "./explain/explainer.js";

export { DecisionEngine } from "./engine/engine.js";
export type { DecisionEngineOptions, TransitionEvent, ExecutionReport } from "./engine/engine.js";
export { parseTask } from "./engine/task.js";
export type { TaskInput } from "./engine/task.js";
export { SimulatedExecutor, EXECUTION_PROFILES } from "./dispatch/executor.js";
export type { DispatchHandle, TaskExecutor, SimulatedExecutorOptions } from "./dispatch/executor.js";
export { SqliteDecisionStore } from "./history/store.js";
export type { DecisionSink, HistoryEntry, HistoryStatistics, NodeStatistics } from "./history/store.js";
export { TelemetrySimulator } from "./simulator/telemetry.js";
export type { TelemetrySimulatorOptions } from "./simulator/telemetry.js";
export { createRng, randomInt } from "./simulator/random.js";
export type { Rng } from "./simulator/random.js";
export { randomTask, TASK_PROFILES } from "./simulator/workload.js";
export type { TaskProfile } from "./simulator/workload.js";
