// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * DecisionEngine: the core routing pipeline.
 *
 *   received    task validated (InvalidTaskError stops here)
 *   featurized  feature vector extracted from a fresh snapshot
 *   filtered    hard constraints applied (NoEligibleNodeError → failed)
 *   scored      configured strategy ranks candidates; classifier trouble falls
 *               back to the heuristic and marks the decision degraded
 *   dispatched  winner selected, capacity reserved, rationale attached
 *   completed / failed
 *               outcome reported through the handle; the reservation is
 *               released on every path
 *
 * Events: "transition" (TransitionEvent), "degraded" ({ taskId, reason }),
 * "decision" (RoutingDecision), "outcome" (DecisionRecord).
 */

import EventEmitter from "events";

import { defaultConfig } from "../config/config.js";
import type { FleetRouteConfig } from "../config/config.js";
import type { DispatchHandle, TaskExecutor } from "../dispatch/executor.js";
import { CapacityExceededError, InvalidTaskError, NoEligibleNodeError } from "../exceptions.js";
import { explain } from "../explain/explainer.js";
import { extractFeatures } from "../features/extractor.js";
import { requireCandidates, resolveDemand } from "../filter/filter.js";
import type { DecisionSink } from "../history/store.js";
import { SilentLogger } from "../logging/logger.js";
import type { Logger } from "../logging/logger.js";
import type { NodeRegistry } from "../registry/registry.js";
import { loadClassifierArtifact } from "../scoring/artifact.js";
import { BlendedStrategy } from "../scoring/blended.js";
import { ClassifierStrategy } from "../scoring/classifier.js";
import { HeuristicStrategy } from "../scoring/heuristic.js";
import { selectWinner } from "../scoring/select.js";
import type { ProbabilityPredictor, ScoringResult, ScoringStrategy } from "../scoring/types.js";
import type {
  DecisionRecord,
  DecisionState,
  ExecutionOutcome,
  Reservation,
  RoutingDecision,
  TaskDescriptor,
} from "../types.js";
import { parseTask } from "./task.js";

export interface DecisionEngineOptions {
  registry: NodeRegistry;
  config?: FleetRouteConfig;
  /** Overrides engine.classifierPath. */
  predictor?: ProbabilityPredictor;
  /** Replaces the configured strategy; the heuristic stays as the fallback. */
  strategy?: ScoringStrategy;
  sink?: DecisionSink;
  logger?: Logger;
  clock?: () => Date;
}

export interface TransitionEvent {
  taskId: string;
  from: DecisionState | null;
  to: DecisionState;
  at: string;
  error?: string;
}

export interface ExecutionReport {
  decision: RoutingDecision;
  outcome: ExecutionOutcome;
  finalState: "completed" | "failed";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function failure(error: string): ExecutionOutcome {
  return { success: false, latencyMs: 0, cost: 0, error };
}

export class DecisionEngine extends EventEmitter {
  private readonly registry: NodeRegistry;
  private readonly config: FleetRouteConfig;
  private readonly heuristic: HeuristicStrategy;
  private readonly primary: ScoringStrategy;
  private readonly sink: DecisionSink | undefined;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  /** Set when the configured classifier could not be loaded at all. */
  private readonly startupDegradedReason: string | undefined;

  constructor(options: DecisionEngineOptions) {
    super();
    this.registry = options.registry;
    this.config = options.config ?? defaultConfig;
    this.sink = options.sink;
    this.logger = options.logger ?? new SilentLogger();
    this.clock = options.clock ?? (() => new Date());

    // Throws ConfigurationError on bad weights: a misweighted engine never starts.
    this.heuristic = new HeuristicStrategy({
      weights: this.config.heuristic.weights,
      referenceLatencyMs: this.config.heuristic.referenceLatencyMs,
      taskHoursEstimate: this.config.heuristic.taskHoursEstimate,
    });

    if (options.strategy) {
      this.primary = options.strategy;
      this.startupDegradedReason = undefined;
      return;
    }

    const { strategy } = this.config.engine;
    if (strategy === "heuristic") {
      this.primary = this.heuristic;
      this.startupDegradedReason = undefined;
      return;
    }

    const classifier = this.buildClassifier(options.predictor);
    if (classifier instanceof ClassifierStrategy) {
      this.primary =
        strategy === "blended"
          ? new BlendedStrategy(this.heuristic, classifier, this.config.engine.blendAlpha)
          : classifier;
      this.startupDegradedReason = undefined;
      this.logger.info(`${strategy} scoring enabled (model ${classifier.modelVersion})`);
    } else {
      this.primary = this.heuristic;
      this.startupDegradedReason = classifier;
      this.logger.warn(`degraded mode: ${classifier}; using heuristic scoring only`);
    }
  }

  /** Strategy actually used for new decisions. */
  get strategyName(): ScoringStrategy["name"] {
    return this.primary.name;
  }

  /** True when the configured classifier is unavailable. */
  get degraded(): boolean {
    return this.startupDegradedReason !== undefined;
  }

  /**
   * Route one task: validate, featurize, filter, score, select, explain and
   * reserve. The returned handle must be completed or cancelled to release the
   * reservation.
   */
  decide(input: unknown): DispatchHandle {
    const trace: string[] = [];
    const timestamp = this.clock().toISOString();
    trace.push(`[${timestamp}] ─── NEW ROUTING REQUEST ───`);

    let task: TaskDescriptor;
    try {
      task = parseTask(input);
    } catch (err) {
      if (err instanceof InvalidTaskError) {
        this.transition(taskIdOf(input), "received", "failed", err.message);
        trace.push(`rejected: ${err.message}`);
        this.logger.trace(trace);
      }
      throw err;
    }
    this.transition(task.id, null, "received");
    let state: DecisionState = "received";
    const advance = (to: DecisionState): void => {
      this.transition(task.id, state, to);
      state = to;
    };
    trace.push(
      `task: id=${task.id} type=${task.taskType} priority=${task.priority} gpu=${task.requiresGpu}` +
        (task.maxLatencyMs !== undefined ? ` maxLatency=${task.maxLatencyMs}ms` : ""),
    );

    try {
      // ── featurized ────────────────────────────────────────────────────────
      const snapshot = this.registry.snapshot();
      const features = extractFeatures(task, snapshot);
      advance("featurized");
      trace.push(`step 1: snapshot v${snapshot.version}, features ${features.schema.version} [${features.values.join(", ")}]`);

      // ── filtered ──────────────────────────────────────────────────────────
      const demand = resolveDemand(task, this.config.engine.defaultReservation);
      const { candidates, rejected } = requireCandidates(task, snapshot, demand);
      advance("filtered");
      trace.push(
        `step 2: ${candidates.length}/${snapshot.nodes.length} candidates [${candidates.map((n) => n.id).join(", ")}]`,
      );

      // ── scored ────────────────────────────────────────────────────────────
      const context = { task, features, snapshot };
      let scoring: ScoringResult;
      let degradedReason = this.startupDegradedReason;
      try {
        scoring = this.primary.score(candidates, context);
      } catch (err) {
        if (this.primary === this.heuristic) throw err;
        degradedReason = `${this.primary.name} scoring failed: ${errorMessage(err)}`;
        this.logger.warn(`degraded mode for task ${task.id}: ${degradedReason}; falling back to heuristic`);
        this.emit("degraded", { taskId: task.id, reason: degradedReason });
        scoring = this.heuristic.score(candidates, context);
      }
      advance("scored");
      trace.push(
        `step 3: ${scoring.strategy} scores ` +
          [...scoring.scores].map(([id, s]) => `${id}=${s.toFixed(3)}`).join(", "),
      );

      // ── dispatched ────────────────────────────────────────────────────────
      const selection = selectWinner(candidates, scoring.scores, this.config.engine.tieEpsilon);
      if (!selection) {
        throw new NoEligibleNodeError(task.id, rejected);
      }
      const explanation = explain({
        task,
        selection,
        scoring,
        features,
        rejected,
        tieEpsilon: this.config.engine.tieEpsilon,
      });

      const reservation = this.registry.reserve(selection.winner.id, demand);
      trace.push(
        `step 4: selected ${selection.winner.id} (${explanation.decisiveDimension}); ` +
          `reserved cpu=${demand.cpuCores} ram=${demand.ramGb}`,
      );

      const decision: RoutingDecision = Object.freeze({
        taskId: task.id,
        nodeId: selection.winner.id,
        category: selection.winner.category,
        confidence: Math.max(0, Math.min(1, selection.score)),
        scores: new Map(scoring.scores),
        strategy: scoring.strategy,
        degraded: degradedReason !== undefined,
        ...(degradedReason !== undefined ? { degradedReason } : {}),
        decisiveDimension: explanation.decisiveDimension,
        rationale: explanation.rationale,
        rejected: Object.freeze([...rejected]),
        snapshotVersion: snapshot.version,
        timestamp,
      });

      advance("dispatched");
      this.emit("decision", decision);
      this.logger.debug(decision.rationale);
      return new DispatchTicket(this, task, decision, reservation, trace);
    } catch (err) {
      if (err instanceof NoEligibleNodeError || err instanceof CapacityExceededError) {
        this.logger.warn(`task ${task.id} not routed: ${err.message}`);
      } else {
        this.logger.error(`task ${task.id} failed during routing: ${errorMessage(err)}`);
      }
      this.transition(task.id, state, "failed", errorMessage(err));
      trace.push(`result: failed (${errorMessage(err)})`);
      this.logger.trace(trace);
      throw err;
    }
  }

  /**
   * decide() → executor → complete(). The reservation is released whatever the
   * executor does; an executor error becomes a failed outcome.
   */
  async execute(input: unknown, executor: TaskExecutor): Promise<ExecutionReport> {
    const handle = this.decide(input);
    let outcome: ExecutionOutcome = failure("execution aborted");
    try {
      outcome = await executor.execute(handle);
    } catch (err) {
      this.logger.error(`executor failed for task ${handle.task.id} on ${handle.decision.nodeId}: ${errorMessage(err)}`);
      outcome = failure(errorMessage(err));
    } finally {
      handle.complete(outcome);
    }
    return {
      decision: handle.decision,
      outcome,
      finalState: outcome.success ? "completed" : "failed",
    };
  }

  /** @internal called by DispatchTicket */
  settle(
    task: TaskDescriptor,
    decision: RoutingDecision,
    reservation: Reservation,
    outcome: ExecutionOutcome,
    trace: string[],
  ): void {
    const finalState = outcome.success ? "completed" : "failed";
    try {
      this.registry.release(reservation.nodeId, reservation.delta);
    } finally {
      this.transition(task.id, "dispatched", finalState, outcome.error);
      trace.push(
        `result: ${finalState} on ${decision.nodeId} | latency=${outcome.latencyMs}ms | cost=${outcome.cost.toFixed(4)}` +
          (outcome.error ? ` | error=${outcome.error}` : ""),
      );
      this.logger.trace(trace);

      const record: DecisionRecord = Object.freeze({ task, decision, outcome: { ...outcome }, finalState });
      this.emit("outcome", record);
      this.persist(record);
    }
  }

  private persist(record: DecisionRecord): void {
    if (!this.sink) return;
    const warn = (err: unknown) =>
      this.logger.warn(`failed to persist decision for task ${record.task.id}: ${errorMessage(err)}`);
    try {
      const pending = this.sink.record(record);
      if (pending) {
        pending.catch(warn);
      }
    } catch (err) {
      warn(err);
    }
  }

  /** Returns a ClassifierStrategy, or the reason one could not be built. */
  private buildClassifier(predictor: ProbabilityPredictor | undefined): ClassifierStrategy | string {
    let model = predictor;
    if (!model) {
      const loaded = loadClassifierArtifact(this.config.engine.classifierPath);
      if (!loaded.ok) return loaded.reason;
      model = loaded.predictor;
    }
    try {
      return new ClassifierStrategy(model);
    } catch (err) {
      return errorMessage(err);
    }
  }

  private transition(taskId: string, from: DecisionState | null, to: DecisionState, error?: string): void {
    const event: TransitionEvent = {
      taskId,
      from,
      to,
      at: this.clock().toISOString(),
      ...(error !== undefined ? { error } : {}),
    };
    this.emit("transition", event);
  }
}

function taskIdOf(input: unknown): string {
  if (input !== null && typeof input === "object" && "id" in input && typeof input.id === "string") {
    return input.id;
  }
  return "<invalid>";
}

class DispatchTicket implements DispatchHandle {
  private done = false;

  constructor(
    private readonly engine: DecisionEngine,
    readonly task: TaskDescriptor,
    readonly decision: RoutingDecision,
    readonly reservation: Reservation,
    private readonly trace: string[],
  ) {}

  get settled(): boolean {
    return this.done;
  }

  complete(outcome: ExecutionOutcome): void {
    if (this.done) return;
    this.done = true;
    this.engine.settle(this.task, this.decision, this.reservation, outcome, this.trace);
  }

  cancel(reason = "cancelled by caller"): void {
    this.complete(failure(reason));
  }
}
