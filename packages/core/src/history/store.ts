// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * SqliteDecisionStore: decision history for auditing and the CLI.
 * One row per terminal decision: what was routed where, why, and how it went.
 *
 * Only task metadata is stored; task payloads are NEVER persisted.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";

import type { DecisionRecord } from "../types.js";

/** Persistence boundary. The engine treats failures here as warnings. */
export interface DecisionSink {
  record(record: DecisionRecord): void | Promise<void>;
}

export interface HistoryEntry {
  taskId: string;
  taskType: string;
  priority: number;
  nodeId: string;
  category: string;
  confidence: number;
  strategy: string;
  degraded: boolean;
  decisiveDimension: string;
  status: "completed" | "failed";
  latencyMs: number;
  cost: number;
  error: string | null;
  rationale: string;
  decidedAt: string;
}

export interface NodeStatistics {
  nodeId: string;
  taskCount: number;
  avgLatencyMs: number;
  totalCost: number;
}

export interface HistoryStatistics {
  nodes: NodeStatistics[];
  overall: {
    totalTasks: number;
    successfulTasks: number;
    successRate: number;
    degradedDecisions: number;
  };
}

const DEFAULT_DB_PATH = join(homedir(), ".fleetroute", "history.db");

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS decision_history (
    id                 INTEGER PRIMARY KEY AUTOINCREMENT,
    ts                 TEXT    NOT NULL DEFAULT (datetime('now')),
    task_id            TEXT    NOT NULL,
    task_type          TEXT    NOT NULL,
    priority           INTEGER NOT NULL,
    node_id            TEXT    NOT NULL,
    category           TEXT    NOT NULL,
    confidence         REAL    NOT NULL,
    strategy           TEXT    NOT NULL,
    degraded           INTEGER NOT NULL DEFAULT 0,
    decisive_dimension TEXT    NOT NULL,
    status             TEXT    NOT NULL,
    latency_ms         REAL    NOT NULL DEFAULT 0.0,
    cost               REAL    NOT NULL DEFAULT 0.0,
    error              TEXT,
    rationale          TEXT    NOT NULL,
    decided_at         TEXT    NOT NULL
  )
`;

interface HistoryRow {
  task_id: string;
  task_type: string;
  priority: number;
  node_id: string;
  category: string;
  confidence: number;
  strategy: string;
  degraded: number;
  decisive_dimension: string;
  status: "completed" | "failed";
  latency_ms: number;
  cost: number;
  error: string | null;
  rationale: string;
  decided_at: string;
}

export class SqliteDecisionStore implements DecisionSink {
  private db: Database.Database;

  constructor(dbPath: string = DEFAULT_DB_PATH) {
    if (dbPath !== ":memory:") {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
    this.db = new Database(dbPath);
    this.db.exec(CREATE_TABLE_SQL);
  }

  record(record: DecisionRecord): void {
    const { task, decision, outcome, finalState } = record;
    this.db
      .prepare(
        `INSERT INTO decision_history
           (task_id, task_type, priority, node_id, category, confidence, strategy,
            degraded, decisive_dimension, status, latency_ms, cost, error, rationale, decided_at)
         VALUES
           (@taskId, @taskType, @priority, @nodeId, @category, @confidence, @strategy,
            @degraded, @decisiveDimension, @status, @latencyMs, @cost, @error, @rationale, @decidedAt)`,
      )
      .run({
        taskId: task.id,
        taskType: task.taskType,
        priority: task.priority,
        nodeId: decision.nodeId,
        category: decision.category,
        confidence: decision.confidence,
        strategy: decision.strategy,
        degraded: decision.degraded ? 1 : 0,
        decisiveDimension: decision.decisiveDimension,
        status: finalState,
        latencyMs: outcome.latencyMs,
        cost: outcome.cost,
        error: outcome.error ?? null,
        rationale: decision.rationale,
        decidedAt: decision.timestamp,
      });
  }

  /** Newest first. */
  history(options: { limit?: number; nodeId?: string } = {}): HistoryEntry[] {
    const limit = options.limit ?? 100;
    const rows = (
      options.nodeId
        ? this.db
            .prepare(`SELECT * FROM decision_history WHERE node_id = ? ORDER BY id DESC LIMIT ?`)
            .all(options.nodeId, limit)
        : this.db.prepare(`SELECT * FROM decision_history ORDER BY id DESC LIMIT ?`).all(limit)
    ) as HistoryRow[];

    return rows.map((r) => ({
      taskId: r.task_id,
      taskType: r.task_type,
      priority: r.priority,
      nodeId: r.node_id,
      category: r.category,
      confidence: r.confidence,
      strategy: r.strategy,
      degraded: r.degraded === 1,
      decisiveDimension: r.decisive_dimension,
      status: r.status,
      latencyMs: r.latency_ms,
      cost: r.cost,
      error: r.error,
      rationale: r.rationale,
      decidedAt: r.decided_at,
    }));
  }

  statistics(): HistoryStatistics {
    const nodeRows = this.db
      .prepare(
        `SELECT
           node_id                      AS node_id,
           COUNT(*)                     AS task_count,
           COALESCE(AVG(latency_ms), 0) AS avg_latency,
           COALESCE(SUM(cost), 0.0)     AS total_cost
         FROM decision_history
         GROUP BY node_id
         ORDER BY node_id`,
      )
      .all() as Array<{ node_id: string; task_count: number; avg_latency: number; total_cost: number }>;

    const overall = this.db
      .prepare(
        `SELECT
           COUNT(*)                                                  AS total,
           COALESCE(SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END), 0) AS successful,
           COALESCE(SUM(degraded), 0)                                AS degraded
         FROM decision_history`,
      )
      .get() as { total: number; successful: number; degraded: number };

    return {
      nodes: nodeRows.map((r) => ({
        nodeId: r.node_id,
        taskCount: r.task_count,
        avgLatencyMs: Math.round(r.avg_latency * 1000) / 1000,
        totalCost: Math.round(r.total_cost * 10_000) / 10_000,
      })),
      overall: {
        totalTasks: overall.total,
        successfulTasks: overall.successful,
        successRate: overall.total > 0 ? Math.round((overall.successful / overall.total) * 1000) / 1000 : 0,
        degradedDecisions: overall.degraded,
      },
    };
  }

  close(): void {
    this.db.close();
  }
}
