// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for FleetRoute. */

import type { NodeRejection } from "./types.js";

export class FleetRouteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FleetRouteError";
  }
}

export class InvalidTaskError extends FleetRouteError {
  constructor(public readonly issues: string[]) {
    super(`Invalid task: ${issues.join("; ")}`);
    this.name = "InvalidTaskError";
  }
}

export class NoEligibleNodeError extends FleetRouteError {
  constructor(
    public readonly taskId: string,
    public readonly rejections: NodeRejection[],
  ) {
    super(
      rejections.length === 0
        ? `No eligible node for task '${taskId}': registry is empty`
        : `No eligible node for task '${taskId}': ` +
            rejections
              .map((r) => `${r.nodeId} (${r.reasons.map((reason) => reason.detail).join(", ")})`)
              .join("; "),
    );
    this.name = "NoEligibleNodeError";
  }
}

export class SchemaMismatchError extends FleetRouteError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Feature schema mismatch: extractor provides ${expected}, classifier expects ${actual}`);
    this.name = "SchemaMismatchError";
  }
}

export class CapacityExceededError extends FleetRouteError {
  constructor(
    public readonly nodeId: string,
    public readonly resource: "cpu" | "ram",
    public readonly requestedPercent: number,
    public readonly availablePercent: number,
  ) {
    super(
      `Reservation on '${nodeId}' exceeds ${resource} capacity: ` +
        `requested ${requestedPercent.toFixed(1)}%, available ${availablePercent.toFixed(1)}%`,
    );
    this.name = "CapacityExceededError";
  }
}

export class UnknownNodeError extends FleetRouteError {
  constructor(public readonly nodeId: string) {
    super(`Unknown node '${nodeId}'`);
    this.name = "UnknownNodeError";
  }
}

export class InvalidNodeDataError extends FleetRouteError {
  constructor(
    public readonly nodeId: string,
    public readonly issues: string[],
  ) {
    super(`Invalid data for node '${nodeId}': ${issues.join("; ")}`);
    this.name = "InvalidNodeDataError";
  }
}

export class NodeInUseError extends FleetRouteError {
  constructor(
    public readonly nodeId: string,
    public readonly reservations: number,
  ) {
    super(`Node '${nodeId}' has ${reservations} outstanding reservation(s)`);
    this.name = "NodeInUseError";
  }
}

export class DuplicateNodeError extends FleetRouteError {
  constructor(public readonly nodeId: string) {
    super(`Node '${nodeId}' is already registered`);
    this.name = "DuplicateNodeError";
  }
}

export class ClassifierUnavailableError extends FleetRouteError {
  constructor(reason: string) {
    super(`Classifier unavailable: ${reason}`);
    this.name = "ClassifierUnavailableError";
  }
}

export class ConfigurationError extends FleetRouteError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
