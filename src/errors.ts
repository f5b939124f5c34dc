/**
 * Error taxonomy for cluster operations.
 *
 * Validation errors are raised before any engine call. Engine errors wrap a
 * single failed primitive. Bulk operations collect per-node failures into a
 * PartialFailureError once every target has been attempted.
 */

import {
  EXIT_ENGINE_UNAVAILABLE,
  EXIT_FAILURE,
  EXIT_INVALID,
  EXIT_NOT_FOUND,
  EXIT_PARTIAL_FAILURE,
  EXIT_ROLLBACK_FAILED,
} from "./types.js";

export type ErrorCode =
  | "VALIDATION"
  | "MALFORMED_PORT_SPEC"
  | "INVALID_PORT_BINDING"
  | "CLUSTER_EXISTS"
  | "ENGINE_UNAVAILABLE"
  | "ENGINE"
  | "NOT_FOUND"
  | "READINESS_TIMEOUT"
  | "ABORTED"
  | "PARTIAL_FAILURE"
  | "ROLLBACK_FAILED";

export class ClusterboxError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;

  constructor(code: ErrorCode, message: string, exitCode = EXIT_FAILURE, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClusterboxError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ValidationError extends ClusterboxError {
  constructor(message: string, code: ErrorCode = "VALIDATION") {
    super(code, message, EXIT_INVALID);
    this.name = "ValidationError";
  }
}

export class MalformedPortSpecError extends ValidationError {
  readonly spec: string;

  constructor(spec: string, reason: string) {
    super(`Invalid port mapping [${spec}]: ${reason}`, "MALFORMED_PORT_SPEC");
    this.name = "MalformedPortSpecError";
    this.spec = spec;
  }
}

export class InvalidPortBindingError extends ValidationError {
  readonly spec: string;

  constructor(spec: string, reason: string) {
    super(`Invalid port binding [${spec}]: ${reason}`, "INVALID_PORT_BINDING");
    this.name = "InvalidPortBindingError";
    this.spec = spec;
  }
}

export class ClusterExistsError extends ClusterboxError {
  constructor(name: string) {
    super("CLUSTER_EXISTS", `Cluster ${name} already exists`, EXIT_INVALID);
    this.name = "ClusterExistsError";
  }
}

export class EngineUnavailableError extends ClusterboxError {
  constructor(message: string, cause?: unknown) {
    super("ENGINE_UNAVAILABLE", message, EXIT_ENGINE_UNAVAILABLE, { cause });
    this.name = "EngineUnavailableError";
  }
}

export class EngineError extends ClusterboxError {
  readonly operation: string;
  /** HTTP status returned by the engine API, when there was one. */
  readonly statusCode?: number;

  constructor(operation: string, message: string, cause?: unknown, statusCode?: number) {
    super("ENGINE", `${operation}: ${message}`, EXIT_FAILURE, { cause });
    this.name = "EngineError";
    this.operation = operation;
    this.statusCode = statusCode;
  }
}

export class ClusterNotFoundError extends ClusterboxError {
  constructor(name: string, detail = "does not exist") {
    super("NOT_FOUND", `Cluster ${name} ${detail}`, EXIT_NOT_FOUND);
    this.name = "ClusterNotFoundError";
  }
}

export class ReadinessTimeoutError extends ClusterboxError {
  constructor(name: string, timeoutSeconds: number) {
    super("READINESS_TIMEOUT", `Cluster ${name} was not ready within ${timeoutSeconds}s and has been removed`);
    this.name = "ReadinessTimeoutError";
  }
}

export class OperationAbortedError extends ClusterboxError {
  constructor(name: string) {
    super("ABORTED", `Creating cluster ${name} was cancelled and the cluster has been removed`);
    this.name = "OperationAbortedError";
  }
}

/** Outcome of one node operation inside a bulk command. */
export interface NodeFailure {
  node: string;
  error: Error;
}

/** Per-cluster outcome of delete / stop / start. */
export interface ClusterOutcome {
  cluster: string;
  ok: boolean;
  /** Set when a hard-abort point failed for this cluster (server start / removal). */
  error?: Error;
  nodeFailures: NodeFailure[];
}

export class PartialFailureError extends ClusterboxError {
  readonly outcomes: ClusterOutcome[];

  constructor(operation: string, outcomes: ClusterOutcome[]) {
    const failed = outcomes
      .filter((o) => !o.ok)
      .map((o) => `${o.cluster} (${o.error ? o.error.message : `${o.nodeFailures.length} node(s) failed`})`);
    super("PARTIAL_FAILURE", `${operation} failed for ${failed.length} cluster(s): ${failed.join(", ")}`, EXIT_PARTIAL_FAILURE);
    this.name = "PartialFailureError";
    this.outcomes = outcomes;
  }
}

export class RollbackError extends ClusterboxError {
  readonly cleanupFailures: NodeFailure[];

  constructor(name: string, cause: unknown, cleanupFailures: NodeFailure[]) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const leftovers = cleanupFailures.map((f) => f.node).join(", ");
    super(
      "ROLLBACK_FAILED",
      `Creating cluster ${name} failed (${reason}) and cleanup did not finish; remove these by hand: ${leftovers}`,
      EXIT_ROLLBACK_FAILED,
      { cause },
    );
    this.name = "RollbackError";
    this.cleanupFailures = cleanupFailures;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
