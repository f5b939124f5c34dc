/**
 * Node naming. Names become container names, hostnames and network aliases,
 * so they obey the same host-name rules as cluster names.
 */

import { ValidationError } from "../errors.js";

export type NodeRole = "server" | "worker";

/** Cluster names stay short enough that every derived node name fits in a 63-char host label. */
export const CLUSTER_NAME_MAX_LENGTH = 35;

const VALID_CLUSTER_NAME = /^[A-Za-z0-9-]+$/;

export function validateClusterName(name: string): void {
  if (name.length === 0) {
    throw new ValidationError("Cluster name must not be empty");
  }
  if (name.length > CLUSTER_NAME_MAX_LENGTH) {
    throw new ValidationError(`Cluster name "${name}" is too long (max ${CLUSTER_NAME_MAX_LENGTH} characters)`);
  }
  if (name.startsWith("-") || name.endsWith("-")) {
    throw new ValidationError(`Cluster name "${name}" must not start or end with a dash`);
  }
  if (!VALID_CLUSTER_NAME.test(name)) {
    throw new ValidationError(`Cluster name "${name}" may only contain letters, digits and dashes`);
  }
}

export function nodeName(prefix: string, role: NodeRole, clusterName: string, ordinal?: number): string {
  if (role === "server") {
    return `${prefix}-${clusterName}-server`;
  }
  if (ordinal === undefined || !Number.isInteger(ordinal) || ordinal < 0) {
    throw new ValidationError(`Worker ordinal must be a non-negative integer, got ${String(ordinal)}`);
  }
  return `${prefix}-${clusterName}-worker-${ordinal}`;
}

/** Server first, then workers in ordinal order. */
export function allNodeNames(prefix: string, clusterName: string, workerCount: number): string[] {
  const names = [nodeName(prefix, "server", clusterName)];
  for (let i = 0; i < workerCount; i++) {
    names.push(nodeName(prefix, "worker", clusterName, i));
  }
  return names;
}

/** Recover a worker's ordinal from its container name, or undefined if it isn't one. */
export function parseWorkerOrdinal(containerName: string): number | undefined {
  const match = /-worker-(\d+)$/.exec(containerName);
  return match ? Number(match[1]) : undefined;
}
