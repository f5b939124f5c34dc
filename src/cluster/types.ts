/**
 * Cluster model, rebuilt from engine labels on every query.
 */

import type { ContainerPort, ContainerState, PullProgress } from "../platform/types.js";
import type { NodeRole } from "./naming.js";
import type { ClusterStatus } from "./status.js";

export interface ClusterNode {
  id: string;
  name: string;
  role: NodeRole;
  /** Undefined for the server. */
  ordinal?: number;
  state: ContainerState;
  ports: ContainerPort[];
  /** Value of the `created` label; display only. */
  created?: string;
}

export interface Cluster {
  name: string;
  image: string;
  status: ClusterStatus;
  /** Host ports actually bound on the server. */
  serverPorts: number[];
  server: ClusterNode;
  workers: ClusterNode[];
  /** False when the worker listing failed; `workers` is then empty, not authoritative. */
  workersKnown: boolean;
}

/** Target of delete / stop / start / list. */
export interface ClusterSelector {
  name?: string;
  all?: boolean;
}

export interface CreateClusterRequest {
  name: string;
  image?: string;
  workers?: number;
  /** Port rules, e.g. `8080:80@workers`. */
  publish?: string[];
  /** Bind mounts in engine notation (`/host:/container[:ro]`). */
  volumes?: string[];
  /** `KEY=VALUE` entries for the server. */
  env?: string[];
  /** Extra arguments appended to the server command. */
  serverArgs?: string[];
  apiPort?: number;
  /** Seconds to wait for readiness; 0 waits forever, undefined doesn't wait. */
  wait?: number;
  /** Base for per-worker host port spreading; 0 disables it. */
  portAutoOffset?: number;
  verbose?: boolean;
  onPullProgress?: (event: PullProgress) => void;
  /** Checked before each node and on every readiness poll; the partly created cluster is rolled back. */
  signal?: AbortSignal;
}

export interface CreateClusterResult {
  name: string;
  networkId: string;
  serverId: string;
  workerIds: string[];
}
