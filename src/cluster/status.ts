import type { ContainerState } from "../platform/types.js";

/**
 * Aggregate cluster status. `stopped` and `unhealthy` are derived; any other
 * value is the server's own container state.
 */
export type ClusterStatus = "unhealthy" | "stopped" | Exclude<ContainerState, "exited">;

export function classifyClusterStatus(serverState: ContainerState, workerStates: readonly ContainerState[]): ClusterStatus {
  if (workerStates.some((s) => s !== serverState)) return "unhealthy";
  // clusterbox only ever stops nodes via the engine's stop call, which leaves them exited
  if (serverState === "exited") return "stopped";
  return serverState;
}
