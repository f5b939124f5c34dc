/**
 * `clusterbox delete|stop|start` - act on one cluster or, with --all, every cluster.
 */
import type { ClusterController } from "../cluster/controller.js";
import type { ClusterboxConfig } from "../core/config.js";
import type { ParsedFlags } from "./shared.js";
import { clusterSelector } from "./shared.js";

export type LifecycleVerb = "delete" | "stop" | "start";

export async function lifecycleCommand(
  verb: LifecycleVerb,
  controller: ClusterController,
  config: ClusterboxConfig,
  parsed: ParsedFlags,
): Promise<void> {
  const selector = clusterSelector(parsed, config.defaultClusterName);
  switch (verb) {
    case "delete":
      await controller.delete(selector);
      break;
    case "stop":
      await controller.stop(selector);
      break;
    case "start":
      await controller.start(selector);
      break;
  }
}
