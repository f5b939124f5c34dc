/**
 * `clusterbox create` - create a cluster.
 */
import type { ClusterController } from "../cluster/controller.js";
import type { CreateClusterRequest } from "../cluster/types.js";
import type { ClusterboxConfig } from "../core/config.js";
import { ValidationError } from "../errors.js";
import { logger } from "../logger.js";
import type { PullProgress } from "../platform/types.js";
import type { ParsedFlags } from "./shared.js";
import { intFlag, stringFlag } from "./shared.js";

/** Translate parsed CLI flags into a create request. */
export function buildCreateRequest(parsed: ParsedFlags, config: ClusterboxConfig): CreateClusterRequest {
  if (parsed.flags.timeout !== undefined && parsed.flags.wait === undefined) {
    throw new ValidationError("Cannot use --timeout without --wait");
  }

  let wait: number | undefined;
  if (parsed.flags.wait !== undefined) {
    wait = parsed.flags.wait === true ? (intFlag(parsed, "timeout") ?? 0) : intFlag(parsed, "wait");
  }

  const verbose = parsed.flags.verbose === true;
  return {
    name: stringFlag(parsed, "name") ?? parsed.positional[0] ?? config.defaultClusterName,
    image: stringFlag(parsed, "image"),
    workers: intFlag(parsed, "workers"),
    publish: parsed.lists.publish ?? [],
    volumes: (parsed.lists.volume ?? []).flatMap((v) => v.split(",")).filter((v) => v !== ""),
    env: parsed.lists.env ?? [],
    serverArgs: parsed.lists["server-arg"] ?? [],
    apiPort: intFlag(parsed, "api-port"),
    wait,
    portAutoOffset: intFlag(parsed, "port-auto-offset"),
    verbose,
    onPullProgress: verbose ? printPullProgress : undefined,
  };
}

function printPullProgress(event: PullProgress): void {
  const parts = [event.id, event.status, event.progress].filter((p) => p);
  process.stderr.write(`${parts.join(" ")}\n`);
}

export async function createCommand(
  controller: ClusterController,
  config: ClusterboxConfig,
  parsed: ParsedFlags,
): Promise<void> {
  const request = buildCreateRequest(parsed, config);

  // Ctrl-C rolls the cluster back at the next step instead of leaving it half-built
  const ac = new AbortController();
  const onSignal = () => ac.abort();
  process.once("SIGINT", onSignal);
  try {
    await controller.create({ ...request, signal: ac.signal });
  } finally {
    process.off("SIGINT", onSignal);
  }

  logger.info(`You can now use the cluster with:
  export KUBECONFIG="$(clusterbox get-credentials --name='${request.name}')"
  kubectl cluster-info`);
}
