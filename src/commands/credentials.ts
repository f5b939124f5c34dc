/**
 * `clusterbox get-credentials` - print the path of the cluster's kubeconfig.
 */
import type { ClusterController } from "../cluster/controller.js";
import type { ClusterboxConfig } from "../core/config.js";
import type { ParsedFlags } from "./shared.js";
import { stringFlag } from "./shared.js";

export async function credentialsCommand(
  controller: ClusterController,
  config: ClusterboxConfig,
  parsed: ParsedFlags,
): Promise<void> {
  const name = stringFlag(parsed, "name") ?? parsed.positional[0] ?? config.defaultClusterName;
  const path = await controller.getCredentials(name);
  process.stdout.write(`${path}\n`);
}
