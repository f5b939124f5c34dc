/**
 * Rebuilds the cluster model from the labels clusterbox stamps on containers
 * and networks. Nothing is cached: every call re-reads the engine.
 */

import type { ClusterboxConfig } from "../core/config.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ContainerEngine, ContainerSummary, NetworkSummary } from "../platform/types.js";
import { LABEL_APP, LABEL_CLUSTER, LABEL_COMPONENT, LABEL_CREATED } from "../platform/types.js";
import type { NodeRole } from "./naming.js";
import { parseWorkerOrdinal } from "./naming.js";
import { classifyClusterStatus } from "./status.js";
import type { Cluster, ClusterNode, ClusterSelector } from "./types.js";

export interface ClusterLeftovers {
  containers: ContainerSummary[];
  networks: NetworkSummary[];
}

function toNode(container: ContainerSummary, role: NodeRole): ClusterNode {
  return {
    id: container.id,
    name: container.name,
    role,
    ordinal: role === "worker" ? parseWorkerOrdinal(container.name) : undefined,
    state: container.state,
    ports: container.ports,
    created: container.labels[LABEL_CREATED],
  };
}

function byOrdinal(a: ClusterNode, b: ClusterNode): number {
  return (a.ordinal ?? Number.MAX_SAFE_INTEGER) - (b.ordinal ?? Number.MAX_SAFE_INTEGER);
}

export class ClusterStateReader {
  constructor(
    private readonly engine: ContainerEngine,
    private readonly config: ClusterboxConfig,
  ) {}

  /** Labels shared by everything one cluster owns. */
  clusterLabels(name: string): Record<string, string> {
    return { [LABEL_APP]: this.config.identityLabel, [LABEL_CLUSTER]: name };
  }

  /**
   * With `all`, every cluster on the engine. Otherwise at most the one named
   * cluster; the map is empty when it doesn't exist.
   */
  async list(selector: ClusterSelector): Promise<Map<string, Cluster>> {
    const clusters = new Map<string, Cluster>();
    if (!selector.all && !selector.name) return clusters;

    const serverLabels: Record<string, string> = {
      [LABEL_APP]: this.config.identityLabel,
      [LABEL_COMPONENT]: "server",
    };
    if (!selector.all && selector.name) serverLabels[LABEL_CLUSTER] = selector.name;

    const servers = await this.engine.listContainers(serverLabels, { all: true });

    for (const server of servers) {
      const name = server.labels[LABEL_CLUSTER];
      if (!name) continue;
      if (!selector.all && name !== selector.name) continue;

      let workers: ClusterNode[] = [];
      let workersKnown = true;
      try {
        const found = await this.engine.listContainers(
          { ...this.clusterLabels(name), [LABEL_COMPONENT]: "worker" },
          { all: true },
        );
        workers = found.map((w) => toNode(w, "worker")).sort(byOrdinal);
      } catch (err: unknown) {
        workersKnown = false;
        logger.warn(`Couldn't get worker containers for cluster ${name}: ${errorMessage(err)}`);
      }

      const serverNode = toNode(server, "server");
      clusters.set(name, {
        name,
        image: server.image,
        status: workersKnown
          ? classifyClusterStatus(
              serverNode.state,
              workers.map((w) => w.state),
            )
          : "unknown",
        serverPorts: server.ports.flatMap((p) => (p.publicPort ? [p.publicPort] : [])),
        server: serverNode,
        workers,
        workersKnown,
      });
    }

    return clusters;
  }

  async get(name: string): Promise<Cluster | undefined> {
    const clusters = await this.list({ name });
    return clusters.get(name);
  }

  /** Everything labelled with the cluster name, whatever its component. */
  async findLeftovers(name: string): Promise<ClusterLeftovers> {
    const labels = this.clusterLabels(name);
    const [containers, networks] = await Promise.all([
      this.engine.listContainers(labels, { all: true }),
      this.engine.listNetworks(labels),
    ]);
    return { containers, networks };
  }
}
