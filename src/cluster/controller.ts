/**
 * ClusterController: create / delete / start / stop / list / credentials for
 * multi-node clusters, one engine container per node.
 *
 * The engine is the only source of truth: every command re-reads cluster
 * state through ClusterStateReader and acts on it node by node.
 */

import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { z } from "zod";
import type { ClusterboxConfig } from "../core/config.js";
import type { ClusterOutcome, NodeFailure } from "../errors.js";
import {
  ClusterExistsError,
  ClusterNotFoundError,
  errorMessage,
  OperationAbortedError,
  PartialFailureError,
  ReadinessTimeoutError,
  RollbackError,
  ValidationError,
} from "../errors.js";
import { logger } from "../logger.js";
import type { ContainerEngine, ContainerSpec } from "../platform/types.js";
import { LABEL_APP, LABEL_CLUSTER, LABEL_COMPONENT, LABEL_CREATED } from "../platform/types.js";
import { clusterDir, credentialsPath, ensureClusterDir, removeClusterDir } from "./cluster-dir.js";
import { extractArchivedFile } from "./credentials.js";
import type { NodeRole } from "./naming.js";
import { allNodeNames, nodeName, parseWorkerOrdinal, validateClusterName } from "./naming.js";
import type { PublishedPorts } from "./ports.js";
import { compilePortSpecs, createPublishedPorts, mergePortSpecs } from "./ports.js";
import { generateSecret } from "./secrets.js";
import type { ClusterLeftovers } from "./state-reader.js";
import { ClusterStateReader } from "./state-reader.js";
import type { Cluster, ClusterNode, ClusterSelector, CreateClusterRequest, CreateClusterResult } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const createRequestSchema = z.object({
  name: z.string(),
  image: z.string().min(1).optional(),
  workers: z.number().int().min(0).max(99).default(0),
  publish: z.array(z.string()).default([]),
  volumes: z.array(z.string().min(1)).default([]),
  env: z.array(z.string().regex(/^[^=\s]+=/, "Must be KEY=VALUE")).default([]),
  serverArgs: z.array(z.string()).default([]),
  apiPort: z.number().int().min(1).max(65535).optional(),
  wait: z.number().min(0).optional(),
  portAutoOffset: z.number().int().min(0).default(0),
  verbose: z.boolean().default(false),
});

type ParsedCreateRequest = z.infer<typeof createRequestSchema>;

/**
 * Prefix the default registry onto short image references
 * (`rancher/k3s:v1` -> `docker.io/rancher/k3s:v1`). References that already
 * start with a registry host are left alone.
 */
export function normalizeImage(image: string, defaultRegistry: string): string {
  const segments = image.split("/");
  const first = segments[0];
  const hasRegistry = segments.length > 1 && (first.includes(".") || first.includes(":") || first === "localhost");
  if (hasRegistry || segments.length > 2) return image;
  return `${defaultRegistry}/${image}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface ControllerOptions {
  /** Injectable clock for the readiness wait. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

type NodeRef = Pick<ClusterNode, "id" | "name">;

interface NodePlan {
  role: NodeRole;
  name: string;
  ports: PublishedPorts;
}

// ---------------------------------------------------------------------------
// ClusterController
// ---------------------------------------------------------------------------

export class ClusterController {
  readonly reader: ClusterStateReader;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly engine: ContainerEngine,
    private readonly config: ClusterboxConfig,
    options: ControllerOptions = {},
  ) {
    this.reader = new ClusterStateReader(engine, config);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  // ------- check-engine -------
  async checkEngine(): Promise<string> {
    logger.info("Checking container engine...");
    const version = await this.engine.ping();
    logger.info(`SUCCESS: container engine is reachable (API v${version})`);
    return version;
  }

  // ------- list -------
  async list(selector: ClusterSelector = { all: true }): Promise<Cluster[]> {
    const clusters = await this.reader.list(selector);
    return [...clusters.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  // ------- create -------
  async create(request: CreateClusterRequest): Promise<CreateClusterResult> {
    const parsed = createRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`).join("; ");
      throw new ValidationError(`Invalid create request: ${issues}`);
    }
    const req = parsed.data;
    const name = req.name;
    validateClusterName(name);

    const image = normalizeImage(req.image ?? this.config.defaultImage, this.config.defaultRegistry);
    const apiPort = req.apiPort ?? this.config.apiPort;
    const plans = this.planNodes(req, apiPort);

    if (await this.reader.get(name)) {
      throw new ClusterExistsError(name);
    }

    logger.info(`Creating cluster [${name}]`);
    const networkId = await this.engine.createNetwork(name, this.reader.clusterLabels(name));
    logger.info(`Created cluster network with ID ${networkId}`);

    const secretEnv: string[] = [];
    if (req.workers > 0) {
      secretEnv.push(`K3S_CLUSTER_SECRET=${generateSecret(20)}`, `K3S_TOKEN=${generateSecret(20)}`);
    }

    const [serverPlan, ...workerPlans] = plans;
    const signal = request.signal;
    let serverId: string;
    try {
      await this.pull(image, req.verbose, request.onPullProgress);
      throwIfAborted(name, signal);
      serverId = await this.runNode(serverPlan, name, image, {
        command: ["server", "--https-listen-port", String(apiPort), ...req.serverArgs],
        env: [`K3S_KUBECONFIG_OUTPUT=${this.config.credentialsContainerPath}`, ...req.env, ...secretEnv],
        binds: req.volumes,
      });
      logger.info(`Created server with ID ${serverId}`);

      if (req.wait !== undefined) {
        await this.waitForReadiness(name, serverId, req.wait, signal);
      }
    } catch (err: unknown) {
      return this.rollback(name, err);
    }

    const workerIds: string[] = [];
    if (workerPlans.length > 0) {
      logger.info(`Booting ${workerPlans.length} workers for cluster ${name}`);
    }
    for (const plan of workerPlans) {
      try {
        throwIfAborted(name, signal);
        const id = await this.runNode(plan, name, image, {
          command: ["agent"],
          env: [...secretEnv, `K3S_URL=https://${serverPlan.name}:${apiPort}`],
          binds: req.volumes,
          tmpfs: { "/run": "", "/var/run": "" },
        });
        workerIds.push(id);
        logger.info(`Created worker ${plan.name} with ID ${id}`);
      } catch (err: unknown) {
        logger.error(`Failed to create worker ${plan.name} for cluster ${name}: ${errorMessage(err)}`);
        return this.rollback(name, err);
      }
    }

    try {
      await ensureClusterDir(this.config, name);
    } catch (err: unknown) {
      return this.rollback(name, err);
    }

    logger.info(`SUCCESS: created cluster [${name}]`);
    return { name, networkId, serverId, workerIds };
  }

  /** Names and port bindings for every node; throws before anything touches the engine. */
  private planNodes(req: ParsedCreateRequest, apiPort: number): NodePlan[] {
    const prefix = this.config.containerPrefix;
    const names = allNodeNames(prefix, req.name, req.workers);
    const bySelector = compilePortSpecs(req.publish, names, this.config.portSelectorDefault);

    const serverName = nodeName(prefix, "server", req.name);
    let serverPorts = createPublishedPorts(mergePortSpecs(bySelector, "server", serverName));
    // a user rule for the API port replaces the default binding
    if (!serverPorts.exposedPorts.has(`${apiPort}/tcp`)) {
      serverPorts = serverPorts.addPort(`0.0.0.0:${apiPort}:${apiPort}/tcp`);
    }

    const plans: NodePlan[] = [{ role: "server", name: serverName, ports: serverPorts }];
    for (let i = 0; i < req.workers; i++) {
      const workerName = nodeName(prefix, "worker", req.name, i);
      const published = createPublishedPorts(mergePortSpecs(bySelector, "worker", workerName));
      plans.push({
        role: "worker",
        name: workerName,
        ports: req.portAutoOffset > 0 ? published.offset(i + req.portAutoOffset) : published,
      });
    }
    return plans;
  }

  private async pull(
    image: string,
    verbose: boolean,
    onProgress: CreateClusterRequest["onPullProgress"],
  ): Promise<void> {
    logger.info(`Pulling image ${image}...`);
    await this.engine.pullImage(image, verbose ? onProgress : undefined);
  }

  private async runNode(
    plan: NodePlan,
    cluster: string,
    image: string,
    opts: { command: string[]; env: string[]; binds: string[]; tmpfs?: Record<string, string> },
  ): Promise<string> {
    const { exposedPorts, portBindings } = plan.ports.toEngine();
    const spec: ContainerSpec = {
      name: plan.name,
      hostname: plan.name,
      image,
      command: opts.command,
      env: opts.env,
      labels: {
        ...this.reader.clusterLabels(cluster),
        [LABEL_COMPONENT]: plan.role,
        [LABEL_CREATED]: new Date(this.now()).toISOString(),
      },
      exposedPorts,
      portBindings,
      binds: opts.binds,
      tmpfs: opts.tmpfs,
      privileged: true,
      network: cluster,
      networkAliases: [plan.name],
    };
    const id = await this.engine.createContainer(spec);
    await this.engine.startContainer(id);
    return id;
  }

  /**
   * Poll the server log for the readiness marker. A zero timeout waits
   * forever; otherwise the wait gives up once the elapsed time exceeds it.
   */
  private async waitForReadiness(
    name: string,
    serverId: string,
    timeoutSeconds: number,
    signal?: AbortSignal,
  ): Promise<void> {
    logger.info(`Waiting for cluster [${name}] to become ready`);
    const started = this.now();
    const timeoutMs = timeoutSeconds * 1000;

    for (;;) {
      throwIfAborted(name, signal);
      if (timeoutMs > 0 && this.now() - started > timeoutMs) {
        throw new ReadinessTimeoutError(name, timeoutSeconds);
      }
      const output = await this.engine.containerLogs(serverId);
      if (output.includes(this.config.readinessMarker)) {
        logger.info(`Cluster [${name}] is ready`);
        return;
      }
      await this.sleep(this.config.readinessPollIntervalMs);
    }
  }

  /** Tear down whatever exists for `name`, then rethrow (or report a failed cleanup). */
  private async rollback(name: string, cause: unknown): Promise<never> {
    logger.error(`Failed to create cluster [${name}]: ${errorMessage(cause)}; rolling back`);
    const failures = await this.teardown(name);
    if (failures.length > 0) {
      const err = new RollbackError(name, cause, failures);
      logger.error(err.message);
      throw err;
    }
    throw cause;
  }

  /** Remove every container and network labelled with the cluster name, plus its directory. */
  private async teardown(name: string): Promise<NodeFailure[]> {
    const failures: NodeFailure[] = [];
    let leftovers: ClusterLeftovers;
    try {
      leftovers = await this.reader.findLeftovers(name);
    } catch (err: unknown) {
      return [{ node: `cluster ${name}`, error: toError(err) }];
    }

    for (const container of leftovers.containers) {
      try {
        await this.engine.removeContainer(container.id, { force: true, removeVolumes: true });
      } catch (err: unknown) {
        failures.push({ node: container.name, error: toError(err) });
      }
    }
    for (const network of leftovers.networks) {
      try {
        await this.engine.removeNetwork(network.id);
      } catch (err: unknown) {
        failures.push({ node: `network ${network.name}`, error: toError(err) });
      }
    }
    await removeClusterDir(this.config, name);
    return failures;
  }

  // ------- delete -------
  async delete(selector: ClusterSelector): Promise<ClusterOutcome[]> {
    let targets: Cluster[];
    if (selector.all) {
      targets = await this.resolveTargets(selector);
    } else {
      const name = selector.name ?? this.config.defaultClusterName;
      validateClusterName(name);
      const cluster = await this.reader.get(name);
      if (!cluster) return this.finish("delete", [await this.sweep(name)]);
      targets = [cluster];
    }

    const outcomes: ClusterOutcome[] = [];
    for (const cluster of targets) {
      outcomes.push(await this.deleteOne(cluster));
    }
    return this.finish("delete", outcomes);
  }

  private async deleteOne(cluster: Cluster): Promise<ClusterOutcome> {
    const outcome: ClusterOutcome = { cluster: cluster.name, ok: true, nodeFailures: [] };
    logger.info(`Removing cluster [${cluster.name}]`);

    let workers: NodeRef[];
    try {
      workers = await this.lookupWorkers(cluster);
    } catch (err: unknown) {
      logger.error(`Couldn't list workers of cluster ${cluster.name}, leaving it in place: ${errorMessage(err)}`);
      return { ...outcome, ok: false, error: toError(err) };
    }
    if (workers.length > 0) {
      logger.info(`...Removing ${workers.length} workers`);
      for (const worker of workers) {
        try {
          await this.engine.removeContainer(worker.id, { force: true, removeVolumes: true });
        } catch (err: unknown) {
          logger.warn(`Couldn't remove worker ${worker.name}: ${errorMessage(err)}`);
          outcome.nodeFailures.push({ node: worker.name, error: toError(err) });
        }
      }
    }

    logger.info("...Removing server");
    try {
      await this.engine.removeContainer(cluster.server.id, { force: true, removeVolumes: true });
    } catch (err: unknown) {
      logger.error(`Couldn't remove server for cluster ${cluster.name}: ${errorMessage(err)}`);
      return { ...outcome, ok: false, error: toError(err) };
    }

    await removeClusterDir(this.config, cluster.name);
    await this.removeNetworks(cluster.name);

    if (outcome.nodeFailures.length > 0) {
      logger.warn(`Removed cluster [${cluster.name}] with ${outcome.nodeFailures.length} worker(s) left behind`);
      return { ...outcome, ok: false };
    }
    logger.info(`SUCCESS: removed cluster [${cluster.name}]`);
    return outcome;
  }

  /** Networks are best-effort: a leftover network only earns a warning. */
  private async removeNetworks(name: string): Promise<void> {
    try {
      const networks = await this.engine.listNetworks(this.reader.clusterLabels(name));
      for (const network of networks) {
        try {
          await this.engine.removeNetwork(network.id);
        } catch (err: unknown) {
          logger.warn(`Couldn't remove network ${network.name} for cluster ${name}: ${errorMessage(err)}`);
        }
      }
    } catch (err: unknown) {
      logger.warn(`Couldn't delete cluster network for cluster ${name}: ${errorMessage(err)}`);
    }
  }

  /** Delete a cluster whose server is gone: remove whatever subset is still there. */
  private async sweep(name: string): Promise<ClusterOutcome> {
    const leftovers = await this.reader.findLeftovers(name);
    const hasDir = existsSync(clusterDir(this.config, name));
    if (leftovers.containers.length === 0 && leftovers.networks.length === 0 && !hasDir) {
      throw new ClusterNotFoundError(name);
    }

    logger.info(`Removing remains of cluster [${name}]`);
    const failures = await this.teardown(name);
    for (const f of failures) logger.warn(`Couldn't remove ${f.node}: ${f.error.message}`);
    if (failures.length === 0) logger.info(`SUCCESS: removed cluster [${name}]`);
    return { cluster: name, ok: failures.length === 0, nodeFailures: failures };
  }

  // ------- stop -------
  async stop(selector: ClusterSelector): Promise<ClusterOutcome[]> {
    const outcomes: ClusterOutcome[] = [];
    for (const cluster of await this.resolveTargets(selector)) {
      const outcome: ClusterOutcome = { cluster: cluster.name, ok: true, nodeFailures: [] };
      logger.info(`Stopping cluster [${cluster.name}]`);

      let workers: NodeRef[];
      try {
        workers = await this.lookupWorkers(cluster);
      } catch (err: unknown) {
        logger.error(`Couldn't list workers of cluster ${cluster.name}: ${errorMessage(err)}`);
        outcomes.push({ ...outcome, ok: false, error: toError(err) });
        continue;
      }
      if (workers.length > 0) {
        logger.info(`...Stopping ${workers.length} workers`);
      }
      for (const worker of workers) {
        await this.nodeStep("stop", worker.name, outcome, () => this.engine.stopContainer(worker.id));
      }
      logger.info("...Stopping server");
      await this.nodeStep("stop", cluster.server.name, outcome, () => this.engine.stopContainer(cluster.server.id));

      outcome.ok = outcome.nodeFailures.length === 0;
      if (outcome.ok) logger.info(`SUCCESS: stopped cluster [${cluster.name}]`);
      outcomes.push(outcome);
    }
    return this.finish("stop", outcomes);
  }

  // ------- start -------
  async start(selector: ClusterSelector): Promise<ClusterOutcome[]> {
    const outcomes: ClusterOutcome[] = [];
    for (const cluster of await this.resolveTargets(selector)) {
      logger.info(`Starting cluster [${cluster.name}]`);

      logger.info("...Starting server");
      try {
        await this.engine.startContainer(cluster.server.id);
      } catch (err: unknown) {
        // Workers resolve the server by its network alias; without it there is nothing to join.
        logger.error(`Couldn't start server for cluster ${cluster.name}: ${errorMessage(err)}`);
        outcomes.push({ cluster: cluster.name, ok: false, error: toError(err), nodeFailures: [] });
        continue;
      }

      const outcome: ClusterOutcome = { cluster: cluster.name, ok: true, nodeFailures: [] };
      let workers: NodeRef[];
      try {
        workers = await this.lookupWorkers(cluster);
      } catch (err: unknown) {
        logger.error(`Couldn't list workers of cluster ${cluster.name}: ${errorMessage(err)}`);
        outcomes.push({ ...outcome, ok: false, error: toError(err) });
        continue;
      }
      if (workers.length > 0) {
        logger.info(`...Starting ${workers.length} workers`);
      }
      for (const worker of workers) {
        await this.nodeStep("start", worker.name, outcome, () => this.engine.startContainer(worker.id));
      }

      outcome.ok = outcome.nodeFailures.length === 0;
      if (outcome.ok) logger.info(`SUCCESS: started cluster [${cluster.name}]`);
      outcomes.push(outcome);
    }
    return this.finish("start", outcomes);
  }

  /** The cluster's workers, looked up again by cluster label when the reader couldn't list them. */
  private async lookupWorkers(cluster: Cluster): Promise<NodeRef[]> {
    if (cluster.workersKnown) return cluster.workers;
    const { containers } = await this.reader.findLeftovers(cluster.name);
    return containers
      .filter((c) => c.labels[LABEL_COMPONENT] === "worker")
      .sort((a, b) => (parseWorkerOrdinal(a.name) ?? 0) - (parseWorkerOrdinal(b.name) ?? 0));
  }

  private async nodeStep(
    verb: string,
    node: string,
    outcome: ClusterOutcome,
    fn: () => Promise<void>,
  ): Promise<void> {
    try {
      await fn();
    } catch (err: unknown) {
      logger.warn(`Couldn't ${verb} ${node}: ${errorMessage(err)}`);
      outcome.nodeFailures.push({ node, error: toError(err) });
    }
  }

  private async resolveTargets(selector: ClusterSelector): Promise<Cluster[]> {
    if (selector.all) {
      const clusters = await this.list({ all: true });
      if (clusters.length === 0) logger.info("No clusters found");
      return clusters;
    }
    const name = selector.name ?? this.config.defaultClusterName;
    validateClusterName(name);
    const cluster = await this.reader.get(name);
    if (!cluster) throw new ClusterNotFoundError(name);
    return [cluster];
  }

  private finish(operation: string, outcomes: ClusterOutcome[]): ClusterOutcome[] {
    if (outcomes.some((o) => !o.ok)) {
      throw new PartialFailureError(operation, outcomes);
    }
    return outcomes;
  }

  // ------- credentials -------
  /**
   * Path to the cluster's credentials file, copying it out of the server
   * container the first time it is asked for.
   */
  async getCredentials(name: string = this.config.defaultClusterName): Promise<string> {
    validateClusterName(name);
    const servers = await this.engine.listContainers(
      {
        [LABEL_APP]: this.config.identityLabel,
        [LABEL_CLUSTER]: name,
        [LABEL_COMPONENT]: "server",
      },
      { all: false },
    );
    if (servers.length === 0) {
      throw new ClusterNotFoundError(name, "has no running server");
    }
    if (servers.length > 1) {
      throw new ValidationError(`Cluster ${name} has ${servers.length} server containers, expected one`);
    }

    const dest = credentialsPath(this.config, name);
    if (existsSync(dest)) return dest;

    await ensureClusterDir(this.config, name);
    const archive = await this.engine.copyFromContainer(servers[0].id, this.config.credentialsContainerPath);
    await writeFile(dest, extractArchivedFile(archive), { mode: 0o600 });
    return dest;
  }
}

function throwIfAborted(name: string, signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new OperationAbortedError(name);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
