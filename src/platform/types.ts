/**
 * Container engine primitives consumed by the cluster controller.
 *
 * Everything clusterbox knows about a cluster is stored on the engine as
 * labels; these types are the narrow view of containers and networks that
 * the rest of the code works against.
 */

/** Raw container state as reported by the engine. */
export type ContainerState = "created" | "running" | "paused" | "restarting" | "removing" | "exited" | "dead" | "unknown";

const KNOWN_STATES: readonly ContainerState[] = [
  "created",
  "running",
  "paused",
  "restarting",
  "removing",
  "exited",
  "dead",
];

export function toContainerState(raw: string | undefined): ContainerState {
  const state = KNOWN_STATES.find((s) => s === raw);
  return state ?? "unknown";
}

export type Protocol = "tcp" | "udp";

export interface HostBinding {
  hostIp: string;
  /** Port number, a `start-end` range, or "" to let the engine pick. */
  hostPort: string;
}

/** A published port as reported back by the engine for a running container. */
export interface ContainerPort {
  privatePort: number;
  publicPort?: number;
  ip?: string;
  protocol: string;
}

export interface ContainerSummary {
  id: string;
  /** Container name without the leading slash. */
  name: string;
  image: string;
  state: ContainerState;
  labels: Record<string, string>;
  ports: ContainerPort[];
}

export interface NetworkSummary {
  id: string;
  name: string;
  labels: Record<string, string>;
}

export interface ContainerSpec {
  name: string;
  hostname: string;
  image: string;
  command?: string[];
  env: string[];
  labels: Record<string, string>;
  /** Keys are `<port>/<protocol>`. */
  exposedPorts: string[];
  portBindings: Record<string, HostBinding[]>;
  binds: string[];
  tmpfs?: Record<string, string>;
  privileged: boolean;
  network: string;
  networkAliases: string[];
}

export interface PullProgress {
  status: string;
  id?: string;
  progress?: string;
}

export interface ContainerEngine {
  /** Returns the engine API version. */
  ping(): Promise<string>;
  createNetwork(name: string, labels: Record<string, string>): Promise<string>;
  listNetworks(labels: Record<string, string>): Promise<NetworkSummary[]>;
  removeNetwork(id: string): Promise<void>;
  pullImage(image: string, onProgress?: (event: PullProgress) => void): Promise<void>;
  createContainer(spec: ContainerSpec): Promise<string>;
  /** Start and stop succeed for a container that is already in that state. */
  startContainer(id: string): Promise<void>;
  stopContainer(id: string): Promise<void>;
  removeContainer(id: string, opts?: { force?: boolean; removeVolumes?: boolean }): Promise<void>;
  /** Label filters are ANDed. `all` includes stopped containers. */
  listContainers(labels: Record<string, string>, opts?: { all?: boolean }): Promise<ContainerSummary[]>;
  /** Combined stdout/stderr as text. */
  containerLogs(id: string): Promise<string>;
  /** Raw archive bytes for a single path inside the container. */
  copyFromContainer(id: string, path: string): Promise<Buffer>;
}

/** Label keys stamped on every container and network. */
export const LABEL_APP = "app";
export const LABEL_COMPONENT = "component";
export const LABEL_CLUSTER = "cluster";
export const LABEL_CREATED = "created";
