/**
 * Dockerode implementation of the ContainerEngine primitives.
 *
 * Thin layer around the dockerode client that standardises error messages and
 * translates between the engine's wire shapes and the types in ./types.ts.
 */

import Docker from "dockerode";
import { EngineError, EngineUnavailableError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type {
  ContainerEngine,
  ContainerSpec,
  ContainerSummary,
  HostBinding,
  NetworkSummary,
  PullProgress,
} from "./types.js";
import { toContainerState } from "./types.js";

const CONNECTION_ERRORS = new Set(["ECONNREFUSED", "ENOENT", "EACCES", "ETIMEDOUT", "EHOSTUNREACH"]);

/** Create a DockerEngine, translating client construction failures. */
export function createDockerEngine(options?: Docker.DockerOptions): DockerEngine {
  try {
    return new DockerEngine(new Docker(options));
  } catch (err: unknown) {
    throw new EngineUnavailableError(`Couldn't create docker client: ${errorMessage(err)}`, err);
  }
}

/**
 * Wrap a docker API call with a human-readable error context.
 */
export async function engineCall<T>(label: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    const code = errorCode(err);
    if (code && CONNECTION_ERRORS.has(code)) {
      throw new EngineUnavailableError(`Container engine is not reachable (${label}): ${errorMessage(err)}`, err);
    }
    throw new EngineError(label, errorMessage(err), err, statusCode(err));
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function statusCode(err: unknown): number | undefined {
  if (err instanceof Error && "statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

/** The engine answers 304 when a container is already started or stopped. */
async function notModifiedIsDone(call: Promise<unknown>): Promise<void> {
  try {
    await call;
  } catch (err: unknown) {
    if (statusCode(err) === 304) return;
    throw err;
  }
}

function labelFilter(labels: Record<string, string>): string[] {
  return Object.entries(labels).map(([k, v]) => `${k}=${v}`);
}

export class DockerEngine implements ContainerEngine {
  private docker: Docker;

  constructor(docker?: Docker) {
    this.docker = docker || new Docker();
  }

  async ping(): Promise<string> {
    const version = await engineCall("ping engine", () => this.docker.version());
    return version.ApiVersion;
  }

  async createNetwork(name: string, labels: Record<string, string>): Promise<string> {
    const network = await engineCall(`create network ${name}`, () =>
      this.docker.createNetwork({ Name: name, CheckDuplicate: true, Labels: labels }),
    );
    return network.id;
  }

  async listNetworks(labels: Record<string, string>): Promise<NetworkSummary[]> {
    const networks: Docker.NetworkInspectInfo[] = await engineCall("list networks", () =>
      this.docker.listNetworks({ filters: { label: labelFilter(labels) } }),
    );
    return networks.map((n) => ({ id: n.Id, name: n.Name, labels: n.Labels ?? {} }));
  }

  async removeNetwork(id: string): Promise<void> {
    await engineCall(`remove network ${id}`, () => this.docker.getNetwork(id).remove());
  }

  async pullImage(image: string, onProgress?: (event: PullProgress) => void): Promise<void> {
    const stream = await engineCall(`pull image ${image}`, () => this.docker.pull(image));
    await engineCall(
      `pull image ${image}`,
      () =>
        new Promise<void>((resolve, reject) => {
          this.docker.modem.followProgress(
            stream,
            (err: Error | null) => {
              if (err) reject(err);
              else resolve();
            },
            (event: { status?: string; id?: string; progress?: string }) => {
              onProgress?.({ status: event.status ?? "", id: event.id, progress: event.progress });
            },
          );
        }),
    );
  }

  async createContainer(spec: ContainerSpec): Promise<string> {
    const exposedPorts: Record<string, Record<string, never>> = {};
    for (const key of spec.exposedPorts) exposedPorts[key] = {};

    const portBindings: Record<string, Array<{ HostIp: string; HostPort: string }>> = {};
    for (const [key, bindings] of Object.entries(spec.portBindings)) {
      portBindings[key] = bindings.map((b: HostBinding) => ({ HostIp: b.hostIp, HostPort: b.hostPort }));
    }

    const container = await engineCall(`create container ${spec.name}`, () =>
      this.docker.createContainer({
        name: spec.name,
        Hostname: spec.hostname,
        Image: spec.image,
        Cmd: spec.command,
        Env: spec.env,
        Labels: spec.labels,
        ExposedPorts: exposedPorts,
        HostConfig: {
          Binds: spec.binds.length > 0 ? spec.binds : undefined,
          PortBindings: portBindings,
          Privileged: spec.privileged,
          Tmpfs: spec.tmpfs,
          NetworkMode: spec.network,
        },
        NetworkingConfig: {
          EndpointsConfig: {
            [spec.network]: { Aliases: spec.networkAliases },
          },
        },
      }),
    );
    logger.debug(`Created container ${spec.name} (${container.id.slice(0, 12)})`);
    return container.id;
  }

  async startContainer(id: string): Promise<void> {
    await engineCall(`start container ${id}`, () => notModifiedIsDone(this.docker.getContainer(id).start()));
  }

  async stopContainer(id: string): Promise<void> {
    await engineCall(`stop container ${id}`, () => notModifiedIsDone(this.docker.getContainer(id).stop()));
  }

  async removeContainer(id: string, opts?: { force?: boolean; removeVolumes?: boolean }): Promise<void> {
    await engineCall(`remove container ${id}`, () =>
      this.docker.getContainer(id).remove({ force: opts?.force ?? true, v: opts?.removeVolumes ?? true }),
    );
  }

  async listContainers(labels: Record<string, string>, opts?: { all?: boolean }): Promise<ContainerSummary[]> {
    const containers = await engineCall("list containers", () =>
      this.docker.listContainers({ all: opts?.all ?? true, filters: { label: labelFilter(labels) } }),
    );
    return containers.map((c) => ({
      id: c.Id,
      name: (c.Names?.[0] ?? "").replace(/^\//, ""),
      image: c.Image,
      state: toContainerState(c.State),
      labels: c.Labels ?? {},
      ports: (c.Ports ?? []).map((p) => ({
        privatePort: p.PrivatePort,
        publicPort: p.PublicPort,
        ip: p.IP,
        protocol: p.Type,
      })),
    }));
  }

  async containerLogs(id: string): Promise<string> {
    const output = await engineCall(`logs ${id}`, () =>
      this.docker.getContainer(id).logs({ stdout: true, stderr: true, follow: false }),
    );
    return demuxDockerStream(output);
  }

  async copyFromContainer(id: string, path: string): Promise<Buffer> {
    return engineCall(`copy ${path} from ${id}`, async () => {
      const stream = await this.docker.getContainer(id).getArchive({ path });
      const chunks: Buffer[] = [];
      for await (const chunk of stream) {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
      }
      return Buffer.concat(chunks);
    });
  }
}

/**
 * Demux Docker multiplexed stream output.
 * Docker log streams have an 8-byte header per frame:
 *   [stream_type(1), 0, 0, 0, size(4 BE)] followed by payload.
 * Output from a TTY container carries no headers and is returned as-is.
 */
export function demuxDockerStream(buf: Buffer): string {
  if (!isMultiplexed(buf)) return buf.toString("utf-8");

  const parts: string[] = [];
  let offset = 0;
  while (offset + 8 <= buf.length) {
    const size = buf.readUInt32BE(offset + 4);
    if (offset + 8 + size > buf.length) break;
    parts.push(buf.subarray(offset + 8, offset + 8 + size).toString("utf-8"));
    offset += 8 + size;
  }
  return parts.join("");
}

function isMultiplexed(buf: Buffer): boolean {
  if (buf.length < 8) return false;
  return buf[0] <= 2 && buf[1] === 0 && buf[2] === 0 && buf[3] === 0;
}
