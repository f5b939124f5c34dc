import { Readable } from "node:stream";
import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { EngineError, EngineUnavailableError } from "../../src/errors.js";
import { DockerEngine, demuxDockerStream } from "../../src/platform/docker-engine.js";

/** Frame a payload the way the engine multiplexes stdout (1) and stderr (2). */
function frame(stream: number, text: string): Buffer {
  const payload = Buffer.from(text);
  const header = Buffer.alloc(8);
  header[0] = stream;
  header.writeUInt32BE(payload.length, 4);
  return Buffer.concat([header, payload]);
}

/** Create a mock Docker instance with controllable behavior */
function createMockDocker() {
  const mockContainer = {
    id: "container-id-123",
    start: vi.fn().mockResolvedValue(undefined),
    stop: vi.fn().mockResolvedValue(undefined),
    remove: vi.fn().mockResolvedValue(undefined),
    logs: vi.fn().mockResolvedValue(Buffer.alloc(0)),
    getArchive: vi.fn().mockResolvedValue(Readable.from([Buffer.from("ab"), Buffer.from("cd")])),
  };
  const mockNetwork = { remove: vi.fn().mockResolvedValue(undefined) };

  const docker = {
    version: vi.fn().mockResolvedValue({ ApiVersion: "1.45" }),
    listContainers: vi.fn().mockResolvedValue([]),
    listNetworks: vi.fn().mockResolvedValue([]),
    createContainer: vi.fn().mockResolvedValue(mockContainer),
    createNetwork: vi.fn().mockResolvedValue({ id: "network-id-456" }),
    getContainer: vi.fn().mockReturnValue(mockContainer),
    getNetwork: vi.fn().mockReturnValue(mockNetwork),
    pull: vi.fn().mockResolvedValue("stream"),
    modem: {
      followProgress: vi.fn(
        (_stream: unknown, cb: (err: Error | null) => void, onProgress: (event: Record<string, string>) => void) => {
          onProgress({ status: "Downloading", id: "layer1", progress: "[=>   ]" });
          cb(null);
        },
      ),
    },
  };

  return { docker, mockContainer, mockNetwork };
}

describe("DockerEngine", () => {
  it("pings with the version call", async () => {
    const { docker } = createMockDocker();
    const engine = new DockerEngine(docker as any);
    expect(await engine.ping()).toBe("1.45");
  });

  it("creates a labelled network", async () => {
    const { docker } = createMockDocker();
    const engine = new DockerEngine(docker as any);

    expect(await engine.createNetwork("t1", { app: "clusterbox", cluster: "t1" })).toBe("network-id-456");
    expect(docker.createNetwork).toHaveBeenCalledWith({
      Name: "t1",
      CheckDuplicate: true,
      Labels: { app: "clusterbox", cluster: "t1" },
    });
  });

  it("filters networks by label", async () => {
    const { docker } = createMockDocker();
    docker.listNetworks.mockResolvedValue([{ Id: "n1", Name: "t1", Labels: { app: "clusterbox" } }]);
    const engine = new DockerEngine(docker as any);

    expect(await engine.listNetworks({ app: "clusterbox", cluster: "t1" })).toEqual([
      { id: "n1", name: "t1", labels: { app: "clusterbox" } },
    ]);
    expect(docker.listNetworks).toHaveBeenCalledWith({ filters: { label: ["app=clusterbox", "cluster=t1"] } });
  });

  it("pulls an image and forwards progress", async () => {
    const { docker } = createMockDocker();
    const engine = new DockerEngine(docker as any);
    const events: unknown[] = [];

    await engine.pullImage("docker.io/rancher/k3s:v1", (e) => events.push(e));

    expect(docker.pull).toHaveBeenCalledWith("docker.io/rancher/k3s:v1");
    expect(events).toEqual([{ status: "Downloading", id: "layer1", progress: "[=>   ]" }]);
  });

  it("surfaces a failed pull", async () => {
    const { docker } = createMockDocker();
    docker.modem.followProgress.mockImplementation((_stream: unknown, cb: (err: Error | null) => void) => {
      cb(new Error("manifest unknown"));
    });
    const engine = new DockerEngine(docker as any);

    await expect(engine.pullImage("rancher/k3s:nope")).rejects.toThrow("pull image rancher/k3s:nope: manifest unknown");
  });

  it("translates a container spec into create options", async () => {
    const { docker } = createMockDocker();
    const engine = new DockerEngine(docker as any);

    const id = await engine.createContainer({
      name: "clusterbox-t1-worker-0",
      hostname: "clusterbox-t1-worker-0",
      image: "docker.io/rancher/k3s:v1",
      command: ["agent"],
      env: ["K3S_URL=https://clusterbox-t1-server:6443"],
      labels: { app: "clusterbox", cluster: "t1", component: "worker" },
      exposedPorts: ["80/tcp"],
      portBindings: { "80/tcp": [{ hostIp: "", hostPort: "8081" }] },
      binds: [],
      tmpfs: { "/run": "", "/var/run": "" },
      privileged: true,
      network: "t1",
      networkAliases: ["clusterbox-t1-worker-0"],
    });

    expect(id).toBe("container-id-123");
    expect(docker.createContainer).toHaveBeenCalledWith({
      name: "clusterbox-t1-worker-0",
      Hostname: "clusterbox-t1-worker-0",
      Image: "docker.io/rancher/k3s:v1",
      Cmd: ["agent"],
      Env: ["K3S_URL=https://clusterbox-t1-server:6443"],
      Labels: { app: "clusterbox", cluster: "t1", component: "worker" },
      ExposedPorts: { "80/tcp": {} },
      HostConfig: {
        Binds: undefined,
        PortBindings: { "80/tcp": [{ HostIp: "", HostPort: "8081" }] },
        Privileged: true,
        Tmpfs: { "/run": "", "/var/run": "" },
        NetworkMode: "t1",
      },
      NetworkingConfig: { EndpointsConfig: { t1: { Aliases: ["clusterbox-t1-worker-0"] } } },
    });
  });

  it("lists containers without the leading slash", async () => {
    const { docker } = createMockDocker();
    docker.listContainers.mockResolvedValue([
      {
        Id: "abc",
        Names: ["/clusterbox-t1-server"],
        Image: "docker.io/rancher/k3s:v1",
        State: "running",
        Labels: { app: "clusterbox", cluster: "t1", component: "server" },
        Ports: [{ PrivatePort: 6443, PublicPort: 6443, IP: "0.0.0.0", Type: "tcp" }],
      },
    ]);
    const engine = new DockerEngine(docker as any);

    const containers = await engine.listContainers({ app: "clusterbox", cluster: "t1" }, { all: false });

    expect(docker.listContainers).toHaveBeenCalledWith({
      all: false,
      filters: { label: ["app=clusterbox", "cluster=t1"] },
    });
    expect(containers).toEqual([
      {
        id: "abc",
        name: "clusterbox-t1-server",
        image: "docker.io/rancher/k3s:v1",
        state: "running",
        labels: { app: "clusterbox", cluster: "t1", component: "server" },
        ports: [{ privatePort: 6443, publicPort: 6443, ip: "0.0.0.0", protocol: "tcp" }],
      },
    ]);
  });

  it("maps unfamiliar states to unknown", async () => {
    const { docker } = createMockDocker();
    docker.listContainers.mockResolvedValue([
      { Id: "abc", Names: ["/x"], Image: "i", State: "hibernating", Labels: {}, Ports: [] },
    ]);
    const engine = new DockerEngine(docker as any);
    expect((await engine.listContainers({}))[0].state).toBe("unknown");
  });

  it("removes containers with their volumes by default", async () => {
    const { docker, mockContainer } = createMockDocker();
    const engine = new DockerEngine(docker as any);

    await engine.removeContainer("abc");

    expect(docker.getContainer).toHaveBeenCalledWith("abc");
    expect(mockContainer.remove).toHaveBeenCalledWith({ force: true, v: true });
  });

  it("demuxes container logs", async () => {
    const { docker, mockContainer } = createMockDocker();
    mockContainer.logs.mockResolvedValue(Buffer.concat([frame(1, "starting\n"), frame(2, "Running kubelet\n")]));
    const engine = new DockerEngine(docker as any);

    expect(await engine.containerLogs("abc")).toBe("starting\nRunning kubelet\n");
    expect(mockContainer.logs).toHaveBeenCalledWith({ stdout: true, stderr: true, follow: false });
  });

  it("collects an archive into one buffer", async () => {
    const { docker, mockContainer } = createMockDocker();
    const engine = new DockerEngine(docker as any);

    const archive = await engine.copyFromContainer("abc", "/output/kubeconfig.yaml");

    expect(archive.toString()).toBe("abcd");
    expect(mockContainer.getArchive).toHaveBeenCalledWith({ path: "/output/kubeconfig.yaml" });
  });

  it("treats starting a running container as done", async () => {
    const { docker, mockContainer } = createMockDocker();
    mockContainer.start.mockRejectedValue(
      Object.assign(new Error("(HTTP code 304) container already started"), { statusCode: 304 }),
    );
    const engine = new DockerEngine(docker as any);

    await expect(engine.startContainer("abc")).resolves.toBeUndefined();
  });

  it("treats stopping a stopped container as done", async () => {
    const { docker, mockContainer } = createMockDocker();
    mockContainer.stop.mockRejectedValue(
      Object.assign(new Error("(HTTP code 304) container already stopped"), { statusCode: 304 }),
    );
    const engine = new DockerEngine(docker as any);

    await expect(engine.stopContainer("abc")).resolves.toBeUndefined();
  });

  describe("errors", () => {
    it("reports an unreachable engine", async () => {
      const { docker } = createMockDocker();
      docker.version.mockRejectedValue(
        Object.assign(new Error("connect ECONNREFUSED /var/run/docker.sock"), { code: "ECONNREFUSED" }),
      );
      const engine = new DockerEngine(docker as any);

      await expect(engine.ping()).rejects.toThrow(EngineUnavailableError);
    });

    it("wraps API errors with the operation and status code", async () => {
      const { docker, mockContainer } = createMockDocker();
      mockContainer.start.mockRejectedValue(Object.assign(new Error("no such container"), { statusCode: 404 }));
      const engine = new DockerEngine(docker as any);

      const err = await engine.startContainer("abc").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(EngineError);
      expect(err).toHaveProperty("message", "start container abc: no such container");
      expect(err).toHaveProperty("statusCode", 404);
    });
  });
});

describe("demuxDockerStream", () => {
  it("joins the payload of every frame", () => {
    expect(demuxDockerStream(Buffer.concat([frame(1, "hello "), frame(2, "world")]))).toBe("hello world");
  });

  it("returns TTY output unchanged", () => {
    expect(demuxDockerStream(Buffer.from("plain log line\n"))).toBe("plain log line\n");
  });

  it("drops a truncated trailing frame", () => {
    const truncated = Buffer.concat([frame(1, "complete"), frame(1, "partial").subarray(0, 10)]);
    expect(demuxDockerStream(truncated)).toBe("complete");
  });
});
