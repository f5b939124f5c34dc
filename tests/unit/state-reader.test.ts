import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { ClusterStateReader } from "../../src/cluster/state-reader.js";
import { resolveConfig } from "../../src/core/config.js";
import { FakeEngine } from "../mocks/fake-engine.js";

const config = resolveConfig({ homeDir: "/tmp/clusterbox-test" }, {});

function labels(cluster: string, component: string): Record<string, string> {
  return { app: "clusterbox", cluster, component, created: "2026-01-01T00:00:00.000Z" };
}

describe("ClusterStateReader", () => {
  let engine: FakeEngine;
  let reader: ClusterStateReader;

  beforeEach(() => {
    engine = new FakeEngine();
    reader = new ClusterStateReader(engine, config);
    engine.seed(
      {
        name: "clusterbox-a-server",
        labels: labels("a", "server"),
        portBindings: { "6443/tcp": [{ hostIp: "0.0.0.0", hostPort: "6443" }], "80/tcp": [{ hostIp: "", hostPort: "" }] },
      },
      "running",
    );
    engine.seed({ name: "clusterbox-a-worker-1", labels: labels("a", "worker") }, "running");
    engine.seed({ name: "clusterbox-a-worker-0", labels: labels("a", "worker") }, "running");
    engine.seed({ name: "clusterbox-b-server", labels: labels("b", "server") }, "exited");
  });

  it("rebuilds every cluster from labels", async () => {
    const clusters = await reader.list({ all: true });
    expect([...clusters.keys()]).toEqual(["a", "b"]);

    const a = clusters.get("a");
    expect(a?.status).toBe("running");
    expect(a?.image).toBe("docker.io/rancher/k3s:v1.29.4-k3s1");
    expect(a?.serverPorts).toEqual([6443]);
    expect(a?.server).toMatchObject({ name: "clusterbox-a-server", role: "server", ordinal: undefined });
    expect(a?.workers.map((w) => [w.name, w.ordinal])).toEqual([
      ["clusterbox-a-worker-0", 0],
      ["clusterbox-a-worker-1", 1],
    ]);
    expect(a?.server.created).toBe("2026-01-01T00:00:00.000Z");

    expect(clusters.get("b")?.status).toBe("stopped");
    expect(clusters.get("b")?.workers).toEqual([]);
    expect(a?.workersKnown).toBe(true);
  });

  it("ignores containers owned by something else", async () => {
    engine.seed({ name: "other-server", labels: { app: "other", cluster: "c", component: "server" } }, "running");
    const clusters = await reader.list({ all: true });
    expect(clusters.has("c")).toBe(false);
  });

  it("returns nothing for an empty selector without asking the engine", async () => {
    const clusters = await reader.list({});
    expect(clusters.size).toBe(0);
    expect(engine.calls).toEqual([]);
  });

  it("finds a single cluster by name", async () => {
    const b = await reader.get("b");
    expect(b?.name).toBe("b");
    expect(engine.calls[0]).toBe('listContainers {"app":"clusterbox","component":"server","cluster":"b"}');
  });

  it("returns undefined for a missing cluster", async () => {
    expect(await reader.get("missing")).toBeUndefined();
  });

  it("marks the status unknown when workers can't be listed", async () => {
    engine.failOn("listContainers", new Error("engine hiccup"), (arg) => arg.includes('"component":"worker"'));
    const a = await reader.get("a");
    expect(a?.status).toBe("unknown");
    expect(a?.workers).toEqual([]);
    expect(a?.workersKnown).toBe(false);
  });

  it("finds leftovers of any component", async () => {
    await engine.createNetwork("a", { app: "clusterbox", cluster: "a" });
    const leftovers = await reader.findLeftovers("a");
    expect(leftovers.containers.map((c) => c.name).sort()).toEqual([
      "clusterbox-a-server",
      "clusterbox-a-worker-0",
      "clusterbox-a-worker-1",
    ]);
    expect(leftovers.networks.map((n) => n.name)).toEqual(["a"]);
  });
});
