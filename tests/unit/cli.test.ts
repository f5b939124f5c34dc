import { describe, expect, it } from "vitest";
import type { Cluster, ClusterNode } from "../../src/cluster/types.js";
import { buildCreateRequest } from "../../src/commands/create.js";
import { renderClusterTable } from "../../src/commands/list.js";
import { clusterSelector, intFlag, parseFlags } from "../../src/commands/shared.js";
import { resolveConfig } from "../../src/core/config.js";
import { ValidationError } from "../../src/errors.js";
import type { ContainerState } from "../../src/platform/types.js";

const config = resolveConfig({ homeDir: "/tmp/clusterbox-test" }, {});

describe("parseFlags", () => {
  it("collects flags, repeatable lists and positionals", () => {
    expect(
      parseFlags(["dev", "--workers", "2", "-p", "8080:80@workers", "--publish=9090:90", "--wait", "--verbose"]),
    ).toEqual({
      flags: { workers: "2", wait: true, verbose: true },
      lists: { publish: ["8080:80@workers", "9090:90"] },
      positional: ["dev"],
    });
  });

  it("resolves short aliases", () => {
    expect(parseFlags(["-n", "dev", "-a", "-x", "--disable=traefik", "-e", "A=1"])).toEqual({
      flags: { name: "dev", all: true },
      lists: { "server-arg": ["--disable=traefik"], env: ["A=1"] },
      positional: [],
    });
  });

  it("only lets --wait take a numeric value", () => {
    expect(parseFlags(["--wait", "60"]).flags).toEqual({ wait: "60" });
    expect(parseFlags(["--wait", "dev"])).toEqual({ flags: { wait: true }, lists: {}, positional: ["dev"] });
  });

  it("requires a value for repeatable flags", () => {
    expect(() => parseFlags(["--publish"])).toThrow("--publish needs a value");
  });
});

describe("intFlag", () => {
  it("rejects a non-integer", () => {
    expect(() => intFlag(parseFlags(["--workers", "two"]), "workers")).toThrow(
      '--workers must be a non-negative integer, got "two"',
    );
  });
});

describe("clusterSelector", () => {
  it.each([
    [[], { name: "k3s-default" }],
    [["dev"], { name: "dev" }],
    [["--name", "dev"], { name: "dev" }],
    [["--all"], { all: true }],
  ])("%j selects %j", (args, expected) => {
    expect(clusterSelector(parseFlags(args), "k3s-default")).toEqual(expected);
  });

  it("refuses a name together with --all", () => {
    expect(() => clusterSelector(parseFlags(["--all", "--name", "dev"]), "k3s-default")).toThrow(ValidationError);
  });
});

describe("buildCreateRequest", () => {
  it("maps flags onto the request", () => {
    const parsed = parseFlags([
      "--workers",
      "2",
      "-p",
      "8080:80@workers",
      "-v",
      "/a:/a,/b:/b",
      "--wait",
      "--timeout",
      "30",
      "--port-auto-offset",
      "1",
      "--api-port",
      "7443",
    ]);

    expect(buildCreateRequest(parsed, config)).toEqual({
      name: "k3s-default",
      image: undefined,
      workers: 2,
      publish: ["8080:80@workers"],
      volumes: ["/a:/a", "/b:/b"],
      env: [],
      serverArgs: [],
      apiPort: 7443,
      wait: 30,
      portAutoOffset: 1,
      verbose: false,
      onPullProgress: undefined,
    });
  });

  it("waits forever for a bare --wait", () => {
    expect(buildCreateRequest(parseFlags(["dev", "--wait"]), config).wait).toBe(0);
  });

  it("takes the timeout from --wait itself", () => {
    expect(buildCreateRequest(parseFlags(["dev", "--wait", "45"]), config).wait).toBe(45);
  });

  it("doesn't wait without --wait", () => {
    expect(buildCreateRequest(parseFlags(["dev"]), config).wait).toBeUndefined();
  });

  it("refuses --timeout without --wait", () => {
    expect(() => buildCreateRequest(parseFlags(["--timeout", "30"]), config)).toThrow(
      "Cannot use --timeout without --wait",
    );
  });

  it("hooks up pull progress when verbose", () => {
    expect(buildCreateRequest(parseFlags(["--verbose"]), config).onPullProgress).toBeTypeOf("function");
  });
});

function node(name: string, state: ContainerState): ClusterNode {
  return { id: name, name, role: name.endsWith("server") ? "server" : "worker", state, ports: [] };
}

describe("renderClusterTable", () => {
  it("renders aligned columns with running/total workers", () => {
    const clusters: Cluster[] = [
      {
        name: "dev",
        image: "docker.io/rancher/k3s:v1",
        status: "unhealthy",
        serverPorts: [6443],
        server: node("clusterbox-dev-server", "running"),
        workers: [node("clusterbox-dev-worker-0", "running"), node("clusterbox-dev-worker-1", "exited")],
        workersKnown: true,
      },
      {
        name: "k3s-default",
        image: "rancher/k3s",
        status: "running",
        serverPorts: [6443],
        server: node("clusterbox-k3s-default-server", "running"),
        workers: [],
        workersKnown: true,
      },
    ];

    expect(renderClusterTable(clusters).split("\n")).toEqual([
      "NAME         IMAGE                     STATUS     WORKERS",
      "dev          docker.io/rancher/k3s:v1  unhealthy  1/2",
      "k3s-default  rancher/k3s               running    0/0",
    ]);
  });
});
