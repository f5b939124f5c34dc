/**
 * Port publishing: compiles `--publish` rules into per-node port bindings.
 *
 * A rule has the form `[host-ip:][host-port:]container-port[/protocol](@selector)*`.
 * Selectors are role groups (all, server, master, workers) or node names.
 * Rules without a selector apply to the configured default group.
 */

import { isIP } from "node:net";
import { InvalidPortBindingError, MalformedPortSpecError } from "../errors.js";
import type { HostBinding, Protocol } from "../platform/types.js";
import type { NodeRole } from "./naming.js";

export type RoleGroup = "all" | "server" | "master" | "workers";

export const ROLE_GROUPS: readonly RoleGroup[] = ["all", "server", "master", "workers"];

/** Groups each node role belongs to, in the order their rules are merged. */
export const NODE_ROLE_GROUPS: Record<NodeRole, readonly RoleGroup[]> = {
  server: ["all", "server", "master"],
  worker: ["all", "workers"],
};

const PORT_PART = /^\d+(-\d+)?$/;
const HOST_PORT_PART = /^(\d+(-\d+)?)?$/;
const IPV4_PART = /^[0-9.]+$/;
const PROTOCOL_PART = /^[A-Za-z]+$/;
const SELECTOR = /^[A-Za-z0-9]([A-Za-z0-9-]*[A-Za-z0-9])?$/;

export interface PortSpecParts {
  hostIp: string;
  hostPort: string;
  containerPort: string;
  protocol: string;
}

export interface PortMapping {
  /** `<container-port>/<protocol>` */
  port: string;
  binding: HostBinding;
}

/**
 * Separate the node selectors from the port portion of a rule.
 *
 *   extractNodes("0.0.0.0:8080:80/tcp@server@workers", "server")
 *   // { selectors: ["server", "workers"], portSpec: "0.0.0.0:8080:80/tcp" }
 */
export function extractNodes(spec: string, defaultSelector: string): { selectors: string[]; portSpec: string } {
  const [portSpec, ...selectors] = spec.split("@");
  return { selectors: selectors.length > 0 ? selectors : [defaultSelector], portSpec };
}

/**
 * Split the port portion of a rule into its parts, checking only its shape.
 * Throws MalformedPortSpecError when the text doesn't follow the grammar.
 */
export function splitPortSpec(portSpec: string): PortSpecParts {
  let rest = portSpec;
  let protocol = "tcp";

  const slash = rest.lastIndexOf("/");
  if (slash !== -1) {
    protocol = rest.slice(slash + 1);
    rest = rest.slice(0, slash);
    if (!PROTOCOL_PART.test(protocol)) {
      throw new MalformedPortSpecError(portSpec, `bad protocol "${protocol}"`);
    }
  }

  let hostIp = "";
  if (rest.startsWith("[")) {
    const close = rest.indexOf("]:");
    if (close === -1) throw new MalformedPortSpecError(portSpec, "unterminated IPv6 address");
    hostIp = rest.slice(1, close);
    rest = rest.slice(close + 2);
    if (hostIp.length === 0) throw new MalformedPortSpecError(portSpec, "empty IPv6 address");
  }

  const parts = rest.split(":");
  let hostPort = "";
  let containerPort: string;
  if (parts.length === 1) {
    containerPort = parts[0];
  } else if (parts.length === 2) {
    [hostPort, containerPort] = parts;
  } else if (parts.length === 3 && hostIp === "") {
    [hostIp, hostPort, containerPort] = parts;
    if (!IPV4_PART.test(hostIp)) throw new MalformedPortSpecError(portSpec, `bad host address "${hostIp}"`);
  } else {
    throw new MalformedPortSpecError(portSpec, "too many ':' separated parts");
  }

  if (!PORT_PART.test(containerPort)) {
    throw new MalformedPortSpecError(portSpec, `bad container port "${containerPort}"`);
  }
  if (!HOST_PORT_PART.test(hostPort)) {
    throw new MalformedPortSpecError(portSpec, `bad host port "${hostPort}"`);
  }

  return { hostIp, hostPort, containerPort, protocol };
}

function parseRange(spec: string, text: string): { start: number; end: number } {
  const [first, last = first] = text.split("-");
  const start = Number(first);
  const end = Number(last);
  if (start < 1 || end > 65535) {
    throw new InvalidPortBindingError(spec, `port ${text} is outside 1-65535`);
  }
  if (end < start) {
    throw new InvalidPortBindingError(spec, `port range ${text} ends before it starts`);
  }
  return { start, end };
}

function toProtocol(spec: string, value: string): Protocol {
  const lower = value.toLowerCase();
  if (lower === "tcp" || lower === "udp") return lower;
  throw new InvalidPortBindingError(spec, `unsupported protocol "${value}"`);
}

/**
 * Parse the port portion of a rule into concrete engine mappings, one per
 * container port. Throws InvalidPortBindingError for values the engine would
 * reject (ports out of range, mismatched ranges, unknown protocol, bad IP).
 */
export function parsePortSpec(portSpec: string): PortMapping[] {
  let parts: PortSpecParts;
  try {
    parts = splitPortSpec(portSpec);
  } catch (err: unknown) {
    if (err instanceof MalformedPortSpecError) {
      throw new InvalidPortBindingError(portSpec, err.message);
    }
    throw err;
  }

  const protocol = toProtocol(portSpec, parts.protocol);
  if (parts.hostIp !== "" && isIP(parts.hostIp) === 0) {
    throw new InvalidPortBindingError(portSpec, `bad host address "${parts.hostIp}"`);
  }

  const container = parseRange(portSpec, parts.containerPort);
  const host = parts.hostPort === "" ? undefined : parseRange(portSpec, parts.hostPort);
  const containerCount = container.end - container.start;

  if (host && host.end - host.start !== containerCount && containerCount !== 0) {
    throw new InvalidPortBindingError(portSpec, "host and container port ranges differ in length");
  }

  const mappings: PortMapping[] = [];
  for (let i = 0; i <= containerCount; i++) {
    let hostPort = "";
    if (host) {
      // A host range against a single container port is handed to the engine as-is.
      hostPort = containerCount === 0 && host.end !== host.start ? parts.hostPort : String(host.start + i);
    }
    mappings.push({
      port: `${container.start + i}/${protocol}`,
      binding: { hostIp: parts.hostIp, hostPort },
    });
  }
  return mappings;
}

function shiftHostPort(hostPort: string, n: number): string {
  if (hostPort === "") return hostPort;
  const shifted = hostPort.split("-").map((p) => Number(p) + n);
  if (shifted.some((p) => p < 1 || p > 65535)) {
    throw new InvalidPortBindingError(hostPort, `offset ${n} moves it outside 1-65535`);
  }
  return shifted.join("-");
}

/**
 * Ports a node exposes and the host bindings for each. Every key in
 * `portBindings` is also in `exposedPorts`, and the other way round.
 */
export class PublishedPorts {
  readonly exposedPorts: ReadonlySet<string>;
  readonly portBindings: ReadonlyMap<string, readonly HostBinding[]>;

  private constructor(exposedPorts: Set<string>, portBindings: Map<string, HostBinding[]>) {
    this.exposedPorts = exposedPorts;
    this.portBindings = portBindings;
  }

  static empty(): PublishedPorts {
    return new PublishedPorts(new Set(), new Map());
  }

  /** New set with the mappings from one more port spec appended. */
  addPort(portSpec: string): PublishedPorts {
    const mappings = parsePortSpec(portSpec);
    const exposed = new Set(this.exposedPorts);
    const bindings = new Map<string, HostBinding[]>();
    for (const [key, list] of this.portBindings) bindings.set(key, [...list]);

    for (const { port, binding } of mappings) {
      exposed.add(port);
      const list = bindings.get(port) ?? [];
      list.push(binding);
      bindings.set(port, list);
    }
    return new PublishedPorts(exposed, bindings);
  }

  /**
   * New set with every host port moved up by `n`. Container-side keys are
   * untouched, and engine-assigned (empty) host ports stay empty.
   */
  offset(n: number): PublishedPorts {
    if (!Number.isInteger(n)) {
      throw new InvalidPortBindingError(String(n), "port offset must be an integer");
    }
    const bindings = new Map<string, HostBinding[]>();
    for (const [key, list] of this.portBindings) {
      bindings.set(
        key,
        list.map((b) => ({ hostIp: b.hostIp, hostPort: n === 0 ? b.hostPort : shiftHostPort(b.hostPort, n) })),
      );
    }
    return new PublishedPorts(new Set(this.exposedPorts), bindings);
  }

  toEngine(): { exposedPorts: string[]; portBindings: Record<string, HostBinding[]> } {
    const portBindings: Record<string, HostBinding[]> = {};
    for (const [key, list] of this.portBindings) {
      portBindings[key] = list.map((b) => ({ ...b }));
    }
    return { exposedPorts: [...this.exposedPorts], portBindings };
  }
}

/** Build the binding set for a node. Any bad spec fails the whole set. */
export function createPublishedPorts(specs: readonly string[]): PublishedPorts {
  let published = PublishedPorts.empty();
  for (const spec of specs) {
    published = published.addPort(spec);
  }
  return published;
}

/**
 * Validate every rule and group its port portion by selector.
 *
 * Selectors must be a role group or one of `knownNodeNames`; anything else is
 * rejected so a typo never silently drops a published port.
 */
export function compilePortSpecs(
  specs: readonly string[],
  knownNodeNames: readonly string[],
  defaultSelector: RoleGroup,
): Map<string, string[]> {
  const known = new Set<string>([...ROLE_GROUPS, ...knownNodeNames]);
  const bySelector = new Map<string, string[]>();

  for (const spec of specs) {
    const { selectors, portSpec } = extractNodes(spec, defaultSelector);
    if (portSpec === "") {
      throw new MalformedPortSpecError(spec, "missing container port");
    }
    splitPortSpec(portSpec);

    for (const selector of selectors) {
      if (!SELECTOR.test(selector)) {
        throw new MalformedPortSpecError(spec, `bad node selector "${selector}"`);
      }
      if (!known.has(selector)) {
        throw new MalformedPortSpecError(spec, `unknown node selector "${selector}"`);
      }
      const list = bySelector.get(selector) ?? [];
      list.push(portSpec);
      bySelector.set(selector, list);
    }
  }

  return bySelector;
}

/**
 * Collect the port specs that apply to one node: its role groups first, then
 * rules that name the node directly. Exact duplicates are dropped, first one wins.
 */
export function mergePortSpecs(bySelector: ReadonlyMap<string, readonly string[]>, role: NodeRole, name: string): string[] {
  const merged: string[] = [];
  const seen = new Set<string>();
  for (const selector of [...NODE_ROLE_GROUPS[role], name]) {
    for (const spec of bySelector.get(selector) ?? []) {
      if (seen.has(spec)) continue;
      seen.add(spec);
      merged.push(spec);
    }
  }
  return merged;
}
