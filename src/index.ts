/**
 * Library entry point.
 */
export { ClusterController, normalizeImage } from "./cluster/controller.js";
export type { ControllerOptions } from "./cluster/controller.js";
export { extractArchivedFile } from "./cluster/credentials.js";
export { allNodeNames, nodeName, validateClusterName } from "./cluster/naming.js";
export type { NodeRole } from "./cluster/naming.js";
export {
  compilePortSpecs,
  createPublishedPorts,
  extractNodes,
  mergePortSpecs,
  parsePortSpec,
  PublishedPorts,
} from "./cluster/ports.js";
export type { RoleGroup } from "./cluster/ports.js";
export { ClusterStateReader } from "./cluster/state-reader.js";
export { classifyClusterStatus } from "./cluster/status.js";
export type { ClusterStatus } from "./cluster/status.js";
export type * from "./cluster/types.js";
export { DEFAULT_CONFIG, loadConfig, resolveConfig } from "./core/config.js";
export type { ClusterboxConfig } from "./core/config.js";
export * from "./errors.js";
export { createDockerEngine, DockerEngine } from "./platform/docker-engine.js";
export type * from "./platform/types.js";
