/**
 * Configuration for clusterbox.
 *
 * Defaults are overlaid by an optional config.json in the home directory and
 * then by environment variables. The result is validated and frozen; the
 * controller receives it at construction and never mutates it.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import { CLUSTERBOX_HOME, CONFIG_FILE_NAME } from "../paths.js";

const HOST_NAME_SAFE = /^[A-Za-z0-9]([A-Za-z0-9-]*[A-Za-z0-9])?$/;

export const configSchema = z.object({
  homeDir: z.string().min(1),
  defaultClusterName: z.string().max(35).regex(HOST_NAME_SAFE, "Must be a valid host name"),
  defaultImage: z.string().min(1),
  defaultRegistry: z.string().min(1),
  apiPort: z.number().int().min(1).max(65535),
  readinessMarker: z.string().min(1),
  readinessPollIntervalMs: z.number().int().positive(),
  credentialsContainerPath: z.string().startsWith("/"),
  credentialsFileName: z.string().min(1),
  identityLabel: z.string().min(1),
  containerPrefix: z.string().regex(HOST_NAME_SAFE, "Must be a valid host name"),
  portSelectorDefault: z.enum(["all", "server", "master", "workers"]),
});

export type ClusterboxConfig = Readonly<z.infer<typeof configSchema>>;

export const DEFAULT_CONFIG: ClusterboxConfig = Object.freeze<ClusterboxConfig>({
  homeDir: CLUSTERBOX_HOME,
  defaultClusterName: "k3s-default",
  defaultImage: "docker.io/rancher/k3s:v1.29.4-k3s1",
  defaultRegistry: "docker.io",
  apiPort: 6443,
  readinessMarker: "Running kubelet",
  readinessPollIntervalMs: 1000,
  credentialsContainerPath: "/output/kubeconfig.yaml",
  credentialsFileName: "kubeconfig.yaml",
  identityLabel: "clusterbox",
  containerPrefix: "clusterbox",
  portSelectorDefault: "server",
});

/**
 * Build a frozen config from defaults, an optional object of overrides and
 * environment variables (which win).
 */
export function resolveConfig(
  overrides: Partial<ClusterboxConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): ClusterboxConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG, ...overrides };

  if (env.CLUSTERBOX_HOME) merged.homeDir = env.CLUSTERBOX_HOME;
  if (env.CLUSTERBOX_IMAGE) merged.defaultImage = env.CLUSTERBOX_IMAGE;
  if (env.CLUSTERBOX_CLUSTER) merged.defaultClusterName = env.CLUSTERBOX_CLUSTER;
  if (env.CLUSTERBOX_API_PORT) merged.apiPort = Number(env.CLUSTERBOX_API_PORT);

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }
  return Object.freeze(result.data);
}

/**
 * Load config.json from the clusterbox home directory (if present) and resolve
 * the final configuration.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<ClusterboxConfig> {
  const homeDir = env.CLUSTERBOX_HOME || DEFAULT_CONFIG.homeDir;
  const file = join(homeDir, CONFIG_FILE_NAME);

  let fromFile: Partial<ClusterboxConfig> = {};
  try {
    const data = await readFile(file, "utf-8");
    const parsed: unknown = JSON.parse(data);
    const checked = configSchema.partial().strict().safeParse(parsed);
    if (!checked.success) {
      throw new ValidationError(`Invalid ${file}: ${checked.error.issues.map((i) => i.message).join("; ")}`);
    }
    fromFile = checked.data;
  } catch (err: unknown) {
    if (err instanceof ValidationError) throw err;
    if (err instanceof SyntaxError) {
      throw new ValidationError(`Invalid ${file}: ${err.message}`);
    }
    if (!isMissingFile(err)) throw err;
  }

  return resolveConfig({ homeDir, ...fromFile }, env);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
