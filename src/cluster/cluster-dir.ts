/**
 * Per-cluster bookkeeping directory under the clusterbox home
 * (holds the extracted credentials file).
 */

import { existsSync } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import type { ClusterboxConfig } from "../core/config.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { validateClusterName } from "./naming.js";

export function clusterDir(config: ClusterboxConfig, name: string): string {
  validateClusterName(name);
  return join(config.homeDir, name);
}

export function credentialsPath(config: ClusterboxConfig, name: string): string {
  return join(clusterDir(config, name), config.credentialsFileName);
}

export async function ensureClusterDir(config: ClusterboxConfig, name: string): Promise<string> {
  const dir = clusterDir(config, name);
  await mkdir(dir, { recursive: true });
  return dir;
}

/** Best-effort: a directory that can't be removed is only worth a warning. */
export async function removeClusterDir(config: ClusterboxConfig, name: string): Promise<void> {
  const dir = clusterDir(config, name);
  if (!existsSync(dir)) return;
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (err: unknown) {
    logger.warn(`Couldn't delete cluster directory [${dir}], you might want to delete it manually: ${errorMessage(err)}`);
  }
}
