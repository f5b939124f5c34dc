/**
 * `clusterbox list` - print clusters as a table.
 */
import pc from "picocolors";
import type { ClusterController } from "../cluster/controller.js";
import type { ClusterStatus } from "../cluster/status.js";
import type { Cluster } from "../cluster/types.js";
import { logger } from "../logger.js";
import type { ParsedFlags } from "./shared.js";
import { stringFlag } from "./shared.js";

const HEADERS = ["NAME", "IMAGE", "STATUS", "WORKERS"];

function colorStatus(status: ClusterStatus, text: string): string {
  switch (status) {
    case "running":
      return pc.green(text);
    case "stopped":
      return pc.yellow(text);
    case "unhealthy":
    case "dead":
      return pc.red(text);
    default:
      return text;
  }
}

/** One row per cluster; WORKERS shows running/total. */
export function renderClusterTable(clusters: Cluster[], color = false): string {
  const rows = clusters.map((c) => {
    const running = c.workers.filter((w) => w.state === "running").length;
    return [c.name, c.image, c.status, `${running}/${c.workers.length}`];
  });
  const widths = HEADERS.map((h, col) => Math.max(h.length, ...rows.map((r) => r[col].length)));
  const line = (cells: string[], status?: ClusterStatus) =>
    cells
      .map((cell, col) => {
        const padded = cell.padEnd(widths[col]);
        return color && status && col === 2 ? colorStatus(status, padded) : padded;
      })
      .join("  ")
      .trimEnd();

  return [line(HEADERS), ...rows.map((r, i) => line(r, clusters[i].status))].join("\n");
}

export async function listCommand(controller: ClusterController, parsed: ParsedFlags): Promise<void> {
  const name = stringFlag(parsed, "name") ?? parsed.positional[0];
  const clusters = await controller.list(name ? { name } : { all: true });
  if (clusters.length === 0) {
    logger.info("No clusters found!");
    return;
  }
  process.stdout.write(`${renderClusterTable(clusters, pc.isColorSupported)}\n`);
}
