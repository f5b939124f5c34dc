#!/usr/bin/env node

/**
 * clusterbox CLI - argument handling and exit codes around ClusterController.
 */

import { ClusterController } from "./cluster/controller.js";
import { createCommand } from "./commands/create.js";
import { credentialsCommand } from "./commands/credentials.js";
import { help } from "./commands/help.js";
import { lifecycleCommand } from "./commands/lifecycle.js";
import { listCommand } from "./commands/list.js";
import { parseFlags } from "./commands/shared.js";
import { loadConfig } from "./core/config.js";
import { ClusterboxError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { createDockerEngine } from "./platform/docker-engine.js";
import { EXIT_FAILURE, EXIT_OK } from "./types.js";

export async function run(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || command === "help" || command === "--help" || command === "-h" || rest.includes("--help") || rest.includes("-h")) {
    help();
    return EXIT_OK;
  }

  try {
    const parsed = parseFlags(rest);
    const config = await loadConfig();
    const controller = new ClusterController(createDockerEngine(), config);

    switch (command) {
      case "check-engine":
      case "ct":
        await controller.checkEngine();
        break;
      case "create":
      case "c":
        await createCommand(controller, config, parsed);
        break;
      case "delete":
      case "d":
        await lifecycleCommand("delete", controller, config, parsed);
        break;
      case "stop":
        await lifecycleCommand("stop", controller, config, parsed);
        break;
      case "start":
        await lifecycleCommand("start", controller, config, parsed);
        break;
      case "list":
      case "ls":
      case "l":
        await listCommand(controller, parsed);
        break;
      case "get-credentials":
      case "get-kubeconfig":
        await credentialsCommand(controller, config, parsed);
        break;
      default:
        logger.error(`Unknown command: ${command}`);
        help();
        return EXIT_FAILURE;
    }
    return EXIT_OK;
  } catch (err: unknown) {
    if (err instanceof ClusterboxError) {
      logger.error(err.message);
      return err.exitCode;
    }
    logger.error(errorMessage(err));
    return EXIT_FAILURE;
  }
}

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error(errorMessage(err));
    process.exitCode = EXIT_FAILURE;
  },
);
