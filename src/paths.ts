import { homedir } from "node:os";
import { join } from "node:path";

export const CLUSTERBOX_HOME = process.env.CLUSTERBOX_HOME || join(homedir(), ".config", "clusterbox");
export const CONFIG_FILE_NAME = "config.json";
