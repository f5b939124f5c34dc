/**
 * Shared utilities for CLI commands.
 */
import { ValidationError } from "../errors.js";
import type { ClusterSelector } from "../cluster/types.js";

/** Flags that may be given more than once; their values are collected in order. */
const REPEATABLE = new Set(["publish", "volume", "env", "server-arg"]);
/** Flags that never take a value. */
const BOOLEAN = new Set(["all", "verbose", "help"]);

const ALIASES: Record<string, string> = {
  a: "all",
  e: "env",
  h: "help",
  i: "image",
  n: "name",
  p: "publish",
  v: "volume",
  w: "workers",
  x: "server-arg",
};

export interface ParsedFlags {
  flags: Record<string, string | boolean>;
  lists: Record<string, string[]>;
  positional: string[];
}

/** Parse flags and positional args from argv slice */
export function parseFlags(args: string[]): ParsedFlags {
  const flags: Record<string, string | boolean> = {};
  const lists: Record<string, string[]> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    let key = arg.replace(/^--?/, "");
    let value: string | undefined;
    const eq = key.indexOf("=");
    if (eq !== -1) {
      value = key.slice(eq + 1);
      key = key.slice(0, eq);
    }
    key = ALIASES[key] ?? key;

    if (value === undefined && !BOOLEAN.has(key)) {
      const next = args[i + 1];
      // repeatable values may themselves look like flags (-x --disable=traefik)
      const takesNext =
        next !== undefined &&
        (REPEATABLE.has(key) || (!next.startsWith("-") && (key !== "wait" || /^\d+$/.test(next))));
      if (takesNext) {
        value = next;
        i++;
      }
    }

    if (REPEATABLE.has(key)) {
      if (value === undefined) throw new ValidationError(`--${key} needs a value`);
      (lists[key] ??= []).push(value);
    } else {
      flags[key] = value ?? true;
    }
  }

  return { flags, lists, positional };
}

export function stringFlag(parsed: ParsedFlags, key: string): string | undefined {
  const value = parsed.flags[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ValidationError(`--${key} needs a value`);
  return value;
}

export function intFlag(parsed: ParsedFlags, key: string): number | undefined {
  const value = stringFlag(parsed, key);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) throw new ValidationError(`--${key} must be a non-negative integer, got "${value}"`);
  return Number(value);
}

/** `--name` (or a positional name) and `--all` are mutually exclusive. */
export function clusterSelector(parsed: ParsedFlags, defaultName: string): ClusterSelector {
  const name = stringFlag(parsed, "name") ?? parsed.positional[0];
  const all = parsed.flags.all === true;
  if (all && name) {
    throw new ValidationError("Use either --name or --all, not both");
  }
  return all ? { all: true } : { name: name ?? defaultName };
}
