/**
 * Reads the YAML config file.
 */

import { readFile } from "node:fs/promises";
import { ConfigError } from "@parley/sdk";
import { parse } from "yaml";

/** Parse a config file into an unvalidated document. */
export async function loadConfigFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (cause) {
    throw new ConfigError(`Cannot read config file ${path}`, { cause });
  }
  return parseConfigText(raw, path);
}

export function parseConfigText(raw: string, source = "config"): unknown {
  try {
    // An empty file is an empty config
    return parse(raw) ?? {};
  } catch (cause) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    throw new ConfigError(`Invalid YAML in ${source}: ${detail}`, { cause });
  }
}
