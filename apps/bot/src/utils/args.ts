/**
 * CLI argument parser. Hand-rolled; the command set is small.
 */

import type { ParsedArgs } from "../commands/base.js";

/**
 * Parse CLI arguments into structured ParsedArgs.
 *
 *   parseArgs(["start", "--config", "./bot.yaml"])
 *     → { command: "start", flags: { config: "./bot.yaml" }, positional: [] }
 *   parseArgs(["roles", "--role", "cat"])
 *     → { command: "roles", flags: { role: "cat" }, positional: [] }
 *
 * A flag followed by a value that does not start with "-" takes it;
 * otherwise it is boolean. `--key=value` is accepted too.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = "";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      if (eq > 0) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        flags[body] = next;
        i++;
      } else {
        flags[body] = true;
      }
      continue;
    }

    // Short flag: -h
    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    if (arg.startsWith("-")) continue;

    if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, flags, positional };
}
