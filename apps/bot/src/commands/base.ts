/**
 * Base command interface for all CLI subcommands.
 */

export interface ParsedArgs {
  /** Command name (e.g., "start") */
  command: string;

  /** Named flags (e.g., { config: "./bot.yaml", verbose: true }) */
  flags: Record<string, string | boolean>;

  /** Positional arguments */
  positional: string[];
}

export interface CliCommand {
  /** Command name (e.g., "start", "roles", "version") */
  name: string;

  /** One line for the help text */
  description: string;

  /** Exit code: 0 = success, 1+ = error */
  execute(args: ParsedArgs): Promise<number>;
}

/** A flag's string value, or undefined when absent or given without one. */
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === "string" ? value : undefined;
}
