#!/usr/bin/env node

/**
 * CLI entry point.
 *
 *   parley start --config <file.yaml> [--room <id>]
 *   parley roles [--config <file.yaml>] [--role <name>]
 *   parley version [--verbose]
 *   parley (no args) → start
 */

import { parseArgs } from "./utils/args.js";
import type { CliCommand } from "./commands/base.js";
import { StartCommand } from "./commands/start.js";
import { RolesCommand } from "./commands/roles.js";
import { VersionCommand } from "./commands/version.js";

function printHelp(commands: CliCommand[]): void {
  console.log("parley - chat room LLM bot");
  console.log("");
  console.log("Usage: parley <command> [options]");
  console.log("");
  console.log("Commands:");
  for (const command of commands) {
    console.log(`  ${command.name.padEnd(10)} ${command.description}`);
  }
  console.log("");
  console.log("Options:");
  console.log("  --config <path>  Path to the YAML config file");
  console.log("  --room <id>      Room id for the console session");
  console.log("  --role <name>    Role to describe (roles)");
  console.log("  --verbose        Show detailed output");
  console.log("  --help, -h       Show this help message");
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  const commands: CliCommand[] = [new StartCommand(), new RolesCommand(), new VersionCommand()];

  if (parsed.flags.help === true || parsed.flags.h === true) {
    printHelp(commands);
    return 0;
  }

  if (parsed.command === "") {
    return new StartCommand().execute(parsed);
  }

  const command = commands.find((cmd) => cmd.name === parsed.command);
  if (!command) {
    console.error(`Unknown command: ${parsed.command}`);
    console.error(`Available commands: ${commands.map((cmd) => cmd.name).join(", ")}`);
    return 1;
  }

  return command.execute(parsed);
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
