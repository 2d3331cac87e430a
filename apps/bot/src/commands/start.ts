/**
 * Start command - run the bot against a console room.
 */

import { resolve } from "node:path";
import type { BotConfig } from "@parley/sdk";
import type { AppContext } from "@parley/core";
import { DEFAULT_BOT_NAME, createAppContext, createBot } from "@parley/core";
import { createLogger } from "@parley/shared";
import type { CliCommand, ParsedArgs } from "./base.js";
import { stringFlag } from "./base.js";
import { loadConfigFile } from "../utils/config-loader.js";
import { validateConfig } from "../utils/config-validator.js";
import type { ConfigValidationError } from "../utils/config-validator.js";
import { resolveStateDir } from "../utils/state-dir.js";
import { createFileTagStore } from "../tags/file-tag-store.js";
import { createLocalMediaResolver } from "../media/local-media-resolver.js";
import { ConsoleRoom, runConsoleSession } from "../transport/console-room.js";

const logger = createLogger("Start");

export interface StartCommandOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
}

export class StartCommand implements CliCommand {
  name = "start";
  description = "Run the bot in a console room";

  constructor(private readonly options: StartCommandOptions = {}) {}

  async execute(args: ParsedArgs): Promise<number> {
    const configPath = stringFlag(args, "config");
    if (configPath === undefined) {
      console.error("[cli] Missing --config <path>");
      return 1;
    }

    const config = await this.loadConfig(resolve(configPath));
    if (!config) return 1;

    const botName = config.name ?? DEFAULT_BOT_NAME;
    const stateDir = resolveStateDir(config.state_dir, botName, { env: this.options.env });
    logger.info("Starting", { botName, stateDir });

    let app: AppContext;
    try {
      app = createAppContext({
        config,
        tagStore: createFileTagStore(stateDir),
        mediaResolver: createLocalMediaResolver(),
      });
    } catch (err) {
      console.error(`[cli] ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }

    const room = new ConsoleRoom({
      id: stringFlag(args, "room"),
      ownUserId: `@${botName}:local`,
      output: this.options.output ?? process.stdout,
    });
    await runConsoleSession({
      bot: createBot(app),
      room,
      input: this.options.input ?? process.stdin,
    });

    logger.info("Console session ended");
    return 0;
  }

  private async loadConfig(configPath: string): Promise<BotConfig | undefined> {
    let document: unknown;
    try {
      document = await loadConfigFile(configPath);
    } catch (err) {
      console.error(
        `[cli] Failed to load config ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return undefined;
    }

    const validation = validateConfig(document);
    if (!validation.valid || !validation.config) {
      this.printValidationErrors(validation.errors ?? []);
      return undefined;
    }
    for (const warning of validation.errors ?? []) {
      console.warn(`[cli] Warning: ${warning.message} (${warning.path})`);
    }
    console.error(`[cli] Loaded config: ${configPath}`);
    return validation.config;
  }

  private printValidationErrors(errors: ConfigValidationError[]): void {
    console.error("[cli] Config validation failed:\n");
    for (const err of errors) {
      console.error(`${err.severity.toUpperCase()}: ${err.path}`);
      console.error(`  ${err.message}`);
      if (err.suggestion) {
        console.error(`  Suggestion: ${err.suggestion}`);
      }
      console.error("");
    }
    console.error("Fix these errors and try again.");
  }
}
