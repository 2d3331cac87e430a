/**
 * CommandRegistry: the bot's dispatch table, keyed by command name.
 */

import type { IChatRoom } from "@parley/sdk";
import { createLogger } from "@parley/shared";
import type { ReservedCommand } from "../context/commands.js";
import type { AppContext } from "./app-context.js";

const logger = createLogger("CommandRegistry");

export interface CommandInvocation {
  room: IChatRoom;
  sender: string;
  /** Words after the command name. */
  args: string[];
}

export interface BotCommand {
  name: ReservedCommand;
  /** Argument synopsis shown in help, e.g. "<model>". */
  usage?: string;
  description: string;
  execute(app: AppContext, invocation: CommandInvocation): Promise<void>;
}

export interface CommandRegistry {
  register(command: BotCommand): void;
  get(name: string): BotCommand | undefined;
  /** Commands in registration order. */
  list(): BotCommand[];
}

export function createCommandRegistry(): CommandRegistry {
  const commands = new Map<string, BotCommand>();

  return {
    register(command) {
      if (commands.has(command.name)) {
        logger.warn(`Replacing command: ${command.name}`);
      } else {
        logger.debug(`Registering command: ${command.name}`);
      }
      commands.set(command.name, command);
    },

    get(name) {
      return commands.get(name);
    },

    list() {
      return [...commands.values()];
    },
  };
}
