/**
 * Bot: routes room events to commands or the chat handler.
 *
 * Every event is handled independently; shared state lives in the
 * AppContext.
 */

import type { IChatRoom, RoomEvent } from "@parley/sdk";
import type { Logger } from "@parley/shared";
import { createLogger, flattenForLog } from "@parley/shared";
import { releaseMedia } from "../context/builder.js";
import { isCommand, parseCommand } from "../context/commands.js";
import type { AppContext } from "./app-context.js";
import type { CommandRegistry } from "./command-registry.js";
import { createCommandRegistry } from "./command-registry.js";
import { createBotCommands, createHelpCommand, sendError } from "./commands.js";

const logger = createLogger("Bot");

/** Rooms this small count as direct conversations. */
const DIRECT_ROOM_MEMBERS = 3;

export interface Bot {
  readonly commands: CommandRegistry;
  handleEvent(room: IChatRoom, event: RoomEvent): Promise<void>;
}

export function createBot(app: AppContext): Bot {
  const commands = createCommandRegistry();
  commands.register(createHelpCommand(commands));
  for (const command of createBotCommands()) {
    commands.register(command);
  }

  async function shouldAnswer(room: IChatRoom, event: RoomEvent, body: string): Promise<boolean> {
    if (body.startsWith(app.prefix)) return true;
    if (event.mentions?.includes(room.ownUserId)) return true;
    if (await room.isDirect()) return true;
    return (await room.activeMemberCount()) < DIRECT_ROOM_MEMBERS;
  }

  async function chat(room: IChatRoom, event: RoomEvent, body: string, log: Logger): Promise<void> {
    if (!(await shouldAnswer(room, event, body))) return;
    if (await app.rateLimiter.shouldBlock(room, event.sender)) return;

    log.info(`Request: ${event.sender} - ${flattenForLog(body)}`);
    const context = await app.contextBuilder.assemble(room);
    try {
      const manager = await app.backendsFor(room);
      const result = await manager.execute(context);
      if (!result.ok) {
        await sendError(app, room, result.error);
        return;
      }
      log.info(`Response: ${flattenForLog(result.value)}`);
      await room.send({ format: "markdown", body: result.value });
    } finally {
      await releaseMedia(context.media);
    }
  }

  async function dispatch(room: IChatRoom, event: RoomEvent, body: string, log: Logger): Promise<void> {
    if (!isCommand(body)) {
      await chat(room, event, body, log);
      return;
    }

    const parsed = parseCommand(body, app.botName);
    switch (parsed.kind) {
      case "foreign":
        return;
      case "empty":
      case "chat":
        await chat(room, event, body, log);
        return;
      case "reserved": {
        const command = commands.get(parsed.command);
        if (!command) {
          await chat(room, event, body, log);
          return;
        }
        log.child(parsed.command).debug(`Running command ${parsed.command}`);
        await command.execute(app, { room, sender: event.sender, args: parsed.args });
        return;
      }
    }
  }

  return {
    commands,

    async handleEvent(room, event) {
      if (event.content.msgtype !== "text") return;
      if (event.sender === room.ownUserId) return;
      const log = logger.withContext({ roomId: room.id, sender: event.sender });
      if (!app.isAllowed(event.sender)) {
        log.debug(`Ignoring ${event.sender}: not on the allow list`);
        return;
      }

      const body = event.content.body.trimStart();
      try {
        await dispatch(room, event, body, log);
      } catch (error) {
        await sendError(app, room, error instanceof Error ? error.message : String(error));
      }
    },
  };
}
