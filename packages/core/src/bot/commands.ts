/**
 * Built-in bot commands, addressed as "!<name> <command> [args]".
 */

import type { ChatContext, IChatRoom } from "@parley/sdk";
import { PermissionError, ValidationError } from "@parley/sdk";
import { createLogger, flattenForLog } from "@parley/shared";
import { releaseMedia } from "../context/builder.js";
import { renderTranscript } from "../context/render.js";
import { registerTagBackend, writeModelOverride } from "../tags/tags.js";
import type { AppContext } from "./app-context.js";
import type { BotCommand, CommandRegistry } from "./command-registry.js";
import { TITLE_PROMPT, TOPIC_PROMPT, cleanSummary } from "./summary.js";

const logger = createLogger("Commands");

export const PARTY_NOTICE = ".🎉🎊🥳 let's PARTY!! 🥳🎊🎉";

export async function sendNotice(room: IChatRoom, body: string): Promise<void> {
  await room.send({ format: "plain", body });
}

/** "<prefix> Error: <message>" on a single line. */
export async function sendError(app: AppContext, room: IChatRoom, message: string): Promise<void> {
  const body = `${app.prefix} Error: ${flattenForLog(message)}`;
  logger.withContext({ roomId: room.id }).error(body);
  await sendNotice(room, body);
}

export function createHelpCommand(registry: CommandRegistry): BotCommand {
  return {
    name: "help",
    description: "Show this message",
    async execute(app, { room }) {
      const lines = [`${app.prefix} help`, "", "Available commands:"];
      for (const command of registry.list()) {
        const usage = command.usage ? ` ${command.usage}` : "";
        lines.push(`- ${app.prefix} ${command.name}${usage} - ${command.description}`);
      }
      await sendNotice(room, lines.join("\n"));
    },
  };
}

const party: BotCommand = {
  name: "party",
  description: "Party!",
  async execute(_app, { room }) {
    await sendNotice(room, PARTY_NOTICE);
  },
};

const print: BotCommand = {
  name: "print",
  description: "Print the conversation",
  async execute(app, { room }) {
    const context = await app.contextBuilder.assemble(room);
    await releaseMedia(context.media);
    await sendNotice(room, renderTranscript(context));
  },
};

const send: BotCommand = {
  name: "send",
  usage: "<message>",
  description: "Send a message without context",
  async execute(app, { room, sender, args }) {
    if (await app.rateLimiter.shouldBlock(room, sender)) return;

    const input = args.join(" ");
    // History still decides the model and role
    const history = await app.contextBuilder.assemble(room);
    const context: ChatContext = {
      messages: [{ role: "user", content: input }],
      media: [],
      role: history.role,
    };
    if (history.model !== undefined) context.model = history.model;
    await releaseMedia(history.media);

    logger.withContext({ roomId: room.id, sender }).info(`Request: ${sender} - ${flattenForLog(input)}`);
    const manager = await app.backendsFor(room);
    const result = await manager.execute(context);
    if (!result.ok) {
      await sendError(app, room, result.error);
      return;
    }
    logger.withContext({ roomId: room.id, sender }).info(`Response: ${sender} - ${flattenForLog(result.value)}`);
    await sendNotice(room, result.value);
  },
};

async function listModels(app: AppContext, room: IChatRoom): Promise<void> {
  const context = await app.contextBuilder.assemble(room);
  await releaseMedia(context.media);
  const manager = await app.backendsFor(room);
  const current = context.model ?? (await manager.defaultModel()) ?? "unknown";
  const models = await manager.listKnownModels();
  await sendNotice(
    room,
    `${app.prefix} Current Model: ${current}\n\nKnown Backends:\n${manager.listKnownBackends().join("\n")}\n\nKnown Models:\n${models.join("\n")}`,
  );
}

const list: BotCommand = {
  name: "list",
  description: "List available models",
  async execute(app, { room }) {
    await listModels(app, room);
  },
};

const model: BotCommand = {
  name: "model",
  usage: "<model>",
  description: "Select the model to use",
  async execute(app, { room, args }) {
    const requested = args[0];
    if (requested === undefined) {
      await listModels(app, room);
      return;
    }

    const manager = await app.backendsFor(room);
    if (await manager.isKnownModel(requested)) {
      await sendNotice(room, `${app.prefix} Model set to "${requested}"`);
    } else {
      const valid = await manager.validateModel(requested);
      // Reported to the room by the dispatcher; the tag stays untouched
      if (!valid.ok) throw new ValidationError(valid.error);
      await sendNotice(
        room,
        `${app.prefix} Model ${requested} is unknown, but may be valid. Please manually verify that it is supported by your desired backend.`,
      );
    }
    await writeModelOverride(app.tagStore, room, requested);
  },
};

const backend: BotCommand = {
  name: "backend",
  usage: "<name> <api_base> <api_key>",
  description: "Manually enter an OpenAI Compatible Backend",
  async execute(app, { room, args }) {
    const [name, apiBase, apiKey] = args;
    if (name === undefined || apiBase === undefined || apiKey === undefined) {
      throw new ValidationError(`invalid arguments. Usage: ${app.prefix} backend <name> <api_base> <api_key>`);
    }
    await registerTagBackend(app.tagStore, room, { name, apiBase, apiKey });
    await sendNotice(room, `${app.prefix} Successfully added backend ${name}`);
  },
};

const clear: BotCommand = {
  name: "clear",
  description: "Ignore all messages before this point",
  async execute(app, { room }) {
    await sendNotice(room, `${app.prefix} clear: All messages before this will be ignored`);
  },
};

const rename: BotCommand = {
  name: "rename",
  description: "Rename the room and set the topic based on the chat content",
  async execute(app, { room, sender }) {
    if (await app.rateLimiter.shouldBlock(room, sender)) return;

    const context = await app.contextBuilder.assemble(room);
    try {
      const manager = await app.backendsFor(room);
      const summaryModel = app.config.chat_summary_model ?? context.model;

      const summarize = async (prompt: string): Promise<string | undefined> => {
        const request: ChatContext = {
          ...context,
          messages: [...context.messages, { role: "user", content: prompt }],
        };
        if (summaryModel !== undefined) request.model = summaryModel;
        const result = await manager.execute(request);
        if (!result.ok) {
          await sendError(app, room, result.error);
          return undefined;
        }
        logger.withContext({ roomId: room.id, sender }).info(`Response: ${sender} - ${flattenForLog(result.value)}`);
        return cleanSummary(result.value);
      };

      const title = await summarize(TITLE_PROMPT);
      if (title === undefined) return;
      try {
        await room.setName(title);
      } catch (error) {
        if (!(error instanceof PermissionError)) throw error;
        await sendNotice(room, `${app.prefix} Error: I don't have permission to rename the room`);
        // Topic changes need the same permission
        return;
      }

      const topic = await summarize(TOPIC_PROMPT);
      if (topic === undefined) return;
      try {
        await room.setTopic(topic);
      } catch (error) {
        if (!(error instanceof PermissionError)) throw error;
        await sendNotice(room, `${app.prefix} Error: I don't have permission to set the topic`);
      }
    } finally {
      await releaseMedia(context.media);
    }
  },
};

/** Every command except help, in help order. */
export function createBotCommands(): BotCommand[] {
  return [party, print, send, model, backend, list, clear, rename];
}
