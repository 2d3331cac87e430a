/**
 * ContextBuilder: reconstructs a ChatContext from room history.
 *
 * History is read backward, page by page, so messages are collected
 * newest first and reversed once at the end. A `clear` command ends the
 * scan. The first valid `model` command found (i.e. the newest) selects
 * the model unless a room tag overrides it.
 */

import type {
  BotConfig,
  ChatContext,
  HistoryPage,
  IChatRoom,
  IMediaResolver,
  ITagStore,
  MediaHandle,
  Message,
  RoomEvent,
} from "@parley/sdk";
import { TransportError } from "@parley/sdk";
import { createLogger } from "@parley/shared";
import type { BackendManager } from "../backends/manager.js";
import { resolveRole } from "../roles/resolver.js";
import { readModelOverride } from "../tags/tags.js";
import { isClearMarker, isCommand, modelCommandArgument, parseCommand } from "./commands.js";

const logger = createLogger("ContextBuilder");

export const DEFAULT_BOT_NAME = "chaz";

export interface ContextBuilderDeps {
  config: BotConfig;
  tagStore: ITagStore;
  mediaResolver: IMediaResolver;
  /** Backend manager for the room, used to validate in-band model commands. */
  managerFor(room: IChatRoom): Promise<BackendManager>;
}

export interface ContextBuilder {
  /** Rejects with TransportError when history cannot be read. */
  assemble(room: IChatRoom): Promise<ChatContext>;
}

interface ScanState {
  messages: Message[];
  media: MediaHandle[];
  model?: string;
  manager?: BackendManager;
}

/** Release media handles, logging failures. */
export async function releaseMedia(media: readonly MediaHandle[]): Promise<void> {
  for (const handle of media) {
    try {
      await handle.release();
    } catch (error) {
      logger.warn(`Failed to release ${handle.path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export function createContextBuilder(deps: ContextBuilderDeps): ContextBuilder {
  const { config, tagStore, mediaResolver } = deps;
  const botName = config.name ?? DEFAULT_BOT_NAME;
  const mediaEnabled = !(config.disable_media_context ?? false);

  /** Returns false when the scan must stop. */
  async function visit(room: IChatRoom, event: RoomEvent, state: ScanState): Promise<boolean> {
    const { content } = event;
    const fromBot = event.sender === room.ownUserId;

    switch (content.msgtype) {
      case "image": {
        if (!mediaEnabled) return true;
        try {
          state.media.push(await mediaResolver.resolve(content.source, content.mimetype));
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          logger.withContext({ roomId: room.id }).warn(`Skipping image ${content.source}: ${reason}`);
        }
        return true;
      }

      case "text": {
        const body = content.body;
        if (!isCommand(body)) {
          state.messages.push({ role: fromBot ? "assistant" : "user", content: body });
          return true;
        }

        if (isClearMarker(body, botName)) return false;

        const requested = modelCommandArgument(body, botName);
        if (requested !== undefined && state.model === undefined) {
          state.manager ??= await deps.managerFor(room);
          const valid = await state.manager.validateModel(requested);
          if (valid.ok) state.model = requested;
        }

        const parsed = parseCommand(body, botName);
        if (parsed.kind === "chat") {
          state.messages.push({ role: fromBot ? "assistant" : "user", content: parsed.text });
        }
        return true;
      }

      case "other":
        return true;
    }
  }

  return {
    async assemble(room) {
      const state: ScanState = { messages: [], media: [] };
      let from: string | undefined;
      let override: string | undefined;

      try {
        scan: for (;;) {
          let page: HistoryPage;
          try {
            page = await room.messages(from === undefined ? {} : { from });
          } catch (cause) {
            const message = cause instanceof Error ? cause.message : String(cause);
            throw new TransportError("history", message, { cause });
          }

          for (const event of page.chunk) {
            if (!(await visit(room, event, state))) break scan;
          }

          if (page.end === undefined) break;
          from = page.end;
        }
        override = await readModelOverride(tagStore, room);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.withContext({ roomId: room.id }).error(`Context assembly failed: ${reason}`);
        await releaseMedia(state.media);
        throw error;
      }

      state.messages.reverse();
      state.media.reverse();

      const context: ChatContext = {
        messages: state.messages,
        media: state.media,
        role: resolveRole(config.role, config.roles),
      };
      if (state.model !== undefined) context.model = state.model;

      // The room tag always wins over in-band model commands
      if (override !== undefined) context.model = override;

      logger
        .withContext({ roomId: room.id })
        .debug(`Assembled ${context.messages.length} messages, ${context.media.length} media`);
      return context;
    },
  };
}
