/**
 * Application context: everything a handler needs, built once at start-up.
 */

import type { BotConfig, IChatRoom, IMediaResolver, ITagStore } from "@parley/sdk";
import { ConfigError } from "@parley/sdk";
import type { BackendFactory } from "../backends/index.js";
import { createBackendFactory } from "../backends/index.js";
import type { BackendManager } from "../backends/manager.js";
import { createBackendManager } from "../backends/manager.js";
import { resolveRoomBackends } from "../backends/resolve.js";
import type { ContextBuilder } from "../context/builder.js";
import { DEFAULT_BOT_NAME, createContextBuilder } from "../context/builder.js";
import { botPrefix } from "../context/commands.js";
import type { RateLimiter } from "../limits/rate-limiter.js";
import { createRateLimiter } from "../limits/rate-limiter.js";

export interface AppContext {
  readonly config: BotConfig;
  readonly botName: string;
  /** Command prefix, e.g. "!chaz". */
  readonly prefix: string;
  readonly tagStore: ITagStore;
  readonly mediaResolver: IMediaResolver;
  readonly rateLimiter: RateLimiter;
  readonly contextBuilder: ContextBuilder;
  /** Whether the bot answers this sender. */
  isAllowed(sender: string): boolean;
  /** Backends for a room: its tag backends, then the configured ones. */
  backendsFor(room: IChatRoom): Promise<BackendManager>;
}

export interface AppContextOptions {
  config: BotConfig;
  tagStore: ITagStore;
  mediaResolver: IMediaResolver;
  backendFactory?: BackendFactory;
}

function compileAllowList(pattern: string | undefined): RegExp | undefined {
  if (pattern === undefined) return undefined;
  try {
    return new RegExp(pattern);
  } catch (cause) {
    throw new ConfigError(`Invalid allow_list pattern: ${pattern}`, { cause });
  }
}

export function createAppContext(options: AppContextOptions): AppContext {
  const { config, tagStore, mediaResolver } = options;
  const backendFactory = options.backendFactory ?? createBackendFactory();
  const botName = config.name ?? DEFAULT_BOT_NAME;
  const prefix = botPrefix(botName);
  const allowList = compileAllowList(config.allow_list);

  async function backendsFor(room: IChatRoom): Promise<BackendManager> {
    return createBackendManager(await resolveRoomBackends(tagStore, room, config), backendFactory);
  }

  return {
    config,
    botName,
    prefix,
    tagStore,
    mediaResolver,
    rateLimiter: createRateLimiter({
      messageLimit: config.message_limit,
      roomSizeLimit: config.room_size_limit,
      notice: (limit) => `${prefix} Error: you have used up your message limit of ${limit} messages.`,
    }),
    contextBuilder: createContextBuilder({ config, tagStore, mediaResolver, managerFor: backendsFor }),
    // Without an allow list the bot answers nobody
    isAllowed: (sender) => allowList?.test(sender) ?? false,
    backendsFor,
  };
}
