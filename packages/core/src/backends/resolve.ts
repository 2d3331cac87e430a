/**
 * Per-room backend list: tag-registered backends, then config backends.
 */

import type { BackendConfig, BotConfig, IChatRoom, ITagStore } from "@parley/sdk";
import { createLogger } from "@parley/shared";
import { readTagBackends } from "../tags/tags.js";
import { backendDisplayName } from "./index.js";

const logger = createLogger("BackendResolver");

export const FALLBACK_BACKEND: BackendConfig = { type: "aichat" };

export async function resolveRoomBackends(
  store: ITagStore,
  room: IChatRoom,
  config: BotConfig,
): Promise<BackendConfig[]> {
  const backends: BackendConfig[] = await readTagBackends(store, room);
  const taken = new Set(backends.map(backendDisplayName));

  for (const backend of config.backends ?? []) {
    const name = backendDisplayName(backend);
    if (taken.has(name)) {
      logger.withContext({ roomId: room.id }).debug(`Room backend ${name} shadows the configured one`);
      continue;
    }
    taken.add(name);
    backends.push(backend);
  }

  return backends.length > 0 ? backends : [FALLBACK_BACKEND];
}
