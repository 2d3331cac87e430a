/**
 * Room tag helpers: model override and ad-hoc HTTP backends.
 *
 * Namespaces:
 *   is.chaz.model    default=<model>
 *   is.chaz.backend  chazdefault=<name>, <name>.url=<api base>, <name>.token=<api key>
 */

import type { IChatRoom, ITagStore, OpenAICompatibleBackendConfig } from "@parley/sdk";
import { createLogger } from "@parley/shared";

const logger = createLogger("Tags");

export const MODEL_NAMESPACE = "is.chaz.model";
export const BACKEND_NAMESPACE = "is.chaz.backend";
export const MODEL_KEY = "default";
export const DEFAULT_BACKEND_KEY = "chazdefault";

export interface TagBackendRegistration {
  name: string;
  apiBase: string;
  apiKey: string;
}

export async function readModelOverride(store: ITagStore, room: IChatRoom): Promise<string | undefined> {
  const tags = await store.open(room, MODEL_NAMESPACE);
  return tags.get(MODEL_KEY);
}

export async function writeModelOverride(store: ITagStore, room: IChatRoom, model: string): Promise<void> {
  const tags = await store.open(room, MODEL_NAMESPACE);
  tags.replace(MODEL_KEY, model);
  await tags.sync();
  logger.withContext({ roomId: room.id }).info(`Model override set to ${model}`);
}

/**
 * HTTP backends registered from within the room.
 *
 * Entries missing either the url or the token are skipped. The backend
 * named by `chazdefault` is swapped into the first slot.
 */
export async function readTagBackends(store: ITagStore, room: IChatRoom): Promise<OpenAICompatibleBackendConfig[]> {
  const tags = await store.open(room, BACKEND_NAMESPACE);
  const backends: OpenAICompatibleBackendConfig[] = [];

  for (const key of tags.keys()) {
    const [name, field] = key.split(".");
    if (name === undefined || field === undefined || !field.startsWith("url")) continue;

    const apiBase = tags.get(`${name}.url`);
    const apiKey = tags.get(`${name}.token`);
    if (apiBase === undefined || apiKey === undefined) {
      logger.withContext({ roomId: room.id }).debug(`Skipping incomplete tag backend ${name}`);
      continue;
    }
    backends.push({ type: "openaicompatible", name, api_base: apiBase, api_key: apiKey });
  }

  const preferred = tags.get(DEFAULT_BACKEND_KEY);
  if (preferred !== undefined) {
    const index = backends.findIndex((b) => b.name === preferred);
    const first = backends[0];
    const chosen = backends[index];
    if (index > 0 && first !== undefined && chosen !== undefined) {
      backends[0] = chosen;
      backends[index] = first;
    }
  }

  return backends;
}

/** Store an ad-hoc backend and make it the room default. */
export async function registerTagBackend(
  store: ITagStore,
  room: IChatRoom,
  registration: TagBackendRegistration,
): Promise<void> {
  const tags = await store.open(room, BACKEND_NAMESPACE);
  tags.replace(DEFAULT_BACKEND_KEY, registration.name);
  tags.replace(`${registration.name}.url`, registration.apiBase);
  tags.replace(`${registration.name}.token`, registration.apiKey);
  await tags.sync();
  logger.withContext({ roomId: room.id }).info(`Registered backend ${registration.name}`);
}
