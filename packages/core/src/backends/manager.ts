/**
 * BackendManager: ordered backends with name-prefixed model routing.
 *
 * With a single backend, model names are bare. With several, each model
 * is listed as "<backend>:<model>" and a request is routed to the backend
 * whose display name matches the model's first segment, else the first.
 */

import type { BackendConfig, ChatContext, LLMBackend, Result } from "@parley/sdk";
import { err, ok } from "@parley/sdk";
import { createLogger } from "@parley/shared";
import type { BackendFactory } from "./index.js";
import { backendDisplayName, createBackendFactory } from "./index.js";

const logger = createLogger("BackendManager");

export const NO_BACKENDS_ERROR = "No backends configured";
export const UNPREFIXED_MODEL_ERROR =
  "Multiple backends exist, please specify the model name with the backend prepended, e.g. openai:gpt-4o or aichat:ollama:llama3";

export interface BackendManager {
  listKnownBackends(): string[];
  /** Models the backends report. A model may be valid without being listed. */
  listKnownModels(): Promise<string[]>;
  isKnownModel(model: string): Promise<boolean>;
  validateModel(model: string): Promise<Result<void>>;
  defaultModel(): Promise<string | undefined>;
  execute(context: ChatContext): Promise<Result<string>>;
}

interface Entry {
  name: string;
  backend: LLMBackend;
}

export function createBackendManager(
  configs: readonly BackendConfig[],
  factory: BackendFactory = createBackendFactory(),
): BackendManager {
  const entries: Entry[] = configs.map((config) => ({
    name: backendDisplayName(config),
    backend: factory(config),
  }));
  const namespaced = entries.length > 1;

  function qualify(entry: Entry, model: string): string {
    return namespaced ? `${entry.name}:${model}` : model;
  }

  async function listKnownModels(): Promise<string[]> {
    const lists = await Promise.all(
      entries.map(async (entry) => (await entry.backend.listModels()).map((m) => qualify(entry, m))),
    );
    return lists.flat();
  }

  async function isKnownModel(model: string): Promise<boolean> {
    return (await listKnownModels()).includes(model);
  }

  return {
    listKnownBackends() {
      return entries.map((e) => e.name);
    },

    listKnownModels,
    isKnownModel,

    async validateModel(model) {
      if (await isKnownModel(model)) return ok(undefined);
      // A lone backend gets any model name as-is
      if (entries.length === 1) return ok(undefined);
      if (entries.some((e) => model.startsWith(`${e.name}:`))) return ok(undefined);
      return err(UNPREFIXED_MODEL_ERROR);
    },

    async defaultModel() {
      const first = entries[0];
      if (!first) return undefined;
      const model = await first.backend.defaultModel();
      return model === undefined ? undefined : qualify(first, model);
    },

    async execute(context) {
      const first = entries[0];
      if (!first) return err(NO_BACKENDS_ERROR);

      let target = first;
      if (context.model !== undefined) {
        const wanted = context.model.split(":")[0];
        target = entries.find((e) => e.name === wanted) ?? first;
      }
      logger.debug(`Dispatching to backend ${target.name}`);
      const stop = logger.time(`Backend ${target.name}`);
      try {
        return await target.backend.execute(context);
      } finally {
        stop();
      }
    },
  };
}
