/**
 * Backend factory: one adapter per config type.
 */

import type { BackendConfig, LLMBackend } from "@parley/sdk";
import type { AIChatBackendDeps } from "./aichat.js";
import { AICHAT_DEFAULT_NAME, createAIChatBackend } from "./aichat.js";
import type { OpenAIBackendDeps } from "./openai.js";
import { OPENAI_DEFAULT_NAME, createOpenAIBackend } from "./openai.js";

export type BackendDeps = AIChatBackendDeps & OpenAIBackendDeps;

export type BackendFactory = (config: BackendConfig) => LLMBackend;

/** Name shown to users and used as the model prefix. */
export function backendDisplayName(config: BackendConfig): string {
  if (config.name !== undefined) return config.name;
  switch (config.type) {
    case "aichat":
      return AICHAT_DEFAULT_NAME;
    case "openaicompatible":
      return OPENAI_DEFAULT_NAME;
  }
}

export function createBackend(config: BackendConfig, deps: BackendDeps = {}): LLMBackend {
  switch (config.type) {
    case "aichat":
      return createAIChatBackend(config, deps);
    case "openaicompatible":
      return createOpenAIBackend(config, deps);
  }
}

export function createBackendFactory(deps: BackendDeps = {}): BackendFactory {
  return (config) => createBackend(config, deps);
}
