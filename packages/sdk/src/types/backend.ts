/**
 * Backend configuration and the capability surface shared by adapters.
 */

import type { ChatContext } from "./message.js";
import type { Result } from "./result.js";

export interface ModelEntry {
  /** Passed to the backend to select the model, e.g. "gpt-4o". */
  name: string;
}

/** Subprocess-driven CLI backend. */
export interface AIChatBackendConfig {
  type: "aichat";
  name?: string;
  /** Exported to the binary as AICHAT_CONFIG_DIR. */
  config_dir?: string;
  /** Binary to run. Default: "aichat" */
  binary?: string;
}

/** HTTP backend speaking the OpenAI chat-completion API. */
export interface OpenAICompatibleBackendConfig {
  type: "openaicompatible";
  name?: string;
  api_base?: string;
  api_key?: string;
  /** Not queryable from the API, so declared here. */
  models?: ModelEntry[];
}

export type BackendConfig = AIChatBackendConfig | OpenAICompatibleBackendConfig;

export interface LLMBackend {
  listModels(): Promise<string[]>;
  defaultModel(): Promise<string | undefined>;
  execute(context: ChatContext): Promise<Result<string>>;
}
