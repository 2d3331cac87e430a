/**
 * OpenAI-compatible backend: chat completions over HTTP.
 *
 * Works with any server implementing the OpenAI chat-completion API.
 * Models cannot be queried, so they come from the config.
 */

import OpenAI from "openai";
import type { ChatContext, LLMBackend, OpenAICompatibleBackendConfig, Result } from "@parley/sdk";
import { err, ok } from "@parley/sdk";
import { createLogger } from "@parley/shared";
import { roleSystemPrompt } from "../roles/resolver.js";

const logger = createLogger("OpenAIBackend");

export const OPENAI_DEFAULT_NAME = "openai";
export const NO_CONTENT_RESPONSE = "Error retrieving response";

/** The slice of a chat-completion response the adapter reads. */
export interface CompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
}

/** The slice of the `openai` client the adapter calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<CompletionResponse>;
    };
  };
}

export interface ClientOptions {
  apiKey: string;
  baseURL: string;
}

export type ChatClientFactory = (options: ClientOptions) => ChatCompletionClient;

export interface OpenAIBackendDeps {
  clientFactory?: ChatClientFactory;
}

export function createChatClient(options: ClientOptions): ChatCompletionClient {
  // No client-side retries
  return new OpenAI({ ...options, maxRetries: 0 });
}

/** Map a context to the request's message list. */
export function toChatMessages(context: ChatContext): OpenAI.ChatCompletionMessageParam[] {
  const messages: OpenAI.ChatCompletionMessageParam[] = [];
  if (context.role) {
    const system = roleSystemPrompt(context.role);
    if (system.length > 0) {
      messages.push({ role: "system", content: system });
    }
  }
  for (const message of context.messages) {
    switch (message.role) {
      case "user":
        messages.push({ role: "user", content: message.content });
        break;
      case "assistant":
        messages.push({ role: "assistant", content: message.content });
        break;
      case "system":
        messages.push({ role: "system", content: message.content });
        break;
    }
  }
  return messages;
}

export function createOpenAIBackend(config: OpenAICompatibleBackendConfig, deps: OpenAIBackendDeps = {}): LLMBackend {
  const clientFactory = deps.clientFactory ?? createChatClient;
  const prefix = `${config.name ?? OPENAI_DEFAULT_NAME}:`;
  const declared = (config.models ?? []).map((m) => m.name);

  function resolveModel(requested: string | undefined): string {
    let model = requested ?? "";
    if (model.startsWith(prefix)) {
      model = model.slice(prefix.length);
    }
    return model.length > 0 ? model : (declared[0] ?? "");
  }

  return {
    async listModels() {
      return [...declared];
    },

    async defaultModel() {
      return declared[0];
    },

    async execute(context: ChatContext): Promise<Result<string>> {
      if (config.api_key === undefined) return err("API key doesn't exist");
      if (config.api_base === undefined) return err("API base doesn't exist");

      const client = clientFactory({ apiKey: config.api_key, baseURL: config.api_base });

      const model = resolveModel(context.model);
      logger.debug(`Requesting chat completion from ${config.api_base} with model ${model}`);

      try {
        const completion = await client.chat.completions.create({
          model,
          messages: toChatMessages(context),
        });
        const content = completion.choices[0]?.message.content;
        return ok(content ?? NO_CONTENT_RESPONSE);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Chat completion failed: ${message}`);
        return err(message);
      }
    },
  };
}
