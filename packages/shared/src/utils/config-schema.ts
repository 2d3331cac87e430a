/**
 * Zod schema for the bot's YAML config.
 *
 * Keys are snake_case as written in the config file. Unknown keys
 * (protocol login settings and the like) are stripped.
 */

import { z } from "zod";

export const ExampleMessageSchema = z.object({
  user: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["user", "assistant"])),
  message: z.string(),
});

export const RoleDetailsSchema = z.object({
  name: z.string().min(1, "Role name must not be empty"),
  description: z.string().optional(),
  prompt: z.string().optional(),
  example: z.array(ExampleMessageSchema).optional(),
});

export const ModelEntrySchema = z.object({
  name: z.string().min(1, "Model name must not be empty"),
});

const backendName = z
  .string()
  .min(1, "Backend name must not be empty")
  .regex(/^[^.:\s]+$/, "Backend name must not contain '.', ':' or whitespace");

export const AIChatBackendSchema = z.object({
  type: z.literal("aichat"),
  name: backendName.optional(),
  config_dir: z.string().optional(),
  binary: z.string().min(1).optional(),
});

export const OpenAICompatibleBackendSchema = z.object({
  type: z.literal("openaicompatible"),
  name: backendName.optional(),
  api_base: z.string().url("api_base must be a URL").optional(),
  api_key: z.string().optional(),
  models: z.array(ModelEntrySchema).optional(),
});

export const BackendConfigSchema = z.discriminatedUnion("type", [
  AIChatBackendSchema,
  OpenAICompatibleBackendSchema,
]);

export const BotConfigSchema = z.object({
  name: backendName.optional(),
  allow_list: z.string().optional(),
  message_limit: z.number().int().nonnegative().optional(),
  room_size_limit: z.number().int().nonnegative().optional(),
  state_dir: z.string().optional(),
  chat_summary_model: z.string().optional(),
  role: z.string().optional(),
  roles: z.array(RoleDetailsSchema).optional(),
  disable_media_context: z.boolean().optional(),
  backends: z.array(BackendConfigSchema).optional(),
});
