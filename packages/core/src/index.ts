// Roles
export { BUILTIN_ROLES, resolveRole, prependRole, roleSystemPrompt, describeRole } from "./roles/resolver.js";

// Tags
export {
  MODEL_NAMESPACE,
  BACKEND_NAMESPACE,
  readModelOverride,
  writeModelOverride,
  readTagBackends,
  registerTagBackend,
} from "./tags/tags.js";
export type { TagBackendRegistration } from "./tags/tags.js";

// Backends
export { backendDisplayName, createBackend, createBackendFactory } from "./backends/index.js";
export type { BackendDeps, BackendFactory } from "./backends/index.js";
export { createAIChatBackend } from "./backends/aichat.js";
export type { AIChatBackendDeps } from "./backends/aichat.js";
export { createOpenAIBackend, createChatClient } from "./backends/openai.js";
export type { OpenAIBackendDeps, ChatCompletionClient, ChatClientFactory } from "./backends/openai.js";
export { createProcessRunner } from "./backends/process-runner.js";
export type { ProcessRunner, ProcessOutput, ProcessRunOptions } from "./backends/process-runner.js";
export { createBackendManager, NO_BACKENDS_ERROR } from "./backends/manager.js";
export type { BackendManager } from "./backends/manager.js";
export { resolveRoomBackends } from "./backends/resolve.js";

// Context
export { createContextBuilder, releaseMedia, DEFAULT_BOT_NAME } from "./context/builder.js";
export type { ContextBuilder, ContextBuilderDeps } from "./context/builder.js";
export { renderTranscript, renderPrompt } from "./context/render.js";
export { isCommand, parseCommand, botPrefix, RESERVED_COMMANDS } from "./context/commands.js";
export type { ParsedCommand, ReservedCommand } from "./context/commands.js";

// Limits
export { createRateLimiter } from "./limits/rate-limiter.js";
export type { RateLimiter, RateLimiterOptions } from "./limits/rate-limiter.js";

// Bot
export { createAppContext } from "./bot/app-context.js";
export type { AppContext, AppContextOptions } from "./bot/app-context.js";
export { createBot } from "./bot/bot.js";
export type { Bot } from "./bot/bot.js";
export { PARTY_NOTICE } from "./bot/commands.js";
export type { BotCommand, CommandInvocation, CommandRegistry } from "./bot/command-registry.js";
