// Types
export type { MessageRole, Message, ChatContext } from "./types/message.js";
export type { ExampleSpeaker, ExampleMessage, RoleDetails } from "./types/role.js";
export type { MediaHandle, IMediaResolver } from "./types/media.js";
export type {
  RoomMessageContent,
  RoomEvent,
  HistoryPage,
  HistoryOptions,
  OutboundMessage,
  IChatRoom,
} from "./types/room.js";
export type { ITagSet, ITagStore } from "./types/tags.js";
export type {
  AIChatBackendConfig,
  OpenAICompatibleBackendConfig,
  BackendConfig,
  LLMBackend,
} from "./types/backend.js";
export type { BotConfig } from "./types/config.js";

export type { Result } from "./types/result.js";
export { ok, err } from "./types/result.js";

// Errors
export {
  BotError,
  TransportError,
  DecodeError,
  ConfigError,
  ValidationError,
  PermissionError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
