/**
 * Bot configuration (mirrors the YAML config file).
 */

import type { BackendConfig } from "./backend.js";
import type { RoleDetails } from "./role.js";

export interface BotConfig {
  /** Bot name; commands are addressed as "!<name> <command>". Default: "chaz" */
  name?: string;
  /** Regex of sender ids the bot answers. Without it the bot answers nobody. */
  allow_list?: string;
  /** Per-sender message limit while running. 0 or absent = unlimited. */
  message_limit?: number;
  /** Largest room (active members) the bot answers in. 0 or absent = unlimited. */
  room_size_limit?: number;
  state_dir?: string;
  /** Model used to summarize chats for room name/topic. */
  chat_summary_model?: string;
  /** Default role name. */
  role?: string;
  roles?: RoleDetails[];
  disable_media_context?: boolean;
  backends?: BackendConfig[];
}
