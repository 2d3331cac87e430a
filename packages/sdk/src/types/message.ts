/**
 * Core message types for prompt assembly.
 */

import type { MediaHandle } from "./media.js";
import type { RoleDetails } from "./role.js";

export type MessageRole = "user" | "assistant" | "system";

/** A single message in the conversation. */
export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * The unit of work handed to a backend.
 *
 * `messages` and `media` are both oldest-first. Media is not correlated
 * with message positions.
 */
export interface ChatContext {
  messages: Message[];
  model?: string;
  role?: RoleDetails;
  media: MediaHandle[];
}
