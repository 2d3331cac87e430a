/**
 * Plain-text prompt rendering for backends that take a single string.
 */

import type { ChatContext, MessageRole } from "@parley/sdk";
import { prependRole } from "../roles/resolver.js";

const ROLE_LABELS: Record<MessageRole, string> = {
  user: "USER",
  assistant: "ASSISTANT",
  system: "SYSTEM",
};

/** One `ROLE: content` line per message, then an open `ASSISTANT: ` turn. */
export function renderTranscript(context: ChatContext): string {
  let prompt = "";
  for (const message of context.messages) {
    prompt += `${ROLE_LABELS[message.role]}: ${message.content}\n`;
  }
  return prompt + "ASSISTANT: ";
}

/** Transcript with the role preamble prepended. */
export function renderPrompt(context: ChatContext): string {
  return prependRole(renderTranscript(context), context.role);
}
