/**
 * Roles (personas): a system prompt plus optional example dialogue.
 */

export type ExampleSpeaker = "user" | "assistant";

export interface ExampleMessage {
  user: ExampleSpeaker;
  message: string;
}

export interface RoleDetails {
  /** Name used to reference the role from config. */
  name: string;
  description?: string;
  /** System prompt for the model. */
  prompt?: string;
  example?: ExampleMessage[];
}
