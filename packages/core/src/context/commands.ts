/**
 * In-band command syntax.
 *
 * A message starting with the marker is a command unless the marker is
 * doubled (`!!`), which is ordinary text. Commands addressed to the bot
 * start with `!<name>`.
 */

export const COMMAND_MARKER = "!";

export const RESERVED_COMMANDS = [
  "help",
  "party",
  "send",
  "list",
  "rename",
  "print",
  "model",
  "clear",
  "backend",
] as const;

export type ReservedCommand = (typeof RESERVED_COMMANDS)[number];

export function isCommand(body: string): boolean {
  return body.startsWith(COMMAND_MARKER) && !body.startsWith(COMMAND_MARKER + COMMAND_MARKER);
}

export function botPrefix(botName: string): string {
  return `${COMMAND_MARKER}${botName}`;
}

export function isReservedCommand(word: string | undefined): word is ReservedCommand {
  return RESERVED_COMMANDS.some((c) => c === word);
}

export type ParsedCommand =
  /** A command for some other bot. */
  | { kind: "foreign" }
  /** The bare prefix with nothing after it. */
  | { kind: "empty" }
  | { kind: "reserved"; command: ReservedCommand; args: string[] }
  /** Prefixed free text; `text` is the trimmed remainder. */
  | { kind: "chat"; text: string };

/** Classify a command-marked body. Call only when `isCommand(body)`. */
export function parseCommand(body: string, botName: string): ParsedCommand {
  const prefix = botPrefix(botName);
  if (!body.startsWith(prefix)) {
    return { kind: "foreign" };
  }
  const rest = body.slice(prefix.length).trim();
  if (rest.length === 0) {
    return { kind: "empty" };
  }
  const [word, ...args] = rest.split(/\s+/);
  const command = word?.toLowerCase();
  if (isReservedCommand(command)) {
    return { kind: "reserved", command, args };
  }
  return { kind: "chat", text: rest };
}

/**
 * `!<name> clear` ends history. Matches on the prefix, so the bot's own
 * clear acknowledgement is a marker as well.
 */
export function isClearMarker(body: string, botName: string): boolean {
  return body.startsWith(`${botPrefix(botName)} clear`);
}

/** The model named by a `!<name> model <model>` message, if any. */
export function modelCommandArgument(body: string, botName: string): string | undefined {
  if (!body.startsWith(`${botPrefix(botName)} model`)) return undefined;
  return body.trim().split(/\s+/)[2];
}
