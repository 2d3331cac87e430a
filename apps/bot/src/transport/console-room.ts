/**
 * Console transport: a single room whose other member types on stdin.
 *
 * Lines become text events from the console user; `/image <path> [mimetype]`
 * posts an image and `/quit` ends the session. Everything the bot sends is
 * written to the output stream and appended to the room's history.
 */

import { createInterface } from "node:readline";
import type {
  HistoryOptions,
  HistoryPage,
  IChatRoom,
  OutboundMessage,
  RoomEvent,
} from "@parley/sdk";
import { TransportError } from "@parley/sdk";
import type { Bot } from "@parley/core";
import { createLogger } from "@parley/shared";

const logger = createLogger("ConsoleRoom");

export const CONSOLE_USER = "@user:local";
export const CONSOLE_ROOM_ID = "!console:local";
export const CONSOLE_PAGE_SIZE = 10;

export interface ConsoleRoomOptions {
  id?: string;
  ownUserId: string;
  output: NodeJS.WritableStream;
  /** Events per history page. Default: 10 */
  pageSize?: number;
}

export class ConsoleRoom implements IChatRoom {
  readonly id: string;
  readonly ownUserId: string;
  name: string | undefined;
  topic: string | undefined;

  private readonly output: NodeJS.WritableStream;
  private readonly pageSize: number;
  /** Oldest first. */
  private readonly log: RoomEvent[] = [];

  constructor(options: ConsoleRoomOptions) {
    this.id = options.id ?? CONSOLE_ROOM_ID;
    this.ownUserId = options.ownUserId;
    this.output = options.output;
    this.pageSize = options.pageSize ?? CONSOLE_PAGE_SIZE;
  }

  /** Record an event from the other side of the console. */
  receive(event: RoomEvent): void {
    this.log.push(event);
  }

  async messages(options?: HistoryOptions): Promise<HistoryPage> {
    let upper = this.log.length;
    if (options?.from !== undefined) {
      upper = Number(options.from);
      if (!Number.isInteger(upper) || upper < 0 || upper > this.log.length) {
        throw new TransportError("console", `Invalid history token: ${options.from}`);
      }
    }
    const lower = Math.max(0, upper - this.pageSize);
    const chunk = this.log.slice(lower, upper).reverse();
    return lower > 0 ? { chunk, end: String(lower) } : { chunk };
  }

  async activeMemberCount(): Promise<number> {
    return 2;
  }

  async isDirect(): Promise<boolean> {
    return true;
  }

  async send(message: OutboundMessage): Promise<void> {
    this.log.push({ sender: this.ownUserId, content: { msgtype: "text", body: message.body } });
    this.output.write(`${this.ownUserId}: ${message.body}\n`);
  }

  async setName(name: string): Promise<void> {
    this.name = name;
    this.output.write(`* room name is now "${name}"\n`);
  }

  async setTopic(topic: string): Promise<void> {
    this.topic = topic;
    this.output.write(`* room topic is now "${topic}"\n`);
  }
}

export type ConsoleInput =
  | { kind: "event"; event: RoomEvent }
  | { kind: "quit" }
  | { kind: "skip" };

export function parseConsoleLine(line: string, sender = CONSOLE_USER): ConsoleInput {
  const trimmed = line.trim();
  if (trimmed === "") return { kind: "skip" };
  if (trimmed === "/quit") return { kind: "quit" };

  if (trimmed === "/image" || trimmed.startsWith("/image ")) {
    const [, source, mimetype] = trimmed.split(/\s+/);
    if (source === undefined) return { kind: "skip" };
    return { kind: "event", event: { sender, content: { msgtype: "image", source, mimetype } } };
  }

  return { kind: "event", event: { sender, content: { msgtype: "text", body: line } } };
}

export interface ConsoleSessionOptions {
  bot: Bot;
  room: ConsoleRoom;
  input: NodeJS.ReadableStream;
  sender?: string;
}

/**
 * Feed input lines to the bot one at a time until `/quit` or end of input.
 * Handler failures are logged and the session carries on.
 */
export async function runConsoleSession(options: ConsoleSessionOptions): Promise<void> {
  const { bot, room, input } = options;
  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });

  try {
    for await (const line of rl) {
      const parsed = parseConsoleLine(line, options.sender);
      if (parsed.kind === "quit") break;
      if (parsed.kind === "skip") continue;

      room.receive(parsed.event);
      try {
        await bot.handleEvent(room, parsed.event);
      } catch (err) {
        logger.error("Event handling failed", {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  } finally {
    rl.close();
  }
}
