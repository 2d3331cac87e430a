/**
 * Chat room interface: the boundary to the chat-protocol client.
 */

export type RoomMessageContent =
  | { msgtype: "text"; body: string }
  | { msgtype: "image"; source: string; mimetype?: string }
  | { msgtype: "other" };

/** A message event as seen in room history or live sync. */
export interface RoomEvent {
  sender: string;
  content: RoomMessageContent;
  /** User ids mentioned by the event, when the protocol reports them. */
  mentions?: string[];
}

/** One page of backward history, newest event first. */
export interface HistoryPage {
  chunk: RoomEvent[];
  /** Continuation token for the next (older) page; absent on the last page. */
  end?: string;
}

export interface HistoryOptions {
  from?: string;
}

export type OutboundMessage =
  | { format: "plain"; body: string }
  | { format: "markdown"; body: string };

export interface IChatRoom {
  readonly id: string;
  /** The bot's own user id in this room. */
  readonly ownUserId: string;
  /** Backward history read. Rejects on transport failure. */
  messages(options?: HistoryOptions): Promise<HistoryPage>;
  activeMemberCount(): Promise<number>;
  isDirect(): Promise<boolean>;
  send(message: OutboundMessage): Promise<void>;
  /** Rejects with a PermissionError when the server refuses. */
  setName(name: string): Promise<void>;
  /** Rejects with a PermissionError when the server refuses. */
  setTopic(topic: string): Promise<void>;
}
