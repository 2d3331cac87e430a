/**
 * Tag store: per-room persistent key/value namespaces.
 */

import type { IChatRoom } from "./room.js";

export interface ITagSet {
  get(key: string): string | undefined;
  /** Stage a replacement; committed by `sync()`. */
  replace(key: string, value: string): void;
  sync(): Promise<void>;
  /** All keys in discovery order. */
  keys(): string[];
}

export interface ITagStore {
  open(room: IChatRoom, namespace: string): Promise<ITagSet>;
}
