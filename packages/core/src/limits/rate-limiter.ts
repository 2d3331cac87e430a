/**
 * RateLimiter: per-sender message quota and room-size gate.
 *
 * Counts live in memory for the life of the process.
 */

import type { IChatRoom } from "@parley/sdk";
import { createLogger } from "@parley/shared";

const logger = createLogger("RateLimiter");

export interface RateLimiterOptions {
  /** Messages each sender may send. 0 or absent = unlimited. */
  messageLimit?: number;
  /** Largest room (active members) to answer in. 0 or absent = unlimited. */
  roomSizeLimit?: number;
  /** Notice sent when a sender runs out of messages. */
  notice(limit: number): string;
}

export interface RateLimiter {
  /**
   * True when the request must not be answered. Oversized rooms are
   * ignored silently; an exhausted quota is announced in the room.
   */
  shouldBlock(room: IChatRoom, sender: string): Promise<boolean>;
  /** Messages counted for a sender so far. */
  count(sender: string): number;
}

function limitOf(value: number | undefined): number {
  return value === undefined || value === 0 ? Number.POSITIVE_INFINITY : value;
}

export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const messageLimit = limitOf(options.messageLimit);
  const roomSizeLimit = limitOf(options.roomSizeLimit);
  const counts = new Map<string, number>();

  return {
    async shouldBlock(room, sender) {
      const roomSize = await room.activeMemberCount();
      if (roomSize > roomSizeLimit) {
        logger
          .withContext({ roomId: room.id, sender })
          .debug(`Room has ${roomSize} members, over the limit of ${roomSizeLimit}`);
        return true;
      }

      // Read and increment without an await in between
      const count = counts.get(sender) ?? 0;
      if (count < messageLimit) {
        counts.set(sender, count + 1);
        return false;
      }

      logger.withContext({ roomId: room.id, sender }).error(`User ${sender} has sent ${count} messages`);
      await room.send({ format: "plain", body: options.notice(messageLimit) });
      return true;
    },

    count(sender) {
      return counts.get(sender) ?? 0;
    },
  };
}
