/**
 * File-backed tag store.
 *
 * Layout of `<state_dir>/tags.json`:
 *   { "<room id>": { "<namespace>": { "<key>": "<value>" } } }
 *
 * A tag set reads a snapshot taken at open(). sync() re-reads the file
 * under a per-file lock, merges the staged replacements and writes it back
 * with tmp file + rename.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { IChatRoom, ITagSet, ITagStore } from "@parley/sdk";
import { TransportError } from "@parley/sdk";
import { createLogger, withFileLock } from "@parley/shared";
import { z } from "zod";

const logger = createLogger("FileTagStore");

export const TAG_FILE_NAME = "tags.json";

const TagFileSchema = z.record(z.record(z.record(z.string())));

type TagFile = z.infer<typeof TagFileSchema>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileTagStore implements ITagStore {
  readonly path: string;

  constructor(stateDir: string) {
    this.path = join(stateDir, TAG_FILE_NAME);
  }

  async open(room: IChatRoom, namespace: string): Promise<ITagSet> {
    const file = await this.read();
    const committed = new Map(Object.entries(file[room.id]?.[namespace] ?? {}));
    const pending = new Map<string, string>();

    return {
      get: (key) => pending.get(key) ?? committed.get(key),
      replace: (key, value) => {
        pending.set(key, value);
      },
      sync: async () => {
        if (pending.size === 0) return;
        const staged = new Map(pending);
        await this.commit(room.id, namespace, staged);
        for (const [key, value] of staged) {
          committed.set(key, value);
          if (pending.get(key) === value) pending.delete(key);
        }
      },
      keys: () => {
        const keys = [...committed.keys()];
        for (const key of pending.keys()) {
          if (!committed.has(key)) keys.push(key);
        }
        return keys;
      },
    };
  }

  private async read(): Promise<TagFile> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw new TransportError("tags", `Cannot read ${this.path}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new TransportError("tags", `Corrupt tag file ${this.path}`, { cause: err });
    }
    const parsed = TagFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransportError("tags", `Corrupt tag file ${this.path}`, { cause: parsed.error });
    }
    return parsed.data;
  }

  private async commit(roomId: string, namespace: string, tags: Map<string, string>): Promise<void> {
    await withFileLock(this.path, async () => {
      const file = await this.read();
      const room = (file[roomId] ??= {});
      const entries = (room[namespace] ??= {});
      for (const [key, value] of tags) {
        entries[key] = value;
      }

      await mkdir(dirname(this.path), { recursive: true });
      const tmp = `${this.path}.tmp`;
      await writeFile(tmp, JSON.stringify(file, null, 2), { encoding: "utf-8", mode: 0o600 });
      await rename(tmp, this.path);
      logger.withContext({ roomId }).debug("Tags synced", { namespace, keys: [...tags.keys()] });
    });
  }
}

export function createFileTagStore(stateDir: string): FileTagStore {
  return new FileTagStore(stateDir);
}
