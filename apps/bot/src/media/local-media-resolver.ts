/**
 * Resolves media sources that are local file paths.
 *
 * Each image is copied into a fresh temp directory so a backend can read
 * it by path; release() deletes the directory.
 */

import { copyFile, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join, resolve } from "node:path";
import type { IMediaResolver, MediaHandle } from "@parley/sdk";
import { TransportError } from "@parley/sdk";
import { createLogger } from "@parley/shared";

const logger = createLogger("LocalMediaResolver");

export interface LocalMediaResolverOptions {
  /** Parent of the per-image temp directories. Default: os.tmpdir() */
  tempRoot?: string;
}

export function createLocalMediaResolver(options: LocalMediaResolverOptions = {}): IMediaResolver {
  const tempRoot = options.tempRoot ?? tmpdir();

  return {
    async resolve(source: string, mimetype?: string): Promise<MediaHandle> {
      const dir = await mkdtemp(join(tempRoot, "parley-media-"));
      const path = join(dir, basename(source));
      try {
        await copyFile(resolve(source), path);
      } catch (err) {
        await rm(dir, { recursive: true, force: true });
        const detail = err instanceof Error ? err.message : String(err);
        throw new TransportError("media", `Cannot copy ${source}: ${detail}`, { cause: err });
      }

      let released = false;
      return {
        path,
        mimetype,
        async release(): Promise<void> {
          if (released) return;
          released = true;
          await rm(dir, { recursive: true, force: true });
          logger.debug("Media released", { path });
        },
      };
    },
  };
}
