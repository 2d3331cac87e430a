import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable, Writable } from "node:stream";
import { PARTY_NOTICE } from "@parley/core";
import { StartCommand } from "../../src/commands/start.js";
import type { ParsedArgs } from "../../src/commands/base.js";

function sink(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf-8"));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

describe("StartCommand", () => {
  let dir: string;
  let error: MockInstance<typeof console.error>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "parley-start-test-"));
    error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function start(flags: Record<string, string | boolean>, lines: string[] = []) {
    const output = sink();
    const command = new StartCommand({ input: Readable.from(lines), output: output.stream, env: {} });
    const args: ParsedArgs = { command: "start", flags, positional: [] };
    return { run: () => command.execute(args), output };
  }

  it("fails without --config", async () => {
    expect(await start({}).run()).toBe(1);
    expect(error).toHaveBeenCalledWith("[cli] Missing --config <path>");
  });

  it("fails on a config that does not validate", async () => {
    const path = join(dir, "bot.yaml");
    await writeFile(path, "message_limit: lots\n");

    expect(await start({ config: path }).run()).toBe(1);
    expect(error).toHaveBeenCalledWith("ERROR: message_limit");
    expect(error).toHaveBeenCalledWith("Fix these errors and try again.");
  });

  it("runs a console session and persists tags under state_dir", async () => {
    const path = join(dir, "bot.yaml");
    const stateDir = join(dir, "state");
    await writeFile(path, `allow_list: "^@user:local$"\nstate_dir: ${stateDir}\n`);

    const session = start({ config: path, room: "!test:local" }, [
      "!chaz party\n",
      "!chaz backend home https://api.example.org/v1 test-secret\n",
      "/quit\n",
    ]);
    expect(await session.run()).toBe(0);

    expect(session.output.text()).toBe(
      `@chaz:local: ${PARTY_NOTICE}\n@chaz:local: !chaz Successfully added backend home\n`,
    );
    const tags: unknown = JSON.parse(await readFile(join(stateDir, "tags.json"), "utf-8"));
    expect(tags).toEqual({
      "!test:local": {
        "is.chaz.backend": {
          chazdefault: "home",
          "home.url": "https://api.example.org/v1",
          "home.token": "test-secret",
        },
      },
    });
  });
});
