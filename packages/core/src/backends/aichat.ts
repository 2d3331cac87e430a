/**
 * AIChat backend: drives the `aichat` CLI as a subprocess.
 *
 * Models come from `--list-models`, the default from `--info`, and a
 * chat is one `--no-stream` invocation with the rendered prompt as the
 * final argument.
 */

import type { AIChatBackendConfig, ChatContext, LLMBackend, Result } from "@parley/sdk";
import { DecodeError, err, ok } from "@parley/sdk";
import { createLogger, flattenForLog } from "@parley/shared";
import { renderPrompt } from "../context/render.js";
import type { ProcessOutput, ProcessRunner } from "./process-runner.js";
import { createProcessRunner } from "./process-runner.js";

const logger = createLogger("AIChatBackend");

export const AICHAT_DEFAULT_BINARY = "aichat";
export const AICHAT_DEFAULT_NAME = "aichat";

export interface AIChatBackendDeps {
  runner?: ProcessRunner;
}

/** Strict UTF-8 decode; throws DecodeError naming the stream. */
function decode(bytes: Uint8Array, stream: "stdout" | "stderr"): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (cause) {
    throw new DecodeError(stream, { cause });
  }
}

export function createAIChatBackend(config: AIChatBackendConfig, deps: AIChatBackendDeps = {}): LLMBackend {
  const runner = deps.runner ?? createProcessRunner();
  const binary = config.binary ?? AICHAT_DEFAULT_BINARY;
  const prefix = `${config.name ?? AICHAT_DEFAULT_NAME}:`;
  const env = config.config_dir !== undefined ? { AICHAT_CONFIG_DIR: config.config_dir } : undefined;

  async function stdoutLines(flag: string): Promise<string[]> {
    try {
      const output = await runner.run(binary, [flag], { env });
      return decode(output.stdout, "stdout").split("\n");
    } catch (error) {
      logger.warn(`${binary} ${flag} failed: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  return {
    async listModels() {
      return (await stdoutLines("--list-models")).filter((line) => line.trim().length > 0);
    },

    async defaultModel() {
      const line = (await stdoutLines("--info")).find((l) => l.startsWith("model"));
      return line?.trim().split(/\s+/)[1];
    },

    async execute(context: ChatContext): Promise<Result<string>> {
      const args = ["--no-stream"];
      if (context.model !== undefined) {
        const model = context.model.startsWith(prefix) ? context.model.slice(prefix.length) : context.model;
        args.push("--model", model);
      }
      if (context.media.length > 0) {
        args.push("--file", ...context.media.map((m) => m.path));
      }
      args.push("--", renderPrompt(context));

      logger.debug(`Running ${binary} ${args.slice(0, -1).join(" ")}`);

      let output: ProcessOutput;
      try {
        output = await runner.run(binary, args, { env });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Failed to run ${binary}: ${message}`);
        return err(`Failed to run ${binary}: ${message}`);
      }

      try {
        if (output.stdout.length === 0) {
          // No answer means the CLI reported a problem on stderr
          const stderr = decode(output.stderr, "stderr");
          logger.warn(`${binary} produced no output: ${flattenForLog(stderr)}`);
          return err(stderr);
        }
        return ok(decode(output.stdout, "stdout"));
      } catch (error) {
        if (error instanceof DecodeError) {
          logger.error(error.message);
          return err(error.message);
        }
        throw error;
      }
    },
  };
}
