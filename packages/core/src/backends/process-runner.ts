/**
 * Async subprocess execution with captured output.
 */

import { spawn } from "node:child_process";

export interface ProcessOutput {
  stdout: Uint8Array;
  stderr: Uint8Array;
  exitCode: number | null;
}

export interface ProcessRunOptions {
  /** Extra environment variables merged over process.env. */
  env?: Record<string, string>;
}

export interface ProcessRunner {
  /** Rejects only when the process cannot be started. */
  run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessOutput>;
}

export function createProcessRunner(): ProcessRunner {
  return {
    run(command, args, options = {}) {
      return new Promise<ProcessOutput>((resolve, reject) => {
        const child = spawn(command, args, {
          stdio: ["ignore", "pipe", "pipe"],
          env: { ...process.env, ...options.env },
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

        child.once("error", reject);
        child.once("close", (exitCode) => {
          resolve({
            stdout: Buffer.concat(stdout),
            stderr: Buffer.concat(stderr),
            exitCode,
          });
        });
      });
    },
  };
}
