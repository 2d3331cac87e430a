/**
 * Scripted LLMBackend: fixed models, queued replies, recorded calls.
 */

import type { ChatContext, LLMBackend, Result } from "../index.js";
import { ok } from "../index.js";

export interface FakeBackendOptions {
  models?: string[];
  defaultModel?: string;
  /** Replies handed out in order; the last one repeats. Default: ok("ok") */
  replies?: Result<string>[];
}

export class FakeBackend implements LLMBackend {
  readonly calls: ChatContext[] = [];
  private readonly models: string[];
  private readonly fallbackModel: string | undefined;
  private readonly replies: Result<string>[];

  constructor(options: FakeBackendOptions = {}) {
    this.models = options.models ?? [];
    this.fallbackModel = options.defaultModel;
    this.replies = [...(options.replies ?? [ok("ok")])];
  }

  async listModels(): Promise<string[]> {
    return [...this.models];
  }

  async defaultModel(): Promise<string | undefined> {
    return this.fallbackModel;
  }

  async execute(context: ChatContext): Promise<Result<string>> {
    this.calls.push({ ...context, messages: [...context.messages], media: [...context.media] });
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    return reply ?? ok("ok");
  }
}

export function createFakeBackend(options?: FakeBackendOptions): FakeBackend {
  return new FakeBackend(options);
}
