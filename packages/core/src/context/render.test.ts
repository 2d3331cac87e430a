import { describe, it, expect } from "vitest";
import type { ChatContext } from "@parley/sdk";
import { renderPrompt, renderTranscript } from "./render.js";

function context(overrides: Partial<ChatContext> = {}): ChatContext {
  return {
    messages: [
      { role: "user", content: "hello" },
      { role: "assistant", content: "hi" },
      { role: "user", content: "how are you" },
    ],
    media: [],
    ...overrides,
  };
}

describe("renderTranscript", () => {
  it("labels each message and leaves the assistant turn open", () => {
    expect(renderTranscript(context())).toBe("USER: hello\nASSISTANT: hi\nUSER: how are you\nASSISTANT: ");
  });

  it("renders system messages", () => {
    expect(renderTranscript(context({ messages: [{ role: "system", content: "be brief" }] }))).toBe(
      "SYSTEM: be brief\nASSISTANT: ",
    );
  });

  it("renders an empty context as the open turn only", () => {
    expect(renderTranscript(context({ messages: [] }))).toBe("ASSISTANT: ");
  });
});

describe("renderPrompt", () => {
  it("prepends the role", () => {
    const rendered = renderPrompt(
      context({
        messages: [{ role: "user", content: "list files" }],
        role: { name: "sh", prompt: "Answer with a shell command." },
      }),
    );
    expect(rendered).toBe("Answer with a shell command.\nUSER: list files\nASSISTANT: ");
  });

  it("matches the transcript without a role", () => {
    expect(renderPrompt(context())).toBe(renderTranscript(context()));
  });
});
