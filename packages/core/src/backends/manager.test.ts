import { describe, it, expect } from "vitest";
import type { BackendConfig } from "@parley/sdk";
import { err, ok } from "@parley/sdk";
import { createFakeBackend } from "@parley/sdk/testing";
import type { FakeBackend } from "@parley/sdk/testing";
import { createBackendManager } from "./manager.js";

function managerWith(entries: Array<[BackendConfig, FakeBackend]>) {
  return createBackendManager(
    entries.map(([config]) => config),
    (config) => {
      const match = entries.find(([c]) => c === config);
      if (!match) throw new Error("unexpected backend config");
      return match[1];
    },
  );
}

describe("BackendManager", () => {
  describe("with one backend", () => {
    const backend = createFakeBackend({ models: ["llama3", "mistral"], defaultModel: "llama3" });
    const manager = managerWith([[{ type: "aichat" }, backend]]);

    it("lists bare model names", async () => {
      expect(await manager.listKnownModels()).toEqual(["llama3", "mistral"]);
      expect(await manager.defaultModel()).toBe("llama3");
    });

    it("accepts any model", async () => {
      expect(await manager.validateModel("anything")).toEqual({ ok: true, value: undefined });
    });

    it("reports known models", async () => {
      expect(await manager.isKnownModel("mistral")).toBe(true);
      expect(await manager.isKnownModel("aichat:mistral")).toBe(false);
    });
  });

  describe("with two backends", () => {
    const a = createFakeBackend({ models: ["gpt-x"], defaultModel: "gpt-x", replies: [ok("from a")] });
    const b = createFakeBackend({ models: ["gpt-y"], replies: [ok("from b")] });
    const manager = managerWith([
      [{ type: "openaicompatible", name: "a" }, a],
      [{ type: "openaicompatible", name: "b" }, b],
    ]);

    it("lists backends and prefixed models", async () => {
      expect(manager.listKnownBackends()).toEqual(["a", "b"]);
      expect(await manager.listKnownModels()).toEqual(["a:gpt-x", "b:gpt-y"]);
      expect(await manager.defaultModel()).toBe("a:gpt-x");
    });

    it("requires a backend prefix on unknown models", async () => {
      expect(await manager.validateModel("b:gpt-x")).toEqual({ ok: true, value: undefined });
      expect(await manager.validateModel("gpt-x")).toEqual({
        ok: false,
        error:
          "Multiple backends exist, please specify the model name with the backend prepended, e.g. openai:gpt-4o or aichat:ollama:llama3",
      });
    });

    it("routes by the model prefix", async () => {
      expect(await manager.execute({ messages: [], media: [], model: "b:gpt-x" })).toEqual(ok("from b"));
      expect(await manager.execute({ messages: [], media: [], model: "c:gpt-x" })).toEqual(ok("from a"));
      expect(await manager.execute({ messages: [], media: [] })).toEqual(ok("from a"));
    });
  });

  it("uses type names for unnamed backends", async () => {
    const manager = managerWith([
      [{ type: "aichat" }, createFakeBackend({ models: ["llama3"] })],
      [{ type: "openaicompatible" }, createFakeBackend({ models: ["gpt-4o"] })],
    ]);

    expect(manager.listKnownBackends()).toEqual(["aichat", "openai"]);
    expect(await manager.listKnownModels()).toEqual(["aichat:llama3", "openai:gpt-4o"]);
    expect((await manager.validateModel("openai:gpt-4-turbo")).ok).toBe(true);
  });

  it("has no default model when the first backend reports none", async () => {
    const manager = managerWith([[{ type: "aichat" }, createFakeBackend()]]);
    expect(await manager.defaultModel()).toBeUndefined();
  });

  it("passes backend errors through", async () => {
    const manager = managerWith([[{ type: "aichat" }, createFakeBackend({ replies: [err("model not found")] })]]);
    expect(await manager.execute({ messages: [], media: [] })).toEqual({ ok: false, error: "model not found" });
  });

  it("refuses to execute without backends", async () => {
    const manager = createBackendManager([]);
    expect(manager.listKnownBackends()).toEqual([]);
    expect(await manager.listKnownModels()).toEqual([]);
    expect(await manager.defaultModel()).toBeUndefined();
    expect(await manager.execute({ messages: [], media: [] })).toEqual({ ok: false, error: "No backends configured" });
  });
});
