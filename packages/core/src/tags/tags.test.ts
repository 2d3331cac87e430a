import { describe, it, expect } from "vitest";
import { createMemoryTagStore, createMockRoom } from "@parley/sdk/testing";
import {
  BACKEND_NAMESPACE,
  MODEL_NAMESPACE,
  readModelOverride,
  readTagBackends,
  registerTagBackend,
  writeModelOverride,
} from "./tags.js";

describe("model override", () => {
  it("is undefined when unset", async () => {
    const store = createMemoryTagStore();
    expect(await readModelOverride(store, createMockRoom())).toBeUndefined();
  });

  it("round-trips through the store", async () => {
    const store = createMemoryTagStore();
    const room = createMockRoom();
    await writeModelOverride(store, room, "openai:gpt-4o");
    expect(await readModelOverride(store, room)).toBe("openai:gpt-4o");
    expect(store.snapshot(room.id, MODEL_NAMESPACE)).toEqual({ default: "openai:gpt-4o" });
  });

  it("is scoped per room", async () => {
    const store = createMemoryTagStore();
    await writeModelOverride(store, createMockRoom({ id: "!a:test" }), "m");
    expect(await readModelOverride(store, createMockRoom({ id: "!b:test" }))).toBeUndefined();
  });
});

describe("readTagBackends", () => {
  it("reads complete backends in key order", async () => {
    const store = createMemoryTagStore();
    const room = createMockRoom();
    store.set(room.id, BACKEND_NAMESPACE, "a.url", "https://a.example.com/v1");
    store.set(room.id, BACKEND_NAMESPACE, "a.token", "test-secret-a");
    store.set(room.id, BACKEND_NAMESPACE, "b.url", "https://b.example.com/v1");
    store.set(room.id, BACKEND_NAMESPACE, "b.token", "test-secret-b");

    expect(await readTagBackends(store, room)).toEqual([
      { type: "openaicompatible", name: "a", api_base: "https://a.example.com/v1", api_key: "test-secret-a" },
      { type: "openaicompatible", name: "b", api_base: "https://b.example.com/v1", api_key: "test-secret-b" },
    ]);
  });

  it("skips backends missing a token", async () => {
    const store = createMemoryTagStore();
    const room = createMockRoom();
    store.set(room.id, BACKEND_NAMESPACE, "a.url", "https://a.example.com/v1");
    expect(await readTagBackends(store, room)).toEqual([]);
  });

  it("swaps the default backend into first position", async () => {
    const store = createMemoryTagStore();
    const room = createMockRoom();
    for (const name of ["a", "b", "c"]) {
      store.set(room.id, BACKEND_NAMESPACE, `${name}.url`, `https://${name}.example.com`);
      store.set(room.id, BACKEND_NAMESPACE, `${name}.token`, "test-secret");
    }
    store.set(room.id, BACKEND_NAMESPACE, "chazdefault", "c");

    const names = (await readTagBackends(store, room)).map((b) => b.name);
    expect(names).toEqual(["c", "b", "a"]);
  });
});

describe("registerTagBackend", () => {
  it("writes the three keys in one sync", async () => {
    const store = createMemoryTagStore();
    const room = createMockRoom();
    await registerTagBackend(store, room, { name: "groq", apiBase: "https://groq.example.com", apiKey: "test-secret" });

    expect(store.syncCount).toBe(1);
    expect(store.snapshot(room.id, BACKEND_NAMESPACE)).toEqual({
      chazdefault: "groq",
      "groq.url": "https://groq.example.com",
      "groq.token": "test-secret",
    });
    expect((await readTagBackends(store, room)).map((b) => b.name)).toEqual(["groq"]);
  });
});
