import { describe, it, expect } from "vitest";
import type { BackendConfig } from "@parley/sdk";
import { createMemoryTagStore, createMockRoom } from "@parley/sdk/testing";
import { registerTagBackend } from "../tags/tags.js";
import { backendDisplayName } from "./index.js";
import { resolveRoomBackends } from "./resolve.js";

describe("resolveRoomBackends", () => {
  it("falls back to a default aichat backend", async () => {
    const backends = await resolveRoomBackends(createMemoryTagStore(), createMockRoom(), {});
    expect(backends).toEqual([{ type: "aichat" }]);
  });

  it("uses configured backends in order", async () => {
    const configured: BackendConfig[] = [
      { type: "aichat", name: "local" },
      { type: "openaicompatible", name: "cloud" },
    ];
    const backends = await resolveRoomBackends(createMemoryTagStore(), createMockRoom(), { backends: configured });
    expect(backends).toEqual(configured);
  });

  it("puts room backends first and drops configured duplicates", async () => {
    const store = createMemoryTagStore();
    const room = createMockRoom();
    await registerTagBackend(store, room, { name: "cloud", apiBase: "https://cloud.example.com", apiKey: "test-secret" });

    const backends = await resolveRoomBackends(store, room, {
      backends: [
        { type: "aichat", name: "local" },
        { type: "openaicompatible", name: "cloud", api_base: "https://other.example.com" },
      ],
    });

    expect(backends.map(backendDisplayName)).toEqual(["cloud", "local"]);
    expect(backends[0]).toEqual({
      type: "openaicompatible",
      name: "cloud",
      api_base: "https://cloud.example.com",
      api_key: "test-secret",
    });
  });
});
