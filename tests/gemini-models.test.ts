import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const sdk = vi.hoisted(() => ({ list: vi.fn(), created: [] as unknown[] }));

vi.mock("@google/genai", () => ({
  GoogleGenAI: class {
    models = { list: sdk.list };
    constructor(options: unknown) {
      sdk.created.push(options);
    }
  },
}));

import { fetchModels } from "../llm/index";

async function* pages<T>(items: T[]) {
  yield* items;
}

describe("Gemini model listing", () => {
  beforeEach(() => {
    vi.stubEnv("GEMINI_BASE_URL", "");
    vi.stubEnv("GEMINI_API_KEY", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    sdk.list.mockReset();
    sdk.created.length = 0;
  });

  it("lists chat models through the SDK", async () => {
    sdk.list.mockResolvedValue(pages([
      { name: "models/gemini-1.5-flash", displayName: "Gemini 1.5 Flash", inputTokenLimit: 1048576, supportedActions: ["generateContent", "countTokens"] },
      { name: "models/text-embedding-004", displayName: "Text Embedding 004", supportedActions: ["embedContent"] },
      { name: "models/gemini-exp" },
      { displayName: "nameless" },
    ]));

    const models = await fetchModels("gemini", "test-secret");

    expect(models).toEqual([
      { id: "gemini-1.5-flash", name: "Gemini 1.5 Flash", provider: "gemini", context_length: 1048576 },
      { id: "gemini-exp", name: "models/gemini-exp", provider: "gemini", context_length: undefined },
    ]);
    expect(sdk.created).toEqual([
      { apiKey: "test-secret", httpOptions: { baseUrl: "https://generativelanguage.googleapis.com", apiVersion: "v1beta" } },
    ]);
  });

  it("splits a custom base url into host and version", async () => {
    sdk.list.mockResolvedValue(pages([]));

    expect(await fetchModels("gemini", "test-secret", "http://localhost:9999/v1/")).toEqual([]);
    expect(sdk.created).toEqual([
      { apiKey: "test-secret", httpOptions: { baseUrl: "http://localhost:9999", apiVersion: "v1" } },
    ]);
  });

  it("needs an api key", async () => {
    await expect(fetchModels("gemini")).rejects.toThrow("Missing GEMINI_API_KEY");
    expect(sdk.list).not.toHaveBeenCalled();
  });
});
