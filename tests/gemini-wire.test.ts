import { describe, expect, it } from "vitest";
import { geminiWire } from "../llm/providers/gemini";
import { DecodeError } from "../llm/errors";

describe("geminiWire.buildRequest", () => {
  it("moves system turns into the system instruction and maps roles", () => {
    const request = geminiWire.buildRequest(
      [
        { role: "system", content: "Be brief." },
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello!" },
        { role: "system", content: "Web search context:\nnone" },
        { role: "user", content: "Weather?" },
      ],
      {
        model: "gemini-1.5-flash-8b",
        apiKey: "test-secret",
        baseUrl: "https://gemini.example.test/v1beta/",
        params: { temperature: 0.7, maxTokens: 2048, topK: 40, topP: 0.95 },
      },
    );

    expect(request.url).toBe(
      "https://gemini.example.test/v1beta/models/gemini-1.5-flash-8b:streamGenerateContent?alt=sse",
    );
    expect(request.headers["x-goog-api-key"]).toBe("test-secret");
    expect(JSON.parse(request.body)).toEqual({
      systemInstruction: { parts: [{ text: "Be brief." }, { text: "Web search context:\nnone" }] },
      contents: [
        { role: "user", parts: [{ text: "Hi" }] },
        { role: "model", parts: [{ text: "Hello!" }] },
        { role: "user", parts: [{ text: "Weather?" }] },
      ],
      generationConfig: { temperature: 0.7, topK: 40, topP: 0.95, maxOutputTokens: 2048 },
    });
  });

  it("omits the system instruction when there are no system turns", () => {
    const request = geminiWire.buildRequest([{ role: "user", content: "Hi" }], {
      model: "gemini-1.5-flash-8b",
      apiKey: "test-secret",
      baseUrl: "https://gemini.example.test/v1beta",
    });
    expect(JSON.parse(request.body)).toEqual({
      contents: [{ role: "user", parts: [{ text: "Hi" }] }],
      generationConfig: {},
    });
  });
});

describe("geminiWire.decodeFrame", () => {
  it("reads every text part of each candidate", () => {
    const frame = geminiWire.decodeFrame(
      JSON.stringify({ candidates: [{ index: 0, content: { role: "model", parts: [{ text: "It is " }, { text: "sunny" }] } }] }),
    );
    expect(frame).toEqual({
      deltas: [
        { index: 0, text: "It is " },
        { index: 0, text: "sunny" },
      ],
      done: false,
    });
  });

  it("ends the stream on a finish reason", () => {
    const frame = geminiWire.decodeFrame(
      JSON.stringify({ candidates: [{ content: { parts: [{ text: "." }] }, finishReason: "STOP" }] }),
    );
    expect(frame).toEqual({ deltas: [{ index: 0, text: "." }], done: true });
  });

  it("turns a blocked prompt into an error frame", () => {
    const frame = geminiWire.decodeFrame(JSON.stringify({ promptFeedback: { blockReason: "SAFETY" } }));
    expect(frame).toEqual({ deltas: [], done: true, error: { message: "Prompt blocked: SAFETY", code: "SAFETY" } });
  });

  it("reports an error document as an error frame", () => {
    const frame = geminiWire.decodeFrame(
      JSON.stringify({ error: { code: 400, message: "API key not valid", status: "INVALID_ARGUMENT" } }),
    );
    expect(frame.error).toEqual({ message: "API key not valid", code: "INVALID_ARGUMENT" });
  });

  it("throws DecodeError for malformed frames", () => {
    expect(() => geminiWire.decodeFrame("not json")).toThrow(DecodeError);
    expect(() => geminiWire.decodeFrame(JSON.stringify({ usageMetadata: {} }))).toThrow("Frame has no candidates");
  });
});
