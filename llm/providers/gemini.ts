import { GoogleGenAI } from "@google/genai";
import type {
  ChatMessage,
  ChatWire,
  DecodedFrame,
  FrameDelta,
  StandardizedModel,
  WireRequestOptions,
} from "../index";
import { DecodeError, errorMessage, readUpstreamError } from "../errors";
import { isRecord, readNumber, readString } from "../json";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

function resolveBase(baseURL?: string): string {
  return (baseURL || process.env.GEMINI_BASE_URL || GEMINI_BASE_URL).replace(/\/+$/, "");
}

function getClient(apiKeyOverride?: string, baseURL?: string) {
  const apiKey = apiKeyOverride || process.env.GEMINI_API_KEY;
  if (!apiKey) throw new Error("Missing GEMINI_API_KEY");
  // The SDK takes the host and the API version separately.
  const match = /^(.*?)\/(v\d+\w*)$/.exec(resolveBase(baseURL));
  const httpOptions = match ? { baseUrl: match[1], apiVersion: match[2] } : { baseUrl: resolveBase(baseURL) };
  return new GoogleGenAI({ apiKey, httpOptions });
}

export async function fetchModels(
  apiKeyOverride?: string,
  baseURL?: string,
): Promise<StandardizedModel[]> {
  const genai = getClient(apiKeyOverride, baseURL);
  const models: StandardizedModel[] = [];
  for await (const model of await genai.models.list()) {
    if (!model.name) continue;
    const actions = model.supportedActions ?? [];
    if (actions.length > 0 && !actions.includes("generateContent")) continue;
    models.push({
      id: model.name.replace(/^models\//, ""),
      name: model.displayName || model.name,
      provider: "gemini",
      context_length: model.inputTokenLimit,
    });
  }
  return models;
}

// Gemini has no system role inside `contents`; system turns become the
// system instruction, in order.
function buildRequest(messages: readonly ChatMessage[], options: WireRequestOptions) {
  const { model, apiKey, params = {} } = options;
  const systemParts = messages
    .filter((m) => m.role === "system")
    .map((m) => ({ text: m.content }));
  const contents = messages
    .filter((m) => m.role !== "system")
    .map((m) => ({
      role: m.role === "assistant" ? "model" : "user",
      parts: [{ text: m.content }],
    }));

  const generationConfig: Record<string, number> = {};
  if (params.temperature !== undefined) generationConfig.temperature = params.temperature;
  if (params.topK !== undefined) generationConfig.topK = params.topK;
  if (params.topP !== undefined) generationConfig.topP = params.topP;
  if (params.maxTokens !== undefined) generationConfig.maxOutputTokens = params.maxTokens;

  const body: Record<string, unknown> = { contents, generationConfig };
  if (systemParts.length > 0) body.systemInstruction = { parts: systemParts };

  return {
    url: `${resolveBase(options.baseUrl)}/models/${encodeURIComponent(model)}:streamGenerateContent?alt=sse`,
    headers: {
      "Content-Type": "application/json",
      Accept: "text/event-stream",
      "x-goog-api-key": apiKey,
    },
    body: JSON.stringify(body),
  };
}

function decodeFrame(data: string): DecodedFrame {
  let chunk: unknown;
  try {
    chunk = JSON.parse(data);
  } catch (error) {
    throw new DecodeError(`Malformed frame: ${errorMessage(error)}`, data, { cause: error });
  }

  const upstream = readUpstreamError(chunk);
  if (upstream) return { deltas: [], done: false, error: upstream };
  if (!isRecord(chunk)) throw new DecodeError("Frame is not an object", data);

  if (!Array.isArray(chunk.candidates)) {
    const feedback = isRecord(chunk.promptFeedback) ? chunk.promptFeedback : undefined;
    const blockReason = readString(feedback?.blockReason);
    if (blockReason) {
      return { deltas: [], done: true, error: { message: `Prompt blocked: ${blockReason}`, code: blockReason } };
    }
    throw new DecodeError("Frame has no candidates", data);
  }

  const deltas: FrameDelta[] = [];
  let done = false;
  for (const candidate of chunk.candidates) {
    if (!isRecord(candidate)) continue;
    const index = readNumber(candidate.index) ?? 0;
    const content = isRecord(candidate.content) ? candidate.content : undefined;
    const parts = Array.isArray(content?.parts) ? content.parts : [];
    for (const part of parts) {
      const text = isRecord(part) ? readString(part.text) : undefined;
      if (text) deltas.push({ index, text });
    }
    if (readString(candidate.finishReason)) done = true;
  }
  return { deltas, done };
}

export const geminiWire: ChatWire = {
  provider: "gemini",
  defaultBaseUrl: GEMINI_BASE_URL,
  defaultModel: "gemini-1.5-flash-8b",
  buildRequest,
  decodeFrame,
};
