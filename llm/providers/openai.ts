import OpenAI from "openai";
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

export const OPENAI_BASE_URL = "https://api.openai.com/v1";
const DONE_SENTINEL = "[DONE]";

function getClient(baseURL?: string, apiKeyOverride?: string) {
  const apiKey = apiKeyOverride || process.env.OPENAI_API_KEY;
  if (!apiKey) throw new Error("Missing OPENAI_API_KEY");
  const resolvedBase =
    baseURL || process.env.OPENAI_BASE_URL || OPENAI_BASE_URL;
  return new OpenAI({ apiKey, baseURL: resolvedBase });
}

export async function fetchModels(
  apiKeyOverride?: string,
  baseURL?: string,
): Promise<StandardizedModel[]> {
  const client = getClient(baseURL, apiKeyOverride);
  const response = await client.models.list();
  return response.data.map(
    (model): StandardizedModel => ({
      id: model.id,
      name: model.id, // OpenAI doesn't provide display names
      provider: "openai",
      created: model.created,
      owned_by: model.owned_by,
    }),
  );
}

function buildRequest(messages: readonly ChatMessage[], options: WireRequestOptions) {
  const { model, apiKey, params = {} } = options;
  const baseUrl = (options.baseUrl || OPENAI_BASE_URL).replace(/\/+$/, "");
  const body: Record<string, unknown> = {
    model,
    messages: messages.map((m) => ({ role: m.role, content: m.content })),
    stream: true,
  };
  if (params.temperature !== undefined) body.temperature = params.temperature;
  if (params.maxTokens !== undefined) body.max_tokens = params.maxTokens;
  if (params.topP !== undefined) body.top_p = params.topP;
  // top_k has no chat-completions counterpart.

  return {
    url: `${baseUrl}/chat/completions`,
    headers: {
      "Content-Type": "application/json",
      Accept: "text/event-stream",
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify(body),
  };
}

function decodeFrame(data: string): DecodedFrame {
  if (data === DONE_SENTINEL) return { deltas: [], done: true };

  let chunk: unknown;
  try {
    chunk = JSON.parse(data);
  } catch (error) {
    throw new DecodeError(`Malformed frame: ${errorMessage(error)}`, data, { cause: error });
  }

  const upstream = readUpstreamError(chunk);
  if (upstream) return { deltas: [], done: false, error: upstream };

  if (!isRecord(chunk) || !Array.isArray(chunk.choices)) {
    throw new DecodeError("Frame has no choices", data);
  }

  const deltas: FrameDelta[] = [];
  for (const choice of chunk.choices) {
    if (!isRecord(choice)) continue;
    const delta = isRecord(choice.delta) ? choice.delta : undefined;
    const text = readString(delta?.content);
    if (text) deltas.push({ index: readNumber(choice.index) ?? 0, text });
  }
  return { deltas, done: false };
}

export const openaiWire: ChatWire = {
  provider: "openai",
  defaultBaseUrl: OPENAI_BASE_URL,
  defaultModel: "gpt-4o-mini",
  buildRequest,
  decodeFrame,
};
