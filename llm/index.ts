import { openaiWire, fetchModels as openAIFetchModels } from "./providers/openai";
import { geminiWire, fetchModels as geminiFetchModels } from "./providers/gemini";

export type Provider = "openai" | "gemini";

export const PROVIDERS: readonly Provider[] = ["openai", "gemini"];

export function isProvider(value: unknown): value is Provider {
  return value === "openai" || value === "gemini";
}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface GenerationParams {
  temperature?: number;
  maxTokens?: number;
  topK?: number;
  topP?: number;
}

export interface StandardizedModel {
  id: string;
  name?: string; // display name when the provider has one, otherwise the id
  provider: Provider;
  created?: number; // Unix timestamp
  owned_by?: string;
  context_length?: number;
}

export interface WireRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
}

export interface FrameDelta {
  index: number; // candidate the text belongs to
  text: string;
}

export interface DecodedFrame {
  deltas: FrameDelta[];
  done: boolean;
  error?: { message: string; code?: string };
}

export interface WireRequestOptions {
  model: string;
  apiKey: string;
  baseUrl?: string;
  params?: GenerationParams;
}

/**
 * Request encoding and frame decoding for one remote protocol.
 * `decodeFrame` receives the payload of a single `data:` line and throws
 * `DecodeError` when it cannot make sense of it.
 */
export interface ChatWire {
  readonly provider: Provider;
  readonly defaultBaseUrl: string;
  readonly defaultModel: string;
  buildRequest(messages: readonly ChatMessage[], options: WireRequestOptions): WireRequest;
  decodeFrame(data: string): DecodedFrame;
}

export function getWire(provider: Provider): ChatWire {
  switch (provider) {
    case "gemini":
      return geminiWire;
    case "openai":
    default:
      return openaiWire;
  }
}

export async function fetchModels(
  provider: Provider,
  apiKey?: string,
  baseURL?: string,
): Promise<StandardizedModel[]> {
  switch (provider) {
    case "gemini":
      return geminiFetchModels(apiKey, baseURL);
    case "openai":
    default:
      return openAIFetchModels(apiKey, baseURL);
  }
}
