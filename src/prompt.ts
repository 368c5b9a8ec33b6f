import { existsSync, readFileSync } from "fs";
import { arch, platform } from "os";

const RUNTIME_CONTEXT_PREFIX = "Runtime context:";
export const DEFAULT_CHAT_SYSTEM_PROMPT = "You are a helpful assistant in a terminal chat. Converse with the user naturally and keep answers interesting, using emojis where they fit. When web search context is provided, give a detailed answer based on it, with points where useful, and say clearly if the context does not contain relevant information; otherwise use your own knowledge. Format for reading in a terminal: short paragraphs, *italic*, **bold** or __underline__ for emphasis, no tables or headings.";

export function buildPrompt(systemPrompt: string, now = new Date()): string {
  const runtimeLine = `${RUNTIME_CONTEXT_PREFIX} OS=${platform()}/${arch()}. Today=${now.toISOString().slice(0, 10)}.`;
  const base = systemPrompt.trim();
  if (!base) return runtimeLine;
  return base.includes(RUNTIME_CONTEXT_PREFIX) ? base : `${base}\n${runtimeLine}`;
}

/** `--system` takes either the prompt itself or a path to a file holding it. */
export function resolveSystemPrompt(value: string | undefined, configured?: string): string {
  if (value && existsSync(value)) return readFileSync(value, "utf-8");
  return value || configured || DEFAULT_CHAT_SYSTEM_PROMPT;
}
