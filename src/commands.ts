import type { Turn } from "./conversation/context";
import type { ShellConfig } from "./config";

export type ShellCommand =
  | { kind: "empty" }
  | { kind: "exit" }
  | { kind: "help" }
  | { kind: "search"; query: string }
  | { kind: "history" }
  | { kind: "config-show" }
  | { kind: "config-set"; key: string; value: string }
  | { kind: "models" }
  | { kind: "model" }
  | { kind: "invalid"; message: string }
  | { kind: "chat"; text: string };

const EXIT_WORDS = new Set(["exit", "quit", "q"]);

export const HELP_TEXT = `Commands:
  search <query>             Search the web and answer from the results
  history                    Show this session's conversation
  config [show]              Show the current configuration
  config set <key> <value>   Change results, model, provider, timeout or temperature
  models                     List the provider's models
  model                      Pick a model interactively
  help, ?                    Show this help
  exit, quit, q, Ctrl-D      Leave the shell

Anything else is sent to the model. Ctrl-C stops a reply in progress.`;

/** Whitespace-separated words; single or double quotes group words together. */
export function splitArgs(input: string): string[] {
  const out: string[] = [];
  for (const match of input.matchAll(/"([^"]*)"|'([^']*)'|(\S+)/g)) {
    out.push(match[1] ?? match[2] ?? match[3] ?? "");
  }
  return out;
}

export function parseCommand(line: string): ShellCommand {
  const input = line.trim();
  if (!input) return { kind: "empty" };

  const lower = input.toLowerCase();
  if (EXIT_WORDS.has(lower)) return { kind: "exit" };
  if (lower === "help" || lower === "?") return { kind: "help" };
  if (lower === "history") return { kind: "history" };
  if (lower === "models") return { kind: "models" };
  if (lower === "model") return { kind: "model" };

  if (lower === "search" || lower.startsWith("search ")) {
    const query = input.slice("search".length).trim();
    return query
      ? { kind: "search", query }
      : { kind: "invalid", message: "Please provide a search query." };
  }

  if (lower === "config" || lower.startsWith("config ")) {
    const args = splitArgs(input.slice("config".length));
    if (args.length === 0 || args[0] === "show") return { kind: "config-show" };
    if (args[0] === "set" && args.length >= 3) {
      return { kind: "config-set", key: args[1], value: args.slice(2).join(" ") };
    }
    return { kind: "invalid", message: "Invalid config command. Use 'config show' or 'config set <param> <value>'" };
  }

  return { kind: "chat", text: input };
}

function preview(content: string, max = 160): string {
  const flat = content.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}

export function formatHistory(turns: readonly Turn[]): string {
  if (turns.length === 0) return "No conversation yet.";
  const lines = ["Chat session history:"];
  turns.forEach((turn, i) => {
    lines.push(`${i + 1}. ${turn.role}: ${preview(turn.content)}`);
  });
  return lines.join("\n");
}

export function formatConfig(config: ShellConfig, model: string): string {
  return [
    "Current configuration:",
    `Provider: ${config.provider}`,
    `Model: ${model}`,
    `Number of results: ${config.numResults}`,
    `Timeout: ${config.timeoutMs} ms`,
    `Temperature: ${config.generation.temperature ?? "default"}`,
  ].join("\n");
}
