import { fetchModels, getWire, type StandardizedModel } from "../llm/index";
import { StreamingClient } from "../llm/stream";
import { errorMessage } from "../llm/errors";
import { ConfigError, setConfigValue, type ShellConfig } from "./config";
import { HELP_TEXT, formatConfig, formatHistory, parseCommand } from "./commands";
import type { ConversationController, TextSink, TurnOutcome } from "./conversation/controller";
import type { ModelPickerOutcome } from "./ui/model-picker";
import { createLogger } from "./log";

const log = createLogger("shell");

const API_KEY_VARIABLES = {
  openai: "OPENAI_API_KEY",
  gemini: "GEMINI_API_KEY",
} as const;

export type LineResult = "continue" | "exit";

export function modelFor(config: ShellConfig): string {
  return config.model || getWire(config.provider).defaultModel;
}

export function createStreamingClient(config: ShellConfig, fetchImpl?: typeof fetch): StreamingClient {
  const settings = config.providers[config.provider];
  if (!settings?.apiKey) {
    throw new ConfigError(
      `Missing ${API_KEY_VARIABLES[config.provider]}. Set it in the environment or in the config file.`,
    );
  }
  return new StreamingClient({
    wire: getWire(config.provider),
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    model: config.model,
    params: config.generation,
    fetch: fetchImpl,
  });
}

export interface ShellSessionOptions {
  config: ShellConfig;
  controller: ConversationController;
  output?: TextSink;
  createClient?: (config: ShellConfig) => Pick<StreamingClient, "stream">;
  // Writes one setting through to the config file.
  persist?: (key: string, value: string) => void;
  listModels?: (config: ShellConfig) => Promise<StandardizedModel[]>;
  pickModel?: (currentModelId: string, loadModels: () => Promise<StandardizedModel[]>) => Promise<ModelPickerOutcome>;
}

/** Dispatches one line of interactive input to the right command. */
export class ShellSession {
  private current: ShellConfig;
  private readonly output: TextSink;

  constructor(private readonly options: ShellSessionOptions) {
    this.current = options.config;
    this.output = options.output ?? process.stdout;
  }

  get config(): ShellConfig {
    return this.current;
  }

  get model(): string {
    return modelFor(this.current);
  }

  private say(text: string): void {
    this.output.write(`${text}\n`);
  }

  private loadModels = (): Promise<StandardizedModel[]> => {
    const list = this.options.listModels
      ?? ((config: ShellConfig) => {
        const settings = config.providers[config.provider];
        return fetchModels(config.provider, settings?.apiKey, settings?.baseUrl);
      });
    return list(this.current);
  };

  /** Applies a setting for the running session, then writes it through. */
  applySetting(key: string, value: string): boolean {
    let next: ShellConfig;
    try {
      next = setConfigValue(this.current, key, value);
    } catch (error) {
      if (error instanceof ConfigError) {
        this.say(error.message);
        return false;
      }
      throw error;
    }

    const controller = this.options.controller;
    if (key === "provider" || key === "model" || key === "temperature") {
      const createClient = this.options.createClient ?? ((config: ShellConfig) => createStreamingClient(config));
      try {
        controller.setClient(createClient(next));
      } catch (error) {
        if (error instanceof ConfigError) {
          this.say(error.message);
          return false;
        }
        throw error;
      }
    }
    controller.numResults = next.numResults;
    controller.timeoutMs = next.timeoutMs;
    this.current = next;

    try {
      this.options.persist?.(key, value);
    } catch (error) {
      log.warn(`Could not save the configuration: ${errorMessage(error)}`);
    }
    this.say(`Updated ${key} to ${key === "provider" ? `${value} (model ${this.model})` : value}`);
    return true;
  }

  async handleLine(line: string, signal?: AbortSignal): Promise<LineResult> {
    const command = parseCommand(line);
    const controller = this.options.controller;

    switch (command.kind) {
      case "empty":
        return "continue";
      case "exit":
        this.say("Goodbye!");
        return "exit";
      case "help":
        this.say(HELP_TEXT);
        return "continue";
      case "invalid":
        this.say(command.message);
        return "continue";
      case "history":
        this.say(formatHistory(controller.context.snapshot()));
        return "continue";
      case "config-show":
        this.say(formatConfig(this.current, this.model));
        return "continue";
      case "config-set":
        this.applySetting(command.key, command.value);
        return "continue";
      case "models":
        await this.listModels();
        return "continue";
      case "model":
        await this.chooseModel();
        return "continue";
      case "search":
        await controller.search(command.query, { signal });
        return "continue";
      case "chat":
        await controller.runTurn(command.text, { signal });
        return "continue";
    }
  }

  private async listModels(): Promise<void> {
    let models: StandardizedModel[];
    try {
      models = await this.loadModels();
    } catch (error) {
      this.say(`Could not list models: ${errorMessage(error)}`);
      return;
    }
    if (models.length === 0) {
      this.say(`No models available from ${this.current.provider}.`);
      return;
    }
    this.say(`Models from ${this.current.provider}:`);
    for (const model of models) {
      const marker = model.id === this.model ? "*" : " ";
      const label = model.name && model.name !== model.id ? `${model.id} (${model.name})` : model.id;
      this.say(`${marker} ${label}`);
    }
  }

  private async chooseModel(): Promise<void> {
    const pickModel = this.options.pickModel;
    if (!pickModel) {
      this.say("Model picking needs an interactive terminal. Use 'config set model <id>' instead.");
      return;
    }
    const outcome = await pickModel(this.model, this.loadModels);
    if (!outcome.modelId) {
      this.say("Model unchanged.");
      return;
    }
    this.applySetting("model", outcome.modelId);
  }
}

export const RESET_TEXT = "\x1B[0m";

export interface AskOnceOptions {
  web?: boolean;
  signal?: AbortSignal;
  output?: TextSink;
  // Styled output leaves the base colour set; reset it before exiting.
  styled?: boolean;
}

/** Answers a single prompt outside the REPL and returns the exit code. */
export async function askOnce(
  controller: ConversationController,
  prompt: string,
  options: AskOnceOptions = {},
): Promise<number> {
  const { web, signal, styled } = options;
  try {
    const outcome = web ? await controller.search(prompt, { signal }) : await controller.runTurn(prompt, { signal });
    return exitCodeFor(outcome);
  } finally {
    if (styled) (options.output ?? process.stdout).write(RESET_TEXT);
  }
}

export function exitCodeFor(outcome: TurnOutcome | undefined): number {
  if (!outcome) return 1;
  switch (outcome.status) {
    case "completed":
      return 0;
    case "cancelled":
      return 130;
    case "failed":
      return 1;
  }
}
