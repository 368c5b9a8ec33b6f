import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import path from "path";
import { isProvider, type GenerationParams, type Provider } from "../llm/index";
import { isRecord, readNumber, readString } from "../llm/json";

export const DEFAULT_NUM_RESULTS = 5;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_GENERATION: GenerationParams = {
  temperature: 0.7,
  maxTokens: 2048,
  topK: 40,
  topP: 0.95,
};

export interface ProviderSettings {
  apiKey?: string;
  baseUrl?: string;
}

export interface ShellConfig {
  provider: Provider;
  model?: string;
  systemPrompt?: string;
  numResults: number;
  timeoutMs: number;
  generation: GenerationParams;
  providers: {
    openai?: ProviderSettings;
    gemini?: ProviderSettings;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function getConfigFile(): string {
  return process.env.SEARCHSHELL_CONFIG || path.join(homedir(), ".config", "searchshell.json");
}

function trimmed(value: unknown): string | undefined {
  const text = readString(value)?.trim();
  return text ? text : undefined;
}

function positiveInt(value: unknown): number | undefined {
  const n = readNumber(value);
  return n !== undefined && Number.isInteger(n) && n > 0 ? n : undefined;
}

function normalizeProviderSettings(raw: unknown): ProviderSettings | undefined {
  if (!isRecord(raw)) return undefined;
  const apiKey = trimmed(raw.apiKey);
  const baseUrl = trimmed(raw.baseUrl);
  return apiKey || baseUrl ? { apiKey, baseUrl } : undefined;
}

function normalizeGeneration(raw: unknown): GenerationParams {
  if (!isRecord(raw)) return { ...DEFAULT_GENERATION };
  return {
    temperature: readNumber(raw.temperature) ?? DEFAULT_GENERATION.temperature,
    maxTokens: positiveInt(raw.maxTokens) ?? DEFAULT_GENERATION.maxTokens,
    topK: positiveInt(raw.topK) ?? DEFAULT_GENERATION.topK,
    topP: readNumber(raw.topP) ?? DEFAULT_GENERATION.topP,
  };
}

/** Field-by-field normalization; anything missing or malformed falls back to its default. */
export function normalizeConfig(parsed: unknown): ShellConfig {
  const raw = isRecord(parsed) ? parsed : {};
  const providers = isRecord(raw.providers) ? raw.providers : {};
  return {
    provider: isProvider(raw.provider) ? raw.provider : "openai",
    model: trimmed(raw.model),
    systemPrompt: trimmed(raw.systemPrompt) ? readString(raw.systemPrompt) : undefined,
    numResults: positiveInt(raw.numResults) ?? DEFAULT_NUM_RESULTS,
    timeoutMs: positiveInt(raw.timeoutMs) ?? DEFAULT_TIMEOUT_MS,
    generation: normalizeGeneration(raw.generation),
    providers: {
      openai: normalizeProviderSettings(providers.openai),
      gemini: normalizeProviderSettings(providers.gemini),
    },
  };
}

export function readConfig(file = getConfigFile()): ShellConfig {
  try {
    if (!existsSync(file)) return normalizeConfig({});
    return normalizeConfig(JSON.parse(readFileSync(file, "utf-8")));
  } catch {
    return normalizeConfig({});
  }
}

export function writeConfig(config: ShellConfig, file = getConfigFile()): void {
  const dir = path.dirname(file);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(file, `${JSON.stringify(normalizeConfig(config), null, 2)}\n`);
}

export function updateConfig(updater: (current: ShellConfig) => ShellConfig, file = getConfigFile()): ShellConfig {
  const next = updater(readConfig(file));
  writeConfig(next, file);
  return next;
}

/** Environment wins over the file; the result is never written back. */
export function applyEnvOverrides(config: ShellConfig, env: NodeJS.ProcessEnv = process.env): ShellConfig {
  const provider = isProvider(env.SEARCHSHELL_PROVIDER) ? env.SEARCHSHELL_PROVIDER : config.provider;
  const withEnv = (current: ProviderSettings | undefined, apiKey?: string, baseUrl?: string): ProviderSettings | undefined => {
    const next = {
      apiKey: apiKey?.trim() || current?.apiKey,
      baseUrl: baseUrl?.trim() || current?.baseUrl,
    };
    return next.apiKey || next.baseUrl ? next : undefined;
  };
  return {
    ...config,
    provider,
    model: env.SEARCHSHELL_MODEL?.trim() || config.model,
    providers: {
      openai: withEnv(config.providers.openai, env.OPENAI_API_KEY, env.OPENAI_BASE_URL),
      gemini: withEnv(config.providers.gemini, env.GEMINI_API_KEY, env.GEMINI_BASE_URL),
    },
  };
}

export function loadConfig(): ShellConfig {
  return applyEnvOverrides(readConfig());
}

export const SETTABLE_KEYS = ["results", "model", "provider", "timeout", "temperature"] as const;

/** Applies `config set <key> <value>`; throws ConfigError on a bad value. */
export function setConfigValue(config: ShellConfig, key: string, value: string): ShellConfig {
  switch (key) {
    case "results": {
      const n = Number(value);
      if (!Number.isInteger(n) || n < 1) throw new ConfigError("results must be a positive integer");
      return { ...config, numResults: n };
    }
    case "timeout": {
      const n = Number(value);
      if (!Number.isInteger(n) || n < 1) throw new ConfigError("timeout must be a positive number of milliseconds");
      return { ...config, timeoutMs: n };
    }
    case "temperature": {
      const n = Number(value);
      if (!Number.isFinite(n) || n < 0 || n > 2) throw new ConfigError("temperature must be between 0 and 2");
      return { ...config, generation: { ...config.generation, temperature: n } };
    }
    case "model": {
      if (!value.trim()) throw new ConfigError("model must not be empty");
      return { ...config, model: value.trim() };
    }
    case "provider": {
      if (!isProvider(value)) throw new ConfigError("provider must be openai or gemini");
      return { ...config, provider: value, model: undefined };
    }
    default:
      throw new ConfigError(`Unknown setting '${key}'. Use one of: ${SETTABLE_KEYS.join(", ")}`);
  }
}
