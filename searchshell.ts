import { readFileSync } from "fs";
import readline from "readline";
import { Command } from "commander";
import { ConfigError, loadConfig, setConfigValue, updateConfig, type ShellConfig } from "./src/config";
import { ConversationController } from "./src/conversation/controller";
import { BASE_STYLE, render, renderPlain } from "./src/format/markup";
import { WebContextProvider } from "./src/search/web-context";
import { buildPrompt, resolveSystemPrompt } from "./src/prompt";
import { RESET_TEXT, ShellSession, askOnce, createStreamingClient } from "./src/shell";
import { runModelPicker } from "./src/ui/model-picker";
import { isRecord, readString } from "./llm/json";
import { errorMessage } from "./llm/errors";

const PROMPT = "ai> ";
const DIM_TEXT = "\x1B[2m";
const INTRO = "Welcome to the AI Conversation Shell. Type your message or use \"search <query>\" to search for information.\nType help or ? to list commands.\n";

type CliOptions = {
    model?: string;
    provider?: string;
    system?: string;
    results?: string;
    timeout?: string;
    web?: boolean;
};

function readVersion(): string {
    try {
        const pkg: unknown = JSON.parse(readFileSync(new URL("./package.json", import.meta.url), "utf-8"));
        return (isRecord(pkg) && readString(pkg.version)) || "unknown";
    } catch {
        return "unknown";
    }
}

async function readPipedStdin(): Promise<string> {
    if (process.stdin.isTTY) return "";
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf-8").trim();
}

function applyCliOptions(config: ShellConfig, options: CliOptions): ShellConfig {
    let next = config;
    // Provider first: switching provider clears the model.
    if (options.provider !== undefined) next = setConfigValue(next, "provider", options.provider);
    if (options.model !== undefined) next = setConfigValue(next, "model", options.model);
    if (options.results !== undefined) next = setConfigValue(next, "results", options.results);
    if (options.timeout !== undefined) next = setConfigValue(next, "timeout", options.timeout);
    return next;
}

const program = new Command();
program
    .name("searchshell")
    .description("Chat with a language model in your terminal, optionally grounded in a web search")
    .version(readVersion(), "-V, --version")
    .argument("[prompt...]", "ask once and exit instead of starting the shell")
    .option("-m, --model <id>", "model to use")
    .option("-p, --provider <name>", "openai or gemini")
    .option("-s, --system <prompt>", "system prompt, or a file containing it")
    .option("-r, --results <n>", "number of web results to read for a search")
    .option("--timeout <ms>", "how long to wait on the model service")
    .option("--web", "treat the prompt as a web search");

async function runOnce(controller: ConversationController, prompt: string, web: boolean, styled: boolean): Promise<number> {
    const abort = new AbortController();
    const onSigint = () => {
        if (abort.signal.aborted) process.exit(130);
        abort.abort();
    };
    process.on("SIGINT", onSigint);
    try {
        return await askOnce(controller, prompt, { web, signal: abort.signal, styled });
    } finally {
        process.off("SIGINT", onSigint);
    }
}

// One interface per prompt: while a command runs, stdin belongs to the turn
// (Ctrl-C arrives as SIGINT) or to the model picker.
function readLine(history: string[]): Promise<string | undefined> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        history: [...history],
        historySize: 200,
    });
    return new Promise((resolve) => {
        let answered = false;
        rl.on("history", (next: string[]) => {
            history.splice(0, history.length, ...next);
        });
        rl.on("SIGINT", () => {
            process.stdout.write("\n");
            rl.close();
        });
        rl.on("close", () => {
            if (!answered) resolve(undefined);
        });
        rl.question(PROMPT, (answer) => {
            answered = true;
            rl.close();
            resolve(answer);
        });
    });
}

async function runInteractive(session: ShellSession): Promise<void> {
    process.stdout.write(`${INTRO}\n`);
    process.stdout.write(BASE_STYLE);

    let active: AbortController | undefined;
    const onSigint = () => {
        if (!active) process.exit(130);
        active.abort();
    };
    process.on("SIGINT", onSigint);

    const history: string[] = [];
    try {
        for (;;) {
            const line = await readLine(history);
            if (line === undefined) break;
            active = new AbortController();
            const result = await session.handleLine(line, active.signal).finally(() => {
                active = undefined;
            });
            if (result === "exit") break;
        }
    } finally {
        process.off("SIGINT", onSigint);
        process.stdout.write(RESET_TEXT);
    }
}

async function main(): Promise<void> {
    program.parse(process.argv);
    const options = program.opts<CliOptions>();
    const promptArgs = program.args.join(" ").trim();
    const piped = await readPipedStdin();
    const prompt = [piped, promptArgs].filter(Boolean).join("\n\n");
    const plain = !process.stdout.isTTY;

    let config: ShellConfig;
    let controller: ConversationController;
    try {
        config = applyCliOptions(loadConfig(), options);
        const notices = plain ? process.stderr : process.stdout;
        controller = new ConversationController({
            client: createStreamingClient(config),
            references: new WebContextProvider({
                onProgress: (message) => notices.write(`${DIM_TEXT}${message}${RESET_TEXT}\n`),
            }),
            systemPrompt: buildPrompt(resolveSystemPrompt(options.system, config.systemPrompt)),
            output: process.stdout,
            notices,
            renderSegment: plain ? renderPlain : render,
            showHeader: !plain,
            numResults: config.numResults,
            timeoutMs: config.timeoutMs,
        });
    } catch (error) {
        if (error instanceof ConfigError) {
            process.stderr.write(`${error.message}\n`);
            process.exitCode = 1;
            return;
        }
        throw error;
    }

    const session = new ShellSession({
        config,
        controller,
        persist: (key, value) => {
            updateConfig((current) => setConfigValue(current, key, value));
        },
        pickModel: (currentModelId, loadModels) => runModelPicker({ currentModelId, loadModels }),
    });

    if (prompt) {
        process.exitCode = await runOnce(controller, prompt, Boolean(options.web), !plain);
        return;
    }

    if (!process.stdin.isTTY) {
        process.stderr.write("Nothing to ask: pass a prompt or pipe text in.\n");
        process.exitCode = 1;
        return;
    }

    process.stderr.write(`${DIM_TEXT}Using ${config.provider} model ${session.model}${RESET_TEXT}\n`);
    await runInteractive(session);
}

main().catch((error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exit(1);
});
