import type { ChatMessage } from "../../llm/index";
import type { StreamingClient } from "../../llm/stream";
import {
  DecodeError,
  StreamCancelledError,
  StreamError,
  TransportError,
  UpstreamError,
} from "../../llm/errors";
import { ConversationContext, createTurn, type Turn } from "./context";
import { SegmentBuffer, type SegmentRenderer } from "../format/segment-buffer";
import { render } from "../format/markup";
import type { ReferenceProvider } from "../search/web-context";
import { createLogger } from "../log";

const log = createLogger("turn");

export const RESPONSE_HEADER = "_*_Response:_*_";
export const REFERENCE_PREFIX = "Web search context:\n";
export const NO_RESULTS_MESSAGE = "No relevant information found from the search.";

export interface TextSink {
  write(text: string): unknown;
}

export type TurnOutcome =
  | { status: "completed"; text: string }
  | { status: "cancelled"; partialText: string }
  | { status: "failed"; error: Error; partialText: string };

export interface TurnOptions {
  reference?: string;
  signal?: AbortSignal;
}

export interface ConversationControllerOptions {
  client: Pick<StreamingClient, "stream">;
  context?: ConversationContext;
  references?: ReferenceProvider;
  systemPrompt?: string;
  output?: TextSink;
  // Chrome and error messages; defaults to `output`.
  notices?: TextSink;
  renderSegment?: SegmentRenderer;
  showHeader?: boolean;
  numResults?: number;
  timeoutMs?: number;
}

export function describeTurnError(error: Error): string {
  if (error instanceof UpstreamError) {
    return `The model service returned an error${error.code ? ` (${error.code})` : ""}: ${error.message}`;
  }
  if (error instanceof TransportError) {
    return `Error querying the model: ${error.message}`;
  }
  if (error instanceof DecodeError) {
    return `Could not read the model response: ${error.message}`;
  }
  return `Error: ${error.message}`;
}

/**
 * Runs one conversational turn at a time: builds the request from the
 * context, streams the reply to the terminal segment by segment and, only
 * when the stream completes, commits the turn to the context.
 */
export class ConversationController {
  readonly context: ConversationContext;
  numResults: number;
  timeoutMs?: number;
  systemPrompt?: string;
  private readonly output: TextSink;
  private readonly notices: TextSink;
  private readonly renderSegment: SegmentRenderer;
  private client: Pick<StreamingClient, "stream">;
  private busy = false;

  constructor(private readonly options: ConversationControllerOptions) {
    this.client = options.client;
    this.context = options.context ?? new ConversationContext();
    this.output = options.output ?? process.stdout;
    this.notices = options.notices ?? this.output;
    this.renderSegment = options.renderSegment ?? render;
    this.numResults = options.numResults ?? 5;
    this.timeoutMs = options.timeoutMs;
    this.systemPrompt = options.systemPrompt;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  /** Swaps the model client between turns, e.g. after a model change. */
  setClient(client: Pick<StreamingClient, "stream">): void {
    if (this.busy) throw new Error("Cannot change the model client during a turn");
    this.client = client;
  }

  buildMessages(pending: readonly Turn[]): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (this.systemPrompt?.trim()) messages.push({ role: "system", content: this.systemPrompt });
    for (const turn of [...this.context.snapshot(), ...pending]) {
      messages.push({ role: turn.role, content: turn.content });
    }
    return messages;
  }

  async runTurn(input: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    if (this.busy) throw new Error("A turn is already in progress");
    this.busy = true;

    const pending: Turn[] = [];
    if (options.reference?.trim()) pending.push(createTurn("system", `${REFERENCE_PREFIX}${options.reference}`));
    pending.push(createTurn("user", input));

    const messages = this.buildMessages(pending);
    const segments = new SegmentBuffer(this.renderSegment);
    const showHeader = this.options.showHeader ?? true;
    const emit = (segment: string | undefined) => {
      if (segment) this.output.write(segment);
    };

    try {
      if (showHeader) this.output.write(`\n${this.renderSegment(RESPONSE_HEADER)}\n`);
      const text = await this.client.stream(messages, (delta) => emit(segments.feed(delta)), {
        signal: options.signal,
        timeoutMs: this.timeoutMs,
      });
      emit(segments.flush());
      this.output.write(showHeader ? "\n\n" : "\n");

      for (const turn of pending) this.context.append(turn);
      this.context.append(createTurn("assistant", text));
      return { status: "completed", text };
    } catch (caught) {
      if (caught instanceof StreamCancelledError) {
        segments.clear();
        return this.stopped(caught.partialText);
      }

      emit(segments.flush());
      const error = caught instanceof Error ? caught : new Error(String(caught));
      const partialText = error instanceof StreamError ? error.partialText : "";
      log.debug(`Turn failed after ${partialText.length} characters`, error);
      this.notices.write(`\n${describeTurnError(error)}\n\n`);
      return { status: "failed", error, partialText };
    } finally {
      this.busy = false;
    }
  }

  private stopped(partialText: string): TurnOutcome {
    this.notices.write("\n[stopped]\n\n");
    return { status: "cancelled", partialText };
  }

  /**
   * Gathers reference text for `query` and asks about it. Returns undefined
   * when the search produced nothing, in which case the model is not called.
   */
  async search(query: string, options: { signal?: AbortSignal } = {}): Promise<TurnOutcome | undefined> {
    const references = this.options.references;
    if (!references) throw new Error("No reference provider configured");
    const { signal } = options;
    if (signal?.aborted) return this.stopped("");

    this.notices.write(`\nChecking the web for ${query}...\n`);
    let reference: string;
    try {
      reference = await references.fetchContext(query, this.numResults, signal);
    } catch (caught) {
      if (signal?.aborted) return this.stopped("");
      const error = caught instanceof Error ? caught : new Error(String(caught));
      log.debug("Reference fetch failed", error);
      this.notices.write(`\nError searching the web: ${error.message}\n\n`);
      return { status: "failed", error, partialText: "" };
    }
    if (signal?.aborted) return this.stopped("");
    if (!reference.trim()) {
      this.notices.write(`${NO_RESULTS_MESSAGE}\n`);
      return undefined;
    }
    return this.runTurn(query, { reference, signal: options.signal });
  }
}
