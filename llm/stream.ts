import type { ChatMessage, ChatWire, DecodedFrame, GenerationParams } from "./index";
import {
  DecodeError,
  StreamCancelledError,
  StreamError,
  TransportError,
  UpstreamError,
  errorMessage,
  parseUpstreamErrorBody,
} from "./errors";
import { createLogger } from "../src/log";

const log = createLogger("stream");

export type StreamState = "idle" | "connecting" | "streaming" | "completed" | "failed";

export type DeltaHandler = (delta: string) => void | Promise<void>;

export interface StreamingClientOptions {
  wire: ChatWire;
  apiKey: string;
  model?: string;
  baseUrl?: string;
  params?: GenerationParams;
  candidateIndex?: number;
  fetch?: typeof fetch;
}

export interface StreamOptions {
  signal?: AbortSignal;
  // Bounds each network wait (connect, then every body read), not the whole turn.
  timeoutMs?: number;
  onStateChange?: (state: StreamState) => void;
}

// Carries an exception raised by the caller's delta handler past the
// transport error mapping below.
class HandlerFailure {
  constructor(readonly error: unknown) {}
}

function readWithAbort<T>(read: () => Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new Error("aborted"));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error("aborted"));
    signal.addEventListener("abort", onAbort, { once: true });
    void read()
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
}

/**
 * Sends one chat request and consumes the server-sent-event response frame by
 * frame. Deltas reach `onDelta` strictly in arrival order; a handler that
 * returns a promise is awaited before the next frame is looked at, and the
 * next network read is not issued until the current chunk is fully handled.
 *
 * One stream per client at a time.
 */
export class StreamingClient {
  private currentState: StreamState = "idle";

  constructor(private readonly options: StreamingClientOptions) {}

  get state(): StreamState {
    return this.currentState;
  }

  get model(): string {
    return this.options.model || this.options.wire.defaultModel;
  }

  get provider() {
    return this.options.wire.provider;
  }

  async stream(
    messages: readonly ChatMessage[],
    onDelta: DeltaHandler,
    options: StreamOptions = {},
  ): Promise<string> {
    if (this.currentState === "connecting" || this.currentState === "streaming") {
      throw new Error("A stream is already open on this client");
    }

    const { wire, apiKey, baseUrl, params } = this.options;
    const candidateIndex = this.options.candidateIndex ?? 0;
    const fetchImpl = this.options.fetch ?? fetch;
    const { signal, timeoutMs, onStateChange } = options;

    const setState = (next: StreamState) => {
      this.currentState = next;
      onStateChange?.(next);
    };

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let timedOut = false;
    let fullText = "";
    let sawDelta = false;
    let lastDecodeError: DecodeError | undefined;

    const arm = () => {
      if (!timeoutMs || timeoutMs <= 0) return;
      disarm();
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);
    };
    const disarm = () => {
      if (timer !== undefined) clearTimeout(timer);
      timer = undefined;
    };
    const onCallerAbort = () => controller.abort();

    const handleFrame = async (frame: DecodedFrame): Promise<boolean> => {
      if (frame.error) {
        throw new UpstreamError(frame.error.message, fullText, { code: frame.error.code });
      }
      for (const delta of frame.deltas) {
        if (delta.index !== candidateIndex || delta.text.length === 0) continue;
        fullText += delta.text;
        sawDelta = true;
        try {
          await onDelta(delta.text);
        } catch (error) {
          throw new HandlerFailure(error);
        }
        if (controller.signal.aborted) throw new StreamCancelledError(fullText);
      }
      return frame.done;
    };

    const handleLine = async (rawLine: string): Promise<boolean> => {
      const line = rawLine.trim();
      if (!line.startsWith("data:")) return false;
      const data = line.slice(5).trim();
      if (!data) return false;

      let frame: DecodedFrame;
      try {
        frame = wire.decodeFrame(data);
      } catch (error) {
        if (!(error instanceof DecodeError)) throw error;
        lastDecodeError = error;
        log.warn(`Skipping frame: ${error.message}`);
        log.debug(`Frame payload: ${error.frame}`);
        return false;
      }
      return handleFrame(frame);
    };

    if (signal?.aborted) {
      setState("failed");
      throw new StreamCancelledError("");
    }
    let release: (() => Promise<void>) | undefined;
    try {
      signal?.addEventListener("abort", onCallerAbort, { once: true });
      const request = wire.buildRequest(messages, { model: this.model, apiKey, baseUrl, params });
      log.debug(`POST ${request.url} (${messages.length} messages)`);
      setState("connecting");

      arm();
      let response: Response;
      try {
        response = await readWithAbort(
          () => fetchImpl(request.url, {
            method: "POST",
            headers: request.headers,
            body: request.body,
            signal: controller.signal,
          }),
          controller.signal,
        );
      } finally {
        disarm();
      }

      if (!response.ok) {
        arm();
        const body = await readWithAbort(() => response.text().catch(() => ""), controller.signal)
          .finally(disarm);
        const upstream = parseUpstreamErrorBody(body);
        if (upstream) {
          throw new UpstreamError(upstream.message, "", { status: response.status, code: upstream.code });
        }
        throw new TransportError(
          `${response.status} ${response.statusText}${body ? `: ${body}` : ""}`,
          "",
          { status: response.status },
        );
      }
      if (!response.body) {
        throw new TransportError("Response has no body", "");
      }

      setState("streaming");
      const reader = response.body.getReader();
      release = () => reader.cancel().catch(() => undefined);
      const decoder = new TextDecoder();
      let buffer = "";
      let finished = false;

      while (!finished) {
        arm();
        const chunk = await readWithAbort(() => reader.read(), controller.signal).finally(disarm);
        if (chunk.done) {
          buffer += decoder.decode();
          if (buffer.length > 0) finished = await handleLine(buffer);
          if (!finished) log.debug("Stream ended without an end-of-stream marker");
          break;
        }

        buffer += decoder.decode(chunk.value, { stream: true });
        const lines = buffer.split("\n");
        buffer = lines.pop() || "";
        for (const line of lines) {
          finished = await handleLine(line);
          if (finished) break;
        }
      }

      if (!sawDelta && lastDecodeError) throw lastDecodeError;

      setState("completed");
      return fullText;
    } catch (error) {
      setState("failed");
      if (error instanceof HandlerFailure) throw error.error;
      if (signal?.aborted) throw new StreamCancelledError(fullText);
      if (timedOut) {
        throw new TransportError(`No response within ${timeoutMs} ms`, fullText, { timedOut: true });
      }
      if (error instanceof StreamError || error instanceof DecodeError) throw error;
      throw new TransportError(errorMessage(error), fullText, { cause: error });
    } finally {
      disarm();
      signal?.removeEventListener("abort", onCallerAbort);
      if (this.currentState !== "completed") controller.abort();
      if (release) await release();
    }
  }
}
