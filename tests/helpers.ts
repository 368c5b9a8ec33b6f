export const encoder = new TextEncoder();

export function openaiFrame(text: string, index = 0): string {
  return `data: ${JSON.stringify({ choices: [{ index, delta: { content: text } }] })}\n\n`;
}

export const DONE_FRAME = "data: [DONE]\n\n";

export interface SseSource {
  response: Response;
  cancelled: () => boolean;
  push: (chunk: string) => void;
  close: () => void;
}

/** A streaming response whose body is fed from the test; stays open unless `close` is called. */
export function sseSource(initial: string[] = [], options: { close?: boolean } = {}): SseSource {
  let controller: ReadableStreamDefaultController<Uint8Array> | undefined;
  let wasCancelled = false;
  const stream = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c;
      for (const chunk of initial) c.enqueue(encoder.encode(chunk));
      if (options.close) c.close();
    },
    cancel() {
      wasCancelled = true;
    },
  });
  return {
    response: new Response(stream, {
      status: 200,
      headers: { "content-type": "text/event-stream" },
    }),
    cancelled: () => wasCancelled,
    push: (chunk) => controller?.enqueue(encoder.encode(chunk)),
    close: () => controller?.close(),
  };
}

export function sseResponse(chunks: string[]): Response {
  return sseSource(chunks, { close: true }).response;
}

export interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/** `fetch` stand-in answering every request with `respond`, recording what was asked. */
export function fakeFetch(respond: (url: string) => Response | Promise<Response>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = requestUrl(input);
    requests.push({ url, init });
    return respond(url);
  };
  return { fetch: fetchImpl, requests };
}

export function textSink() {
  const chunks: string[] = [];
  return {
    chunks,
    write(text: string) {
      chunks.push(text);
    },
    get text() {
      return chunks.join("");
    },
  };
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
