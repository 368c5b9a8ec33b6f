import { isRecord, readNumber, readString } from "./json";

/**
 * Base class for failures of a single streamed turn. Whatever text arrived
 * before the failure is kept on `partialText` so the caller can decide what
 * to do with it.
 */
export class StreamError extends Error {
  readonly partialText: string;

  constructor(message: string, partialText: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StreamError";
    this.partialText = partialText;
  }
}

/** Network failure, timeout or a non-success HTTP status without a structured error body. */
export class TransportError extends StreamError {
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(
    message: string,
    partialText: string,
    options: { status?: number; timedOut?: boolean; cause?: unknown } = {},
  ) {
    super(message, partialText, { cause: options.cause });
    this.name = "TransportError";
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

/** The service answered with a structured error document instead of content. */
export class UpstreamError extends StreamError {
  readonly status?: number;
  readonly code?: string;

  constructor(message: string, partialText: string, options: { status?: number; code?: string } = {}) {
    super(message, partialText);
    this.name = "UpstreamError";
    this.status = options.status;
    this.code = options.code;
  }
}

export class StreamCancelledError extends StreamError {
  constructor(partialText: string) {
    super("Stream cancelled", partialText);
    this.name = "StreamCancelledError";
  }
}

/** One frame of the stream could not be decoded. */
export class DecodeError extends Error {
  readonly frame: string;

  constructor(message: string, frame: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
    this.frame = frame;
  }
}

export interface UpstreamErrorBody {
  message: string;
  code?: string;
}

/**
 * Reads `{ error: { message, code | status | type } }`, the error shape shared
 * by OpenAI-compatible servers and the Gemini API.
 */
export function readUpstreamError(value: unknown): UpstreamErrorBody | undefined {
  if (!isRecord(value)) return undefined;
  const error = value.error;
  if (typeof error === "string" && error.length > 0) return { message: error };
  if (!isRecord(error)) return undefined;
  const message = readString(error.message) || "Unknown upstream error";
  const numericCode = readNumber(error.code);
  const code =
    readString(error.status) ||
    readString(error.code) ||
    readString(error.type) ||
    (numericCode !== undefined ? String(numericCode) : undefined);
  return { message, code };
}

export function parseUpstreamErrorBody(body: string): UpstreamErrorBody | undefined {
  try {
    return readUpstreamError(JSON.parse(body));
  } catch {
    return undefined;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
