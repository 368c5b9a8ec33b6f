import { render } from "./markup";

export type SegmentRenderer = (text: string) => string;

const TERMINATORS = new Set([".", "!", "?", "\n"]);

/**
 * Collects streamed deltas until one ends a sentence or a line, then hands
 * the whole segment to the renderer at once so markup split across deltas
 * is formatted together.
 */
export class SegmentBuffer {
  private parts: string[] = [];

  constructor(private readonly renderSegment: SegmentRenderer = render) {}

  get pending(): string {
    return this.parts.join("");
  }

  get isEmpty(): boolean {
    return this.parts.length === 0;
  }

  feed(delta: string): string | undefined {
    if (delta.length === 0) return undefined;
    this.parts.push(delta);
    if (!TERMINATORS.has(delta[delta.length - 1])) return undefined;
    return this.flush();
  }

  /** Renders whatever is buffered, complete or not. Call at end of stream. */
  flush(): string | undefined {
    if (this.parts.length === 0) return undefined;
    const segment = this.parts.join("");
    this.parts.length = 0;
    return this.renderSegment(segment);
  }

  clear(): void {
    this.parts.length = 0;
  }
}
