export type Style = "boldItalic" | "underline" | "italic" | "bold";

export interface StyledSpan {
  text: string;
  styles: Style[];
}

export interface FormatRule {
  name: string;
  pattern: RegExp;
  style: Style;
}

/**
 * Most specific first. `_*_` has to run before `_` and `*`, and `__`/`**`
 * before their single-character forms, or the shorter delimiters eat the
 * longer ones. Every pattern is lazy so adjacent spans stay separate.
 */
export const FORMAT_RULES: readonly FormatRule[] = [
  { name: "bold-italic", pattern: /_\*_([\s\S]*?)_\*_/g, style: "boldItalic" },
  { name: "underline", pattern: /__(.*?)__/g, style: "underline" },
  { name: "italic-underscore", pattern: /_(.*?)_/g, style: "italic" },
  { name: "bold", pattern: /\*\*(.*?)\*\*/g, style: "bold" },
  { name: "italic-asterisk", pattern: /\*([\s\S]*?)\*/g, style: "italic" },
];

const STYLE_CODES: Record<Style, string> = {
  bold: "\x1B[1;96m",
  italic: "\x1B[3;95m",
  underline: "\x1B[4;92m",
  boldItalic: "\x1B[1;3;95m",
};

/** Base text style of the shell; every styled span closes back to it. */
export const BASE_STYLE = "\x1B[0;94m";

// Rules rewrite matches into private-use markers so later rules still see
// the delimiters around an earlier match (`**_x_**` nests).
// Input characters in the marker block are escaped first and restored when
// spans are built.
const OPEN = "\uE000";
const CLOSE = "\uE001";
const ESCAPE = "\uE002";
const RESERVED = /[\uE000-\uE01F]/g;
const ESCAPE_OFFSET = 0x20;
const STYLES: readonly Style[] = ["boldItalic", "underline", "italic", "bold"];
const MARKER_PATTERN = /[\uE000\uE001][\uE010-\uE013]?/g;

function styleMarker(style: Style): string {
  return String.fromCharCode(0xe010 + STYLES.indexOf(style));
}

function styleFromMarker(marker: string | undefined): Style | undefined {
  if (!marker) return undefined;
  return STYLES[marker.charCodeAt(0) - 0xe010];
}

function escapeReserved(text: string): string {
  return text.replace(RESERVED, (ch) => `${ESCAPE}${String.fromCharCode(ch.charCodeAt(0) + ESCAPE_OFFSET)}`);
}

function applyRule(text: string, rule: FormatRule): string {
  return text.replace(rule.pattern, (whole: string, inner: string) => {
    if (inner.replace(MARKER_PATTERN, "").length === 0) return whole;
    return `${OPEN}${styleMarker(rule.style)}${inner}${CLOSE}`;
  });
}

function toSpans(marked: string): StyledSpan[] {
  const spans: StyledSpan[] = [];
  const stack: Style[] = [];
  let buffer = "";
  const flush = () => {
    if (buffer.length === 0) return;
    spans.push({ text: buffer, styles: [...stack] });
    buffer = "";
  };

  for (let i = 0; i < marked.length; i++) {
    const ch = marked[i];
    if (ch === OPEN) {
      flush();
      const style = styleFromMarker(marked[i + 1]);
      if (style) stack.push(style);
      i++;
    } else if (ch === CLOSE) {
      flush();
      stack.pop();
    } else if (ch === ESCAPE) {
      const escaped = marked[i + 1];
      if (escaped !== undefined) buffer += String.fromCharCode(escaped.charCodeAt(0) - ESCAPE_OFFSET);
      i++;
    } else {
      buffer += ch;
    }
  }
  flush();
  return spans;
}

export function parseMarkup(text: string, rules: readonly FormatRule[] = FORMAT_RULES): StyledSpan[] {
  let marked = escapeReserved(text);
  for (const rule of rules) {
    marked = applyRule(marked, rule);
  }
  return toSpans(marked);
}

export function spansToAnsi(spans: readonly StyledSpan[]): string {
  return spans
    .map((span) =>
      span.styles.length === 0
        ? span.text
        : `${span.styles.map((style) => STYLE_CODES[style]).join("")}${span.text}${BASE_STYLE}`,
    )
    .join("");
}

export function spansToPlain(spans: readonly StyledSpan[]): string {
  return spans.map((span) => span.text).join("");
}

export function render(text: string): string {
  return spansToAnsi(parseMarkup(text));
}

export function renderPlain(text: string): string {
  return spansToPlain(parseMarkup(text));
}
